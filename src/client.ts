/**
 * kube-secrets Client - @kubernetes/client-node wrapper
 *
 * Implements the SecretsApi ports on top of CoreV1Api:
 * - listSecrets: one snapshot of a namespace's secrets, decoded to bytes
 * - listNamespaces: names of every namespace in the cluster
 */

import { CoreV1Api, KubeConfig } from '@kubernetes/client-node'
import type { V1NamespaceList, V1Secret, V1SecretList } from '@kubernetes/client-node'
import type { KubeSecretsClientOptions, SecretRecord, SecretsApi } from './types.js'
import {
  ApiError,
  DataContractError,
  InvalidKubeconfigError,
  UnknownContextError,
  type ApiOperation
} from './lib/errors.js'

/**
 * Subset of CoreV1Api used by the client
 */
export interface CoreApi {
  listNamespacedSecret(param: { namespace: string }): Promise<V1SecretList>
  listNamespace(): Promise<V1NamespaceList>
}

/**
 * Convert an API Secret into a SecretRecord
 *
 * name and type are required: a missing type would silently change what
 * the filter shows, so it is never defaulted.
 */
export function toSecretRecord(secret: V1Secret): SecretRecord {
  const name = secret.metadata?.name
  if (typeof name !== 'string') {
    throw new DataContractError('Secret', 'metadata.name')
  }
  if (typeof secret.type !== 'string') {
    throw new DataContractError(`Secret '${name}'`, 'type')
  }

  const data: Record<string, Uint8Array> = {}
  for (const [key, encoded] of Object.entries(secret.data ?? {})) {
    data[key] = new Uint8Array(Buffer.from(encoded, 'base64'))
  }

  return { name, type: secret.type, data }
}

/**
 * Extract a readable reason and HTTP status from a client-node failure
 */
export function describeApiFailure(error: unknown): { reason: string; statusCode?: number } {
  let statusCode: number | undefined
  let reason = error instanceof Error ? error.message : String(error)

  if (typeof error === 'object' && error !== null) {
    if ('code' in error && typeof error.code === 'number') {
      statusCode = error.code
    }
    // ApiException carries the V1Status returned by the API server
    if ('body' in error) {
      const status = parseStatusBody(error.body)
      if (status) reason = status
    }
  }

  const firstLine = reason.split('\n')[0]
  return { reason: firstLine || 'unknown error', statusCode }
}

function parseStatusBody(body: unknown): string | undefined {
  let parsed = body
  if (typeof body === 'string') {
    try {
      parsed = JSON.parse(body)
    } catch {
      return undefined
    }
  }
  if (typeof parsed === 'object' && parsed !== null && 'message' in parsed && typeof parsed.message === 'string') {
    return parsed.message
  }
  return undefined
}

function toApiError(operation: ApiOperation, error: unknown, namespace?: string): ApiError {
  const { reason, statusCode } = describeApiFailure(error)
  return new ApiError(operation, reason, { statusCode, namespace, cause: error })
}

/**
 * Load a kubeconfig and select the requested context
 */
export function createKubeConfig(options: KubeSecretsClientOptions = {}): KubeConfig {
  const kc = new KubeConfig()

  try {
    if (options.kubeconfig) {
      kc.loadFromFile(options.kubeconfig)
    } else {
      kc.loadFromDefault()
    }
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err)
    throw new InvalidKubeconfigError(reason, options.kubeconfig, err)
  }

  if (options.context) {
    const available = kc.getContexts().map(ctx => ctx.name)
    if (!available.includes(options.context)) {
      throw new UnknownContextError(options.context, available)
    }
    kc.setCurrentContext(options.context)
  }

  return kc
}

/**
 * kube-secrets Client
 */
export class KubeSecretsClient implements SecretsApi {
  private readonly api: CoreApi

  /** Context the client talks to, when known */
  readonly contextName?: string

  constructor(api: CoreApi, contextName?: string) {
    this.api = api
    this.contextName = contextName
  }

  async listSecrets(namespace: string): Promise<SecretRecord[]> {
    let list: V1SecretList
    try {
      list = await this.api.listNamespacedSecret({ namespace })
    } catch (err) {
      throw toApiError('listSecrets', err, namespace)
    }
    return list.items.map(toSecretRecord)
  }

  async listNamespaces(): Promise<string[]> {
    let list: V1NamespaceList
    try {
      list = await this.api.listNamespace()
    } catch (err) {
      throw toApiError('listNamespaces', err)
    }

    return list.items.map(ns => {
      const name = ns.metadata?.name
      if (typeof name !== 'string') {
        throw new DataContractError('Namespace', 'metadata.name')
      }
      return name
    })
  }
}

/**
 * Create a client from kubeconfig options
 */
export function createClient(options: KubeSecretsClientOptions = {}): KubeSecretsClient {
  const kc = createKubeConfig(options)
  return new KubeSecretsClient(kc.makeApiClient(CoreV1Api), kc.getCurrentContext())
}

// Default export
export default KubeSecretsClient
