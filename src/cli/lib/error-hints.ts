/**
 * Human-readable CLI hints for cluster and kubeconfig failures.
 */

import { isApiError, isConfigError, isKubeSecretsError } from '../../lib/errors.js'

interface ErrorHintOptions {
  namespace?: string
  context?: string
}

function normalizeMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message || ''
  }
  return typeof error === 'string' ? error : String(error)
}

function includesAny(message: string, tokens: string[]): boolean {
  return tokens.some(token => message.includes(token))
}

function statusCodeOf(error: unknown): number | undefined {
  return isApiError(error) ? error.statusCode : undefined
}

function isPermissionError(message: string, statusCode?: number): boolean {
  if (statusCode === 401 || statusCode === 403) return true
  return includesAny(message, [
    'forbidden',
    'unauthorized',
    'permission',
    'cannot list',
    'authentication'
  ])
}

function isConnectivityError(message: string): boolean {
  return includesAny(message, [
    'econnrefused',
    'enotfound',
    'etimedout',
    'econnreset',
    'getaddrinfo',
    'socket hang up',
    'network is unreachable',
    'certificate',
    'self signed'
  ])
}

function isKubeconfigError(message: string): boolean {
  return includesAny(message, ['kubeconfig', 'no active cluster', 'enoent'])
}

/**
 * Build short CLI suggestions from an error.
 */
export function buildErrorHints(error: unknown, options: ErrorHintOptions = {}): string[] {
  const message = normalizeMessage(error).toLowerCase()

  if (message.length === 0) {
    return []
  }

  // The error's own suggestion already shows the usage
  if (isKubeSecretsError(error) && error.code === 'MISSING_NAMESPACE') {
    return []
  }

  const hints: string[] = []
  const contextFlag = options.context ? ` --context ${options.context}` : ''
  const statusCode = statusCodeOf(error)

  if (isPermissionError(message, statusCode)) {
    const target = options.namespace ? ` -n ${options.namespace}` : ''
    hints.push(`Permission denied. Check with: kubectl auth can-i list secrets${target}${contextFlag}`)
  }

  if (isConnectivityError(message)) {
    hints.push(`Cluster unreachable. Verify the API server with: kubectl cluster-info${contextFlag}`)
  }

  if (statusCode === 404) {
    hints.push('The API server returned 404. Check the namespace name and the selected context.')
  }

  if (isConfigError(error) || isKubeconfigError(message)) {
    hints.push('List available contexts with: kubectl config get-contexts')
  }

  if (hints.length === 0) {
    hints.push('Re-run with --verbose for more details.')
  }

  return [...new Set(hints)]
}
