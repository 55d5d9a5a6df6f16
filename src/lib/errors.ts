/**
 * kube-secrets Error Hierarchy
 *
 * Typed error classes shared by the CLI and programmatic usage.
 *
 * Hierarchy:
 *   KubeSecretsError (base)
 *   ├── ConfigError (run parameters, kubeconfig)
 *   │   ├── MissingNamespaceError
 *   │   ├── UnknownContextError
 *   │   └── InvalidKubeconfigError
 *   ├── ApiError (a Kubernetes API call failed)
 *   └── DataContractError (API returned a resource missing a required field)
 */

interface KubeSecretsErrorOptions {
  suggestion?: string
  context?: Record<string, unknown>
  cause?: unknown
}

/**
 * Base error class for all kube-secrets errors
 */
export class KubeSecretsError extends Error {
  /** Error code for programmatic handling */
  readonly code: string

  /** Suggestion for how to fix the error */
  readonly suggestion?: string

  /** Additional context/data about the error */
  readonly context?: Record<string, unknown>

  constructor(message: string, code: string, options?: KubeSecretsErrorOptions) {
    super(message, { cause: options?.cause })
    this.name = 'KubeSecretsError'
    this.code = code
    this.suggestion = options?.suggestion
    this.context = options?.context

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }

  /**
   * Format error for CLI output
   */
  toCliOutput(): string {
    const lines = [`Error: ${this.message}`]
    if (this.suggestion) {
      lines.push(`  Suggestion: ${this.suggestion}`)
    }
    return lines.join('\n')
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      suggestion: this.suggestion,
      context: this.context,
      stack: this.stack
    }
  }
}

// =============================================================================
// Configuration Errors
// =============================================================================

export class ConfigError extends KubeSecretsError {
  constructor(message: string, code: string, options?: KubeSecretsErrorOptions) {
    super(message, code, options)
    this.name = 'ConfigError'
  }
}

/**
 * Thrown before any API call when no namespace was given
 */
export class MissingNamespaceError extends ConfigError {
  constructor() {
    super(
      'Namespace is required',
      'MISSING_NAMESPACE',
      {
        suggestion: 'Usage: kube-secrets [-a] <namespace> [query]'
      }
    )
    this.name = 'MissingNamespaceError'
  }
}

/**
 * Thrown when --context names a context the kubeconfig does not define
 */
export class UnknownContextError extends ConfigError {
  constructor(contextName: string, availableContexts: string[]) {
    super(
      `Context "${contextName}" not found in kubeconfig`,
      'UNKNOWN_CONTEXT',
      {
        suggestion: availableContexts.length > 0
          ? `Available contexts: ${availableContexts.join(', ')}`
          : 'The kubeconfig defines no contexts',
        context: { contextName, availableContexts }
      }
    )
    this.name = 'UnknownContextError'
  }
}

/**
 * Thrown when the kubeconfig cannot be loaded
 */
export class InvalidKubeconfigError extends ConfigError {
  constructor(reason: string, kubeconfigPath?: string, cause?: unknown) {
    super(
      kubeconfigPath
        ? `Unable to load kubeconfig ${kubeconfigPath}: ${reason}`
        : `Unable to load kubeconfig: ${reason}`,
      'INVALID_KUBECONFIG',
      {
        suggestion: 'Check the file passed with --kubeconfig or the KUBECONFIG environment variable',
        context: kubeconfigPath ? { kubeconfigPath } : undefined,
        cause
      }
    )
    this.name = 'InvalidKubeconfigError'
  }
}

// =============================================================================
// API Errors
// =============================================================================

export type ApiOperation = 'listSecrets' | 'listNamespaces'

/**
 * Thrown when a Kubernetes API call fails (transport, auth, not found)
 */
export class ApiError extends KubeSecretsError {
  /** HTTP status reported by the API server, when there was a response */
  readonly statusCode?: number

  constructor(
    operation: ApiOperation,
    reason: string,
    options: { statusCode?: number; namespace?: string; cause?: unknown } = {}
  ) {
    const target = options.namespace ? ` in namespace '${options.namespace}'` : ''
    const status = options.statusCode !== undefined ? ` (HTTP ${options.statusCode})` : ''
    super(
      `Failed to ${operation === 'listSecrets' ? 'list secrets' : 'list namespaces'}${target}${status}: ${reason}`,
      'API_ERROR',
      {
        suggestion: 'Check that the cluster is reachable and your credentials are valid',
        context: {
          operation,
          namespace: options.namespace,
          statusCode: options.statusCode
        },
        cause: options.cause
      }
    )
    this.name = 'ApiError'
    this.statusCode = options.statusCode
  }
}

// =============================================================================
// Data Contract Errors
// =============================================================================

/**
 * Thrown when a resource from the API lacks a field the listing relies on
 */
export class DataContractError extends KubeSecretsError {
  constructor(resource: string, field: string) {
    super(
      `${resource} is missing required field "${field}"`,
      'DATA_CONTRACT',
      {
        suggestion: 'The API server returned an unexpected object; re-run with --verbose and report it',
        context: { resource, field }
      }
    )
    this.name = 'DataContractError'
  }
}

// =============================================================================
// Type Guards
// =============================================================================

export function isKubeSecretsError(error: unknown): error is KubeSecretsError {
  return error instanceof KubeSecretsError
}

export function isConfigError(error: unknown): error is ConfigError {
  return error instanceof ConfigError
}

export function isApiError(error: unknown): error is ApiError {
  return error instanceof ApiError
}

export function isDataContractError(error: unknown): error is DataContractError {
  return error instanceof DataContractError
}

// =============================================================================
// Error Formatting Helpers
// =============================================================================

/**
 * Format any error for CLI output
 */
export function formatErrorForCli(error: unknown): string {
  if (isKubeSecretsError(error)) {
    return error.toCliOutput()
  }
  if (error instanceof Error) {
    return `Error: ${error.message}`
  }
  return `Error: ${String(error)}`
}

/**
 * Wrap a generic error into a KubeSecretsError if needed
 */
export function wrapError(error: unknown, defaultCode: string = 'UNKNOWN_ERROR'): KubeSecretsError {
  if (isKubeSecretsError(error)) {
    return error
  }
  if (error instanceof Error) {
    return new KubeSecretsError(error.message, defaultCode, { cause: error })
  }
  return new KubeSecretsError(String(error), defaultCode)
}
