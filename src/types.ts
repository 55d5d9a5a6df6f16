/**
 * kube-secrets - Type Definitions
 */

// ============================================================================
// Listing Types
// ============================================================================

/** Secret type shown when --show-all is not set */
export const OPAQUE_SECRET_TYPE = 'Opaque'

/**
 * Validated run parameters, built once by createListingConfig()
 */
export interface ListingConfig {
  readonly namespace: string
  /** Case-sensitive substring matched against secret names; absent = no filter */
  readonly query?: string
  /** When false only Opaque secrets are listed */
  readonly showAll: boolean
}

/**
 * Read-only view of a fetched Kubernetes Secret
 *
 * Values hold the raw bytes; the base64 transport encoding of the API is
 * removed by the client adapter.
 */
export interface SecretRecord {
  readonly name: string
  readonly type: string
  readonly data: Readonly<Record<string, Uint8Array>>
}

/**
 * Result of one pipeline pass
 */
export interface RunOutcome {
  /** Secrets that passed the filter and were printed */
  secretsShown: number
  /** Key/value lines printed across all secrets */
  entries: number
  /** Message printed when no entries were shown */
  diagnostic?: string
}

// ============================================================================
// Ports
// ============================================================================

export interface SecretSource {
  /** One snapshot of the secrets in a namespace. Rejects with ApiError. */
  listSecrets(namespace: string): Promise<SecretRecord[]>
}

export interface NamespaceSource {
  /** Names of every namespace in the cluster. Rejects with ApiError. */
  listNamespaces(): Promise<string[]>
}

export type SecretsApi = SecretSource & NamespaceSource

// ============================================================================
// Presentation
// ============================================================================

/**
 * Styling applied to rendered secrets. Values are never styled.
 */
export interface SecretFormatter {
  name(text: string): string
  key(text: string): string
}

// ============================================================================
// Client Options
// ============================================================================

export interface KubeSecretsClientOptions {
  /** Path to a kubeconfig file (default: KUBECONFIG, ~/.kube/config or in-cluster) */
  kubeconfig?: string
  /** Context to use instead of the kubeconfig's current-context */
  context?: string
}

// ============================================================================
// CLI Types
// ============================================================================

export interface CLIArgs {
  _: string[]
  // Global flags
  verbose?: boolean
  help?: boolean
  version?: boolean
  context?: string
  kubeconfig?: string
  // List command
  namespace?: string
  query?: string
  'show-all'?: boolean
}
