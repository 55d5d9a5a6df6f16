/**
 * kube-secrets - list and decode Kubernetes secrets
 *
 * Main library exports for programmatic usage
 */

// Client
export {
  KubeSecretsClient,
  createClient,
  createKubeConfig,
  toSecretRecord,
  describeApiFailure
} from './client.js'
export type { CoreApi } from './client.js'

// Types
export type {
  ListingConfig,
  SecretRecord,
  RunOutcome,
  SecretSource,
  NamespaceSource,
  SecretsApi,
  SecretFormatter,
  KubeSecretsClientOptions
} from './types.js'

export { OPAQUE_SECRET_TYPE } from './types.js'

// Listing
export { createListingConfig, type ListingConfigInput } from './lib/config.js'
export { shouldDisplay } from './lib/filter.js'
export {
  renderSecret,
  decodeUtf8,
  plainFormatter,
  UNDECODABLE_PLACEHOLDER,
  type RenderedSecret
} from './lib/render.js'
export { diagnoseNamespace, noSecretsMessage, missingNamespaceMessage } from './lib/diagnostic.js'
export { listSecrets, runListing, type ListingOptions, type LineWriter } from './lib/pipeline.js'

// Errors
export {
  KubeSecretsError,
  ConfigError,
  MissingNamespaceError,
  UnknownContextError,
  InvalidKubeconfigError,
  ApiError,
  DataContractError,
  isKubeSecretsError,
  isConfigError,
  isApiError,
  isDataContractError,
  formatErrorForCli,
  wrapError
} from './lib/errors.js'
