/**
 * Secret filter
 *
 * Decides whether a fetched secret is shown for a given configuration.
 */

import { OPAQUE_SECRET_TYPE, type ListingConfig, type SecretRecord } from '../types.js'
import { DataContractError } from './errors.js'

/**
 * Type gate first, then the name query.
 *
 * A secret rejected by the type gate stays rejected whatever the query is.
 * The query is a case-sensitive substring: no globbing, no regex.
 */
export function shouldDisplay(config: ListingConfig, secret: SecretRecord): boolean {
  if (typeof secret.name !== 'string') {
    throw new DataContractError('Secret', 'metadata.name')
  }
  if (typeof secret.type !== 'string') {
    throw new DataContractError(`Secret '${secret.name}'`, 'type')
  }

  if (!config.showAll && secret.type !== OPAQUE_SECRET_TYPE) {
    return false
  }

  if (config.query === undefined) {
    return true
  }

  return secret.name.includes(config.query)
}
