/**
 * Listing configuration
 *
 * Builds the immutable run parameters from raw CLI or programmatic input.
 */

import type { ListingConfig } from '../types.js'
import { MissingNamespaceError } from './errors.js'

export interface ListingConfigInput {
  namespace?: string
  query?: string
  showAll?: boolean
}

/**
 * Validate input and return a frozen ListingConfig
 *
 * An empty query matches every name, so it is stored as absent.
 */
export function createListingConfig(input: ListingConfigInput): ListingConfig {
  const namespace = input.namespace
  if (namespace === undefined || namespace === '') {
    throw new MissingNamespaceError()
  }

  const config: ListingConfig = input.query === undefined || input.query === ''
    ? { namespace, showAll: input.showAll ?? false }
    : { namespace, query: input.query, showAll: input.showAll ?? false }

  return Object.freeze(config)
}
