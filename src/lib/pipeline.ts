/**
 * Listing pipeline
 *
 * Fetch → filter/render (per secret) → diagnose (only when nothing was shown).
 * Linear, no retries: any API error aborts the run.
 */

import type {
  ListingConfig,
  RunOutcome,
  SecretFormatter,
  SecretRecord,
  SecretsApi
} from '../types.js'
import { shouldDisplay } from './filter.js'
import { renderSecret, plainFormatter } from './render.js'
import { diagnoseNamespace } from './diagnostic.js'

export type LineWriter = (line: string) => void

export interface ListingOptions {
  /** Receives every output line (secret blocks and the diagnostic) */
  write: LineWriter
  formatter?: SecretFormatter
  /** Progress messages, e.g. for --verbose */
  log?: (message: string) => void
}

/**
 * Filter and render one snapshot of secrets
 */
export function listSecrets(
  config: ListingConfig,
  secrets: Iterable<SecretRecord>,
  write: LineWriter,
  formatter: SecretFormatter = plainFormatter
): RunOutcome {
  const outcome: RunOutcome = { secretsShown: 0, entries: 0 }

  for (const secret of secrets) {
    if (!shouldDisplay(config, secret)) {
      continue
    }

    const rendered = renderSecret(secret, formatter)
    for (const line of rendered.lines) {
      write(line)
    }
    outcome.secretsShown++
    outcome.entries += rendered.entries
  }

  return outcome
}

/**
 * Run a full listing against the cluster API
 */
export async function runListing(
  config: ListingConfig,
  api: SecretsApi,
  options: ListingOptions
): Promise<RunOutcome> {
  const log = options.log ?? (() => {})

  const secrets = await api.listSecrets(config.namespace)
  log(`Fetched ${secrets.length} secret(s) from namespace '${config.namespace}'`)

  const outcome = listSecrets(config, secrets, options.write, options.formatter)
  log(`Displayed ${outcome.secretsShown} secret(s), ${outcome.entries} entries`)

  if (outcome.entries > 0) {
    return outcome
  }

  const namespaces = await api.listNamespaces()
  log(`Checked ${namespaces.length} namespace(s) for '${config.namespace}'`)

  outcome.diagnostic = diagnoseNamespace(config.namespace, namespaces)
  options.write(outcome.diagnostic)
  return outcome
}
