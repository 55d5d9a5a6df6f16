/**
 * kube-secrets CLI - List Command
 *
 * Print the decoded contents of the secrets in a namespace
 */

import type { CLIArgs, SecretsApi } from '../../types.js'
import { createClientFromArgs } from '../lib/create-client.js'
import { secretFormatter } from '../lib/colors.js'
import { createListingConfig } from '../../lib/config.js'
import { runListing } from '../../lib/pipeline.js'
import * as ui from '../ui.js'

export interface ListContext {
  args: CLIArgs
  verbose: boolean
}

/**
 * Wrap the API calls with a stderr spinner
 */
function withProgress(api: SecretsApi): SecretsApi {
  return {
    listSecrets: namespace =>
      ui.withSpinner(`Fetching secrets from ${namespace}`, () => api.listSecrets(namespace)),
    listNamespaces: () =>
      ui.withSpinner('Checking namespaces', () => api.listNamespaces())
  }
}

/**
 * Run the list command
 */
export async function runList(context: ListContext): Promise<void> {
  const { args, verbose } = context

  // Validate before touching the kubeconfig or the network
  const config = createListingConfig({
    namespace: args.namespace,
    query: args.query,
    showAll: args['show-all']
  })

  const client = createClientFromArgs({ args, verbose })

  ui.verbose(
    `Listing ${config.showAll ? 'all' : 'Opaque'} secrets in '${config.namespace}'` +
      (config.query !== undefined ? ` matching '${config.query}'` : ''),
    verbose
  )

  await runListing(config, withProgress(client), {
    write: ui.output,
    formatter: secretFormatter,
    log: message => ui.verbose(message, verbose)
  })
}
