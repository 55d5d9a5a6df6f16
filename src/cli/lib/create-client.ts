/**
 * Shared helper for creating a KubeSecretsClient from CLI arguments
 */

import type { CLIArgs } from '../../types.js'
import { createClient, type KubeSecretsClient } from '../../client.js'
import * as ui from '../ui.js'

export interface CreateClientOptions {
  args: CLIArgs
  verbose?: boolean
}

/**
 * Create a client for the selected kubeconfig and context
 *
 * Priority:
 * 1. --kubeconfig / --context flags
 * 2. KUBECONFIG and its current-context
 * 3. ~/.kube/config, then in-cluster service account
 */
export function createClientFromArgs(options: CreateClientOptions): KubeSecretsClient {
  const { args, verbose = false } = options

  const client = createClient({
    kubeconfig: args.kubeconfig,
    context: args.context
  })

  if (args.kubeconfig) {
    ui.verbose(`Using kubeconfig: ${args.kubeconfig}`, verbose)
  }
  ui.verbose(`Using context: ${client.contextName || '(in-cluster)'}`, verbose)

  return client
}
