/**
 * Namespace diagnostic
 *
 * Run when a listing printed nothing, to tell an empty namespace apart from
 * one that does not exist in the current cluster.
 */

export function noSecretsMessage(namespace: string): string {
  return `No secrets found in namespace '${namespace}'`
}

export function missingNamespaceMessage(namespace: string): string {
  return `Namespace '${namespace}' does not exist. Maybe you're looking at the wrong cluster?`
}

/**
 * Scan the cluster's namespace names for an exact match.
 */
export function diagnoseNamespace(namespace: string, namespaces: Iterable<string>): string {
  for (const name of namespaces) {
    if (name === namespace) {
      return noSecretsMessage(namespace)
    }
  }
  return missingNamespaceMessage(namespace)
}
