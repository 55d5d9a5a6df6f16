/**
 * Secret renderer
 *
 * Turns a displayed secret into printable lines:
 *
 *   api-token:
 *     value: abc123
 *     <blank>
 */

import type { SecretFormatter, SecretRecord } from '../types.js'

/** Printed in place of a value that is not valid UTF-8 */
export const UNDECODABLE_PLACEHOLDER = '<unable to decode UTF-8>'

export interface RenderedSecret {
  lines: string[]
  /** Number of key/value lines */
  entries: number
}

/**
 * Formatter that leaves text untouched
 */
export const plainFormatter: SecretFormatter = {
  name: text => text,
  key: text => text
}

// fatal: invalid sequences throw instead of becoming U+FFFD
const utf8Decoder = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true })

/**
 * Decode bytes as UTF-8, or undefined when they are not valid UTF-8
 */
export function decodeUtf8(bytes: Uint8Array): string | undefined {
  try {
    return utf8Decoder.decode(bytes)
  } catch {
    return undefined
  }
}

/**
 * Render a secret. Keys are printed in sorted order.
 */
export function renderSecret(
  secret: SecretRecord,
  formatter: SecretFormatter = plainFormatter
): RenderedSecret {
  const lines = [`${formatter.name(secret.name)}:`]
  let entries = 0

  const data = secret.data ?? {}

  // Kubernetes keys are ASCII ([-._a-zA-Z0-9]), so code unit order is byte order
  for (const key of Object.keys(data).sort()) {
    const value = decodeUtf8(data[key]) ?? UNDECODABLE_PLACEHOLDER
    lines.push(`  ${formatter.key(key)}: ${value}`)
    entries++
  }

  lines.push('')
  return { lines, entries }
}
