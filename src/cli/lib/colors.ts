/**
 * kube-secrets CLI - Colors Utility
 *
 * Terminal colors using tuiuiu.js text-utils + ANSI 256 for the help palette
 * Supports NO_COLOR and FORCE_COLOR environment variables
 */

import {
  colorize,
  style,
  styles as tuiStyles
} from 'tuiuiu.js'
import type { Formatter } from 'cli-args-parser'
import type { SecretFormatter } from '../../types.js'

// Check if colors should be enabled
const isColorEnabled = (): boolean => {
  // Respect NO_COLOR standard
  if (process.env.NO_COLOR !== undefined) return false
  if (process.env.FORCE_COLOR !== undefined) return true
  return process.stdout.isTTY ?? false
}

const enabled = isColorEnabled()

// Wrapper that respects NO_COLOR
const color = (text: string, col: string): string => {
  if (!enabled) return text
  return colorize(text, col)
}

const styled = (text: string, ...styleNames: (keyof typeof tuiStyles)[]): string => {
  if (!enabled) return text
  return style(text, ...styleNames)
}

/**
 * Help palette (ANSI 256)
 * - 39:  Neon blue     (#00AFFF) - program, commands
 * - 45:  Electric blue (#00D7FF) - flags
 * - 33:  Sky blue      (#0087FF) - positionals
 * - 75:  Steel blue    (#5FAFFF) - option types
 * - 252: Light gray    (#D0D0D0) - descriptions
 * - 245: Medium gray   (#8A8A8A) - aliases
 */
const ansi = {
  bold: (s: string) => enabled ? `\x1b[1m${s}\x1b[22m` : s,
  dim: (s: string) => enabled ? `\x1b[2m${s}\x1b[22m` : s,

  neonBlue: (s: string) => enabled ? `\x1b[38;5;39m${s}\x1b[39m` : s,
  electricBlue: (s: string) => enabled ? `\x1b[38;5;45m${s}\x1b[39m` : s,
  skyBlue: (s: string) => enabled ? `\x1b[38;5;33m${s}\x1b[39m` : s,
  steelBlue: (s: string) => enabled ? `\x1b[38;5;75m${s}\x1b[39m` : s,

  white: (s: string) => enabled ? `\x1b[97m${s}\x1b[39m` : s,
  gray: (s: string) => enabled ? `\x1b[38;5;245m${s}\x1b[39m` : s,
  lightGray: (s: string) => enabled ? `\x1b[38;5;252m${s}\x1b[39m` : s,
  red: (s: string) => enabled ? `\x1b[91m${s}\x1b[39m` : s,
}

/**
 * Help/version formatter for cli-args-parser
 */
export const helpFormatter: Formatter = {
  'section-header': s => ansi.bold(ansi.white(s)),

  'program-name': s => ansi.bold(ansi.neonBlue(s)),
  'version': s => ansi.electricBlue(s),
  'description': s => ansi.lightGray(s),

  'command-name': s => ansi.neonBlue(s),
  'command-alias': s => ansi.gray(s),
  'command-description': s => ansi.lightGray(s),

  'option-flag': s => ansi.electricBlue(s),
  'option-type': s => ansi.steelBlue(s),
  'option-default': s => ansi.dim(s),
  'option-description': s => ansi.lightGray(s),

  'positional-name': s => ansi.skyBlue(s),

  'error-header': s => ansi.bold(ansi.red(s)),
  'error-message': s => ansi.red(s),
  'error-option': s => ansi.neonBlue(s),
}

export const dim = (text: string) => styled(text, 'dim')

export const red = (text: string) => color(text, 'red')
export const brightBlue = (text: string) => color(text, 'blueBright')
export const brightGreen = (text: string) => color(text, 'greenBright')

// Semantic colors
export const c = {
  command: (text: string) => ansi.bold(ansi.neonBlue(text)),

  // Secret listing
  secretName: (text: string) => brightBlue(text),
  key: (text: string) => brightGreen(text),

  error: (text: string) => red(text),
  muted: (text: string) => dim(text),
}

/**
 * Formatter injected into the secret renderer
 */
export const secretFormatter: SecretFormatter = {
  name: c.secretName,
  key: c.key
}

export const symbols = {
  error: enabled ? red('✗') : '[ERROR]',
}

// Print utilities (stderr only: stdout carries the listing)
export const print = {
  error: (msg: string) => console.error(`${symbols.error} ${c.error(msg)}`),
}
