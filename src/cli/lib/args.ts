/**
 * kube-secrets CLI - Argument schema and mapping
 */

import type { CommandParseResult, CLISchema } from 'cli-args-parser'
import fs from 'node:fs'
import path from 'node:path'
import { fileURLToPath } from 'node:url'
import type { CLIArgs } from '../../types.js'
import { helpFormatter } from './colors.js'

export const VERSION = process.env.KUBE_SECRETS_VERSION || getPackageVersion() || '0.0.0'

function getPackageVersion(): string | undefined {
  try {
    // Walk up from this module to the nearest package.json
    let dir = path.dirname(fileURLToPath(import.meta.url))
    for (let i = 0; i < 5; i++) {
      const pkgPath = path.join(dir, 'package.json')
      if (fs.existsSync(pkgPath)) {
        const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, 'utf-8'))
        if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
          return pkg.version
        }
        return undefined
      }
      dir = path.dirname(dir)
    }
    return undefined
  } catch {
    return undefined
  }
}

/**
 * CLI Schema definition
 */
export const cliSchema: CLISchema = {
  name: 'kube-secrets',
  version: VERSION,
  description: 'Command line utility to list and decode Kubernetes secrets',
  autoShort: false,
  strict: true,
  formatter: helpFormatter,
  help: {
    includeGlobalOptionsInCommands: true
  },

  // Global options available to all commands
  options: {
    help: {
      short: 'h',
      type: 'boolean',
      default: false,
      description: 'Show help'
    },
    version: {
      short: 'V',
      type: 'boolean',
      default: false,
      description: 'Show version'
    },
    verbose: {
      short: 'v',
      type: 'boolean',
      default: false,
      description: 'Print progress to stderr'
    },
    context: {
      type: 'string',
      description: 'Kubeconfig context to use (default: current-context)'
    },
    kubeconfig: {
      type: 'string',
      description: 'Path to a kubeconfig file (default: KUBECONFIG or ~/.kube/config)'
    }
  },

  commands: {
    list: {
      description: 'Print the decoded key/value contents of the secrets in a namespace (default command)',
      aliases: ['ls'],
      positional: [
        { name: 'namespace', required: true, description: 'Namespace to list secrets from' },
        { name: 'query', description: 'Only show secrets whose name contains this text (case-sensitive)' }
      ],
      options: {
        'show-all': {
          short: 'a',
          type: 'boolean',
          default: false,
          description: 'Show secrets of every type, not only Opaque'
        }
      }
    }
  }
}

const COMMANDS = new Set(['list', 'ls'])
// Global options whose value is the next token
const VALUE_OPTIONS = new Set(['--context', '--kubeconfig'])

/**
 * Make `list` the default command, so `kube-secrets -a default cert`
 * reads as `kube-secrets list -a default cert`.
 * Argument vectors without any positional are left alone.
 */
export function normalizeArgv(argv: readonly string[]): string[] {
  for (let i = 0; i < argv.length; i++) {
    const token = argv[i]
    if (token === '--') break
    if (VALUE_OPTIONS.has(token)) {
      i++
      continue
    }
    if (token.startsWith('-')) continue
    return COMMANDS.has(token) ? [...argv] : ['list', ...argv]
  }
  return [...argv]
}

function stringValue(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined
}

function booleanValue(value: unknown): boolean | undefined {
  return typeof value === 'boolean' ? value : undefined
}

/**
 * Convert cli-args-parser result to CLIArgs format
 */
export function toCliArgs(result: CommandParseResult): CLIArgs {
  const opts = result.options as Record<string, unknown>
  const pos = result.positional as Record<string, unknown>

  return {
    _: [...result.command],
    // Global options
    verbose: booleanValue(opts.verbose),
    help: booleanValue(opts.help),
    version: booleanValue(opts.version),
    context: stringValue(opts.context),
    kubeconfig: stringValue(opts.kubeconfig),
    // List command
    namespace: stringValue(pos.namespace),
    query: stringValue(pos.query),
    'show-all': booleanValue(opts['show-all'])
  }
}

/**
 * What main should do with a parsed invocation
 */
export type CliAction =
  | { kind: 'help'; command: string[] }
  | { kind: 'version' }
  | { kind: 'parse-error'; errors: string[] }
  | { kind: 'missing-namespace' }
  | { kind: 'run'; command: string }

/**
 * Decide the action. Help wins over version, and both are honoured
 * before parser errors so `list --help` works without a namespace.
 * Every command needs a namespace.
 */
export function resolveAction(args: CLIArgs, errors: readonly unknown[]): CliAction {
  if (args.help) {
    return { kind: 'help', command: args._ }
  }

  if (args.version) {
    return { kind: 'version' }
  }

  // A bare invocation is a missing namespace, whatever the parser says
  if (args._.length === 0) {
    return { kind: 'missing-namespace' }
  }

  if (errors.length > 0) {
    return { kind: 'parse-error', errors: errors.map(error => String(error)) }
  }

  if (!args.namespace) {
    return { kind: 'missing-namespace' }
  }

  return { kind: 'run', command: args._[0] }
}

export function formatVersion(): string {
  return `kube-secrets v${VERSION}`
}
