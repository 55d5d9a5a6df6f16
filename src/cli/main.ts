/**
 * kube-secrets CLI - Dispatch
 *
 * Parses argv, runs the command and returns the exit code
 */

import { createCLI } from 'cli-args-parser'
import { c, print } from './lib/colors.js'
import { buildErrorHints } from './lib/error-hints.js'
import { cliSchema, formatVersion, normalizeArgv, resolveAction, toCliArgs } from './lib/args.js'
import * as ui from './ui.js'
import { isKubeSecretsError, MissingNamespaceError } from '../lib/errors.js'
import { runList } from './commands/list.js'
import type { CLIArgs } from '../types.js'

// Create CLI instance
const cli = createCLI(cliSchema)

function printError(err: unknown, verbose: boolean): void {
  if (isKubeSecretsError(err)) {
    print.error(err.message)
    if (err.suggestion) {
      console.error(`  ${c.muted('Suggestion:')} ${err.suggestion}`)
    }
    if (verbose && err.context) {
      ui.verbose(`Context: ${JSON.stringify(err.context)}`, verbose)
    }
  } else {
    print.error(err instanceof Error ? err.message : String(err))
  }
}

/**
 * Run the CLI with the given arguments (without node and script path)
 */
export async function runCli(argv: readonly string[]): Promise<number> {
  const result = cli.parse(normalizeArgv(argv))
  const args = toCliArgs(result)
  const verbose = args.verbose ?? false
  const action = resolveAction(args, result.errors)

  switch (action.kind) {
    case 'help':
      ui.output(cli.help(action.command))
      return 0

    case 'version':
      ui.output(formatVersion())
      return 0

    case 'parse-error':
      for (const error of action.errors) {
        print.error(error)
      }
      ui.log(`Run "${c.command('kube-secrets --help')}" for usage information`)
      return 1

    case 'missing-namespace':
      printError(new MissingNamespaceError(), verbose)
      return 1

    case 'run':
      return runCommand(action.command, args, verbose)
  }
}

async function runCommand(command: string, args: CLIArgs, verbose: boolean): Promise<number> {
  try {
    switch (command) {
      case 'list':
      case 'ls':
        await runList({ args, verbose })
        return 0

      default:
        print.error(`Unknown command: ${c.command(command)}`)
        ui.log(`Run "${c.command('kube-secrets --help')}" for usage information`)
        return 1
    }
  } catch (err) {
    printError(err, verbose)
    for (const hint of buildErrorHints(err, { namespace: args.namespace, context: args.context })) {
      console.error(`  ${c.muted('Hint:')} ${hint}`)
    }
    return 1
  }
}
