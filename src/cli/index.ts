#!/usr/bin/env node
/**
 * kube-secrets CLI
 *
 * List and decode the secrets of a Kubernetes namespace
 */

import { runCli } from './main.js'
import { print } from './lib/colors.js'
import { formatErrorForCli } from '../lib/errors.js'

runCli(process.argv.slice(2))
  .then(code => process.exit(code))
  .catch((err: unknown) => {
    // Handle uncaught errors at the top level
    print.error(formatErrorForCli(err))
    process.exit(1)
  })
