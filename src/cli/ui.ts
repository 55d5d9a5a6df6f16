/**
 * CLI UI utilities - TTY-aware output
 *
 * - stdout: the listing itself, nothing else
 * - stderr: progress, verbose logs, warnings, errors
 */

import { getSpinnerConfig } from 'tuiuiu.js'
import type { SpinnerStyle } from 'tuiuiu.js'

export const isTTY = process.stdout.isTTY ?? false
export const isStderrTTY = process.stderr.isTTY ?? false

/**
 * Output data to stdout
 * This is the ONLY function that should write to stdout for data
 */
export function output(data: string): void {
  process.stdout.write(data + '\n')
}

/**
 * Log message to stderr (only in TTY mode)
 */
export function log(message: string): void {
  if (isTTY) {
    console.error(message)
  }
}

/**
 * Log verbose message (only with --verbose)
 */
export function verbose(message: string, enabled: boolean): void {
  if (enabled) {
    console.error(`[kube-secrets] ${message}`)
  }
}

export interface Spinner {
  start(): void
  stop(): void
}

/**
 * Simple spinner for stderr
 * Uses tuiuiu.js spinner frames but renders imperatively to stderr
 */
export function createSpinner(text: string, spinnerStyle: SpinnerStyle = 'dots'): Spinner {
  if (!isStderrTTY) {
    // No-op spinner for non-TTY
    return { start: () => {}, stop: () => {} }
  }

  const config = getSpinnerConfig(spinnerStyle)
  let frameIndex = 0
  let interval: ReturnType<typeof setInterval> | null = null

  const render = () => {
    const frame = config.frames[frameIndex % config.frames.length]
    process.stderr.write(`\r\x1b[K${frame} ${text}`)
    frameIndex++
  }

  return {
    start: () => {
      render()
      interval = setInterval(render, config.interval)
    },
    stop: () => {
      if (interval) clearInterval(interval)
      interval = null
      process.stderr.write(`\r\x1b[K`)
    }
  }
}

/**
 * Wrap an async operation with a spinner
 * The spinner is cleared on failure too; the caller reports the error.
 */
export async function withSpinner<T>(
  text: string,
  operation: () => Promise<T>
): Promise<T> {
  const spinner = createSpinner(text)
  spinner.start()

  try {
    return await operation()
  } finally {
    spinner.stop()
  }
}
