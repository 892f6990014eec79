/**
 * Shared CLI plumbing: argv splitting, output channels and the mapping
 * from failures to exit codes.
 *
 * @module cli/core
 */

import { NAME } from './constants.js'
import { isDirhopError, isMigrationError } from '../errors.js'

export const EXIT_SUCCESS = 0
export const EXIT_ERROR = 1
export const EXIT_USAGE = 2
/** Schema migration failed; the store must not be used */
export const EXIT_FATAL = 3

export interface OutputOptions {
  json: boolean
  quiet: boolean
  noColor: boolean
  debug: boolean
}

/**
 * A command line split into global flags, the command and its arguments.
 */
export interface ParsedArgv {
  readonly flags: OutputOptions
  readonly command: string | undefined
  readonly args: string[]
  readonly help: boolean
  readonly version: boolean
}

function colorByDefault(): boolean {
  return (process.stdout.isTTY ?? false) && !process.env.NO_COLOR
}

/**
 * Pulls global flags out of argv wherever they appear. The first
 * remaining word is the command.
 */
export function parseArgv(argv: readonly string[]): ParsedArgv {
  const flags: OutputOptions = {
    json: false,
    quiet: false,
    noColor: !colorByDefault(),
    debug: false,
  }
  let help = false
  let version = false
  const rest: string[] = []

  for (const arg of argv) {
    switch (arg) {
      case '--json':
        flags.json = true
        break
      case '--quiet':
      case '-q':
        flags.quiet = true
        break
      case '--no-color':
        flags.noColor = true
        break
      case '--debug':
        flags.debug = true
        break
      case '--help':
      case '-h':
        help = true
        break
      case '--version':
      case '-v':
        version = true
        break
      default:
        rest.push(arg)
    }
  }

  const [command, ...args] = rest
  return { flags, command, args, help: help || command === 'help', version }
}

export function output(data: unknown, opts: OutputOptions): void {
  if (opts.quiet) return

  if (opts.json) {
    console.log(JSON.stringify(data, null, 2))
  } else {
    console.log(data)
  }
}

export function error(message: string, opts: OutputOptions, code?: string): void {
  if (opts.json) {
    console.error(JSON.stringify(code === undefined ? { error: message } : { error: message, code }))
  } else {
    console.error(`${NAME}: ${message}`)
  }
}

export function info(message: string, opts: OutputOptions): void {
  if (opts.quiet || opts.json) return
  console.error(message)
}

/**
 * Exit code for a failure escaping a command: 3 for a migration error,
 * 1 for anything else.
 */
export function exitCodeFor(err: unknown): number {
  return isMigrationError(err) ? EXIT_FATAL : EXIT_ERROR
}

/**
 * Prints a failure and returns its exit code. Migration errors always
 * show their cause; other dirhop errors show it under `--debug`.
 */
export function reportFailure(err: unknown, opts: OutputOptions): number {
  if (isDirhopError(err)) {
    const detailed = isMigrationError(err) || opts.debug
    error(detailed ? err.toDetailedString() : err.message, opts, err.code)
  } else {
    error(err instanceof Error ? err.message : String(err), opts)
  }
  return exitCodeFor(err)
}
