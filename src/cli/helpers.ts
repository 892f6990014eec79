import { resolve } from 'node:path'
import { createNavigator, type Navigator } from '../index.js'
import { loadConfig, type Config } from '../config.js'
import { expandTilde } from '../utils.js'

export function shellEscape(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`
}

export function getEffectiveConfigPath(getConfigPath: () => string): string {
  return process.env.DIRHOP_CONFIG_PATH ?? getConfigPath()
}

/**
 * Loads the effective config and opens a navigator on it.
 */
export function openNavigator(getConfigPath: () => string): { navigator: Navigator; config: Config } {
  const config = loadConfig(getEffectiveConfigPath(getConfigPath))
  return { navigator: createNavigator({ config }), config }
}

/**
 * Absolute form of a user-supplied directory argument.
 */
export function resolveDirArg(value: string): string {
  return resolve(expandTilde(value))
}

/**
 * Parses a non-negative integer flag value.
 *
 * @returns The value, or undefined when it is not a non-negative integer
 */
export function parseCount(value: string): number | undefined {
  if (!/^\d+$/.test(value)) {
    return undefined
  }
  return Number.parseInt(value, 10)
}

/**
 * Options shared by the listing commands.
 */
export interface ListArgs {
  filter: string
  fuzzy: boolean
  offset: number
  limit: number
  /** First malformed flag, if any */
  invalid?: string
}

/**
 * Parses `[filter] [--fuzzy] [--offset n] [--limit n]`. Remaining
 * positionals are joined into the filter.
 */
export function parseListArgs(args: string[], defaultLimit: number): ListArgs {
  const parsed: ListArgs = { filter: '', fuzzy: false, offset: 0, limit: defaultLimit }
  const words: string[] = []

  for (let i = 0; i < args.length; i++) {
    const arg = args[i]
    if (arg === undefined) continue
    if (arg === '--fuzzy' || arg === '-f') {
      parsed.fuzzy = true
    } else if ((arg === '--offset' || arg === '-o' || arg === '--limit' || arg === '-n') && args[i + 1]) {
      const nextArg = args[++i]
      const value = nextArg !== undefined ? parseCount(nextArg) : undefined
      if (value === undefined) {
        parsed.invalid ??= `${arg} ${nextArg ?? ''}`.trim()
      } else if (arg === '--offset' || arg === '-o') {
        parsed.offset = value
      } else {
        parsed.limit = value
      }
    } else if (arg.startsWith('-') && arg !== '-') {
      parsed.invalid ??= arg
    } else {
      words.push(arg)
    }
  }

  parsed.filter = words.join(' ')
  return parsed
}
