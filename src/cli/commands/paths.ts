import { dim, yellow } from 'yoctocolors'
import type { PathEntry } from '../../types.js'
import { formatDate } from '../../utils.js'
import {
  error,
  output,
  EXIT_SUCCESS,
  EXIT_USAGE,
  type OutputOptions,
} from '../core.js'
import { openNavigator, parseCount, parseListArgs, resolveDirArg } from '../helpers.js'

const LASTS_COUNT = 10

/**
 * One listing line: id (or `*` for a prediction), date, path and shortcut.
 */
export function formatPathEntry(entry: PathEntry, noColor: boolean): string {
  const id = entry.isPredicted ? '*' : String(entry.id)
  const shortcut = entry.shortcut ? `  [${entry.shortcut.name}]` : ''
  const line = `${id.padStart(5)}  ${formatDate(entry.date)}  ${entry.path}${shortcut}`
  if (noColor) return line
  return entry.isPredicted ? yellow(line) : line
}

function printEntries(entries: PathEntry[], opts: OutputOptions): void {
  if (opts.json) {
    output(entries, opts)
  } else if (entries.length === 0) {
    output(opts.noColor ? 'No paths found.' : dim('No paths found.'), opts)
  } else {
    output(entries.map(entry => formatPathEntry(entry, opts.noColor)).join('\n'), opts)
  }
}

export async function cmdAddPath(
  args: string[],
  opts: OutputOptions,
  getConfigPath: () => string
): Promise<number> {
  const path = args[0]
  if (!path) {
    error('Usage: dirhop add-path <path>', opts)
    return EXIT_USAGE
  }

  const { navigator } = openNavigator(getConfigPath)
  try {
    navigator.addPath(resolveDirArg(path))
    return EXIT_SUCCESS
  } finally {
    navigator.close()
  }
}

export async function cmdDeletePath(
  args: string[],
  opts: OutputOptions,
  getConfigPath: () => string
): Promise<number> {
  const id = args[0] !== undefined ? parseCount(args[0]) : undefined
  if (id === undefined) {
    error('Usage: dirhop delete-path <id>', opts)
    return EXIT_USAGE
  }

  const { navigator } = openNavigator(getConfigPath)
  try {
    navigator.deletePath(id)
    return EXIT_SUCCESS
  } finally {
    navigator.close()
  }
}

export async function cmdPaths(
  args: string[],
  opts: OutputOptions,
  getConfigPath: () => string
): Promise<number> {
  const { navigator, config } = openNavigator(getConfigPath)
  try {
    const list = parseListArgs(args, config.display.page_size)
    if (list.invalid !== undefined) {
      error(`invalid option: ${list.invalid}`, opts)
      error('Usage: dirhop paths [filter] [--fuzzy] [--offset <n>] [--limit <n>]', opts)
      return EXIT_USAGE
    }
    printEntries(navigator.listPaths(list.offset, list.limit, list.filter, list.fuzzy), opts)
    return EXIT_SUCCESS
  } finally {
    navigator.close()
  }
}

export async function cmdHistory(
  args: string[],
  opts: OutputOptions,
  getConfigPath: () => string
): Promise<number> {
  const { navigator, config } = openNavigator(getConfigPath)
  try {
    const list = parseListArgs(args, config.display.page_size)
    if (list.invalid !== undefined || list.fuzzy) {
      error(`invalid option: ${list.invalid ?? '--fuzzy'}`, opts)
      error('Usage: dirhop history [filter] [--offset <n>] [--limit <n>]', opts)
      return EXIT_USAGE
    }
    printEntries(navigator.listPathHistory(list.offset, list.limit, list.filter), opts)
    return EXIT_SUCCESS
  } finally {
    navigator.close()
  }
}

export async function cmdLasts(opts: OutputOptions, getConfigPath: () => string): Promise<number> {
  const { navigator } = openNavigator(getConfigPath)
  try {
    const entries = navigator.listRecentPaths(LASTS_COUNT)
    if (opts.json) {
      output(entries.map(entry => ({ date: entry.date, path: entry.path })), opts)
    } else {
      for (const entry of entries) {
        output(`${formatDate(entry.date)} ${entry.path}`, opts)
      }
    }
    return EXIT_SUCCESS
  } finally {
    navigator.close()
  }
}

export async function cmdSuggest(
  args: string[],
  opts: OutputOptions,
  getConfigPath: () => string
): Promise<number> {
  let matchPath: string | undefined
  let depth: number | undefined
  let count: number | undefined

  for (let i = 0; i < args.length; i++) {
    const arg = args[i]
    if ((arg === '--depth' || arg === '-d' || arg === '--count' || arg === '-c') && args[i + 1]) {
      const nextArg = args[++i]
      const value = nextArg !== undefined ? parseCount(nextArg) : undefined
      if (value === undefined) {
        error(`invalid value for ${arg}: ${nextArg ?? ''}`, opts)
        return EXIT_USAGE
      }
      if (arg === '--depth' || arg === '-d') {
        depth = value
      } else {
        count = value
      }
    } else if (arg !== undefined && !arg.startsWith('-') && matchPath === undefined) {
      matchPath = resolveDirArg(arg)
    } else {
      error('Usage: dirhop suggest [path] [--depth <n>] [--count <n>]', opts)
      return EXIT_USAGE
    }
  }

  const { navigator } = openNavigator(getConfigPath)
  try {
    printEntries(navigator.suggest(matchPath, { depth, count }), opts)
    return EXIT_SUCCESS
  } finally {
    navigator.close()
  }
}
