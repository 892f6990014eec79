import { cyan, dim } from 'yoctocolors'
import type { Shortcut } from '../../types.js'
import {
  error,
  output,
  EXIT_SUCCESS,
  EXIT_USAGE,
  type OutputOptions,
} from '../core.js'
import { openNavigator, parseListArgs, resolveDirArg } from '../helpers.js'

export function formatShortcut(shortcut: Shortcut, noColor: boolean): string {
  const name = noColor ? shortcut.name : cyan(shortcut.name)
  const description = shortcut.description ? `  ${shortcut.description}` : ''
  return `${name}  ${shortcut.path}${noColor ? description : dim(description)}`
}

export async function cmdAddShortcut(
  args: string[],
  opts: OutputOptions,
  getConfigPath: () => string
): Promise<number> {
  const [name, path, ...rest] = args
  if (!name || !path) {
    error('Usage: dirhop add-shortcut <name> <path> [description]', opts)
    return EXIT_USAGE
  }
  const description = rest.length > 0 ? rest.join(' ') : null

  const { navigator } = openNavigator(getConfigPath)
  try {
    navigator.addShortcut(name, resolveDirArg(path), description)
    return EXIT_SUCCESS
  } finally {
    navigator.close()
  }
}

export async function cmdDeleteShortcut(
  args: string[],
  opts: OutputOptions,
  getConfigPath: () => string
): Promise<number> {
  const name = args[0]
  if (!name) {
    error('Usage: dirhop delete-shortcut <name>', opts)
    return EXIT_USAGE
  }

  const { navigator } = openNavigator(getConfigPath)
  try {
    navigator.deleteShortcut(name)
    return EXIT_SUCCESS
  } finally {
    navigator.close()
  }
}

/**
 * Prints the bare path of a shortcut; prints nothing for an unknown name.
 */
export async function cmdPrintShortcut(
  args: string[],
  opts: OutputOptions,
  getConfigPath: () => string
): Promise<number> {
  const name = args[0]
  if (!name) {
    error('Usage: dirhop print-shortcut <name>', opts)
    return EXIT_USAGE
  }

  const { navigator } = openNavigator(getConfigPath)
  try {
    const shortcut = navigator.findShortcut(name)
    if (opts.json) {
      output(shortcut ?? null, opts)
    } else if (shortcut) {
      output(shortcut.path, opts)
    }
    return EXIT_SUCCESS
  } finally {
    navigator.close()
  }
}

export async function cmdShortcuts(
  args: string[],
  opts: OutputOptions,
  getConfigPath: () => string
): Promise<number> {
  const { navigator } = openNavigator(getConfigPath)
  try {
    const list = parseListArgs(args, Number.MAX_SAFE_INTEGER)
    if (list.invalid !== undefined) {
      error(`invalid option: ${list.invalid}`, opts)
      error('Usage: dirhop shortcuts [filter] [--fuzzy]', opts)
      return EXIT_USAGE
    }
    const shortcuts = navigator.listShortcuts(list.offset, list.limit, list.filter, list.fuzzy)
    if (opts.json) {
      output(shortcuts, opts)
    } else if (shortcuts.length === 0) {
      output('No shortcuts found.', opts)
    } else {
      output(shortcuts.map(shortcut => formatShortcut(shortcut, opts.noColor)).join('\n'), opts)
    }
    return EXIT_SUCCESS
  } finally {
    navigator.close()
  }
}
