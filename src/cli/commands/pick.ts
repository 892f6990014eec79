/**
 * Interactive directory chooser.
 *
 * Pages through a WindowedResultCache with a select prompt and hands the
 * chosen directory to the shell through a file or stdout. The prompt
 * itself draws on stderr.
 */

import { writeFileSync } from 'node:fs'
import select from '@inquirer/select'
import { cyan, dim, green } from 'yoctocolors'
import type { Navigator } from '../../index.js'
import type { PathEntry, Shortcut } from '../../types.js'
import type { WindowedResultCache } from '../../cache.js'
import {
  error,
  info,
  EXIT_ERROR,
  EXIT_SUCCESS,
  EXIT_USAGE,
  type OutputOptions,
} from '../core.js'
import { openNavigator } from '../helpers.js'

type PickAction =
  | { kind: 'choose'; path: string }
  | { kind: 'next' }
  | { kind: 'previous' }

interface PickChoice {
  name: string
  value: PickAction
  description?: string
}

const pickTheme = {
  prefix: { idle: green('?'), done: green('?') },
  icon: { cursor: cyan('❯') },
  style: {
    disabled: (text: string) => dim(text),
    highlight: (text: string) => text,
    help: (text: string) => dim(`${text} • q quit`),
  },
}

/**
 * Shows one page; resolves to null when the user quits (q or Ctrl+C).
 */
async function promptPage(message: string, choices: PickChoice[]): Promise<PickAction | null> {
  const stdin = process.stdin
  let cancelled = false
  const prompt = select<PickAction>(
    { message, choices, pageSize: choices.length, loop: false, theme: pickTheme },
    { output: process.stderr }
  )

  const onKeypress = (data: Buffer) => {
    const key = data.toString()
    if (key === 'q' || key === 'Q') {
      cancelled = true
      prompt.cancel()
    }
  }
  stdin.on('data', onKeypress)

  try {
    return await prompt
  } catch (err) {
    if (cancelled || (err instanceof Error && err.name === 'ExitPromptError')) {
      return null
    }
    throw err
  } finally {
    stdin.removeListener('data', onKeypress)
  }
}

function pathChoice(navigator: Navigator, entry: PathEntry, width: number): PickChoice {
  const pretty = navigator.prettyPath(entry.path, { width })
  return {
    name: entry.isPredicted ? `${pretty} ${dim('(suggested)')}` : pretty,
    value: { kind: 'choose', path: entry.path },
  }
}

function shortcutChoice(shortcut: Shortcut): PickChoice {
  return {
    name: `${cyan(shortcut.name)}  ${shortcut.path}`,
    value: { kind: 'choose', path: shortcut.path },
    description: shortcut.description ?? undefined,
  }
}

/**
 * Runs the page loop over a cache until a directory is chosen or the
 * user quits.
 */
async function pickFrom<T>(
  cache: WindowedResultCache<T>,
  pageSize: number,
  toChoice: (entry: T) => PickChoice,
  message: string
): Promise<string | null> {
  for (;;) {
    const choices = cache.entries.map(toChoice)
    if (cache.length === pageSize) {
      choices.push({ name: dim('Next page'), value: { kind: 'next' } })
    }
    if (cache.first > 0) {
      choices.push({ name: dim('Previous page'), value: { kind: 'previous' } })
    }

    const action = await promptPage(message, choices)
    if (action === null) {
      return null
    }
    if (action.kind === 'choose') {
      return action.path
    }
    cache.updateToOffset(action.kind === 'next' ? pageSize : -pageSize, pageSize)
  }
}

export async function cmdPick(
  args: string[],
  opts: OutputOptions,
  getConfigPath: () => string
): Promise<number> {
  let outputFile: string | undefined
  let shortcuts = false
  let fuzzy: boolean | undefined
  let query = ''

  for (let i = 0; i < args.length; i++) {
    const arg = args[i]
    if (arg === '--shortcuts' || arg === '-s') {
      shortcuts = true
    } else if (arg === '--fuzzy' || arg === '-f') {
      fuzzy = true
    } else if ((arg === '--query' || arg === '-Q') && args[i + 1] !== undefined) {
      query = args[++i] ?? ''
    } else if (arg !== undefined && !arg.startsWith('-') && outputFile === undefined) {
      outputFile = arg
    } else {
      error('Usage: dirhop pick [output-file] [--shortcuts] [--fuzzy] [--query <q>]', opts)
      return EXIT_USAGE
    }
  }

  if (!process.stdin.isTTY) {
    error('pick needs an interactive terminal', opts)
    return EXIT_ERROR
  }

  const { navigator, config } = openNavigator(getConfigPath)
  try {
    const pageSize = Math.max(1, config.display.page_size)
    const matchFuzzy = fuzzy ?? config.search.fuzzy
    let chosen: string | null

    if (shortcuts) {
      const cache = navigator.createShortcutCache()
      cache.updateFilter(pageSize, query, matchFuzzy)
      if (cache.length === 0) {
        info('No matching shortcuts.', opts)
        return EXIT_ERROR
      }
      chosen = await pickFrom(cache, pageSize, shortcutChoice, 'Shortcut:')
    } else {
      const width = config.display.max_width
      const cache = navigator.createPathCache()
      cache.updateFilter(pageSize, query, matchFuzzy)
      if (cache.length === 0) {
        info('No matching directories.', opts)
        return EXIT_ERROR
      }
      chosen = await pickFrom(cache, pageSize, entry => pathChoice(navigator, entry, width), 'Directory:')
    }

    if (chosen === null) {
      return EXIT_ERROR
    }
    if (outputFile !== undefined) {
      writeFileSync(outputFile, chosen)
    } else {
      process.stdout.write(`${chosen}\n`)
    }
    return EXIT_SUCCESS
  } finally {
    navigator.close()
  }
}
