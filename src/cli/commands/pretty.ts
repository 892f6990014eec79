import {
  error,
  output,
  EXIT_SUCCESS,
  EXIT_USAGE,
  type OutputOptions,
} from '../core.js'
import { openNavigator, parseCount, resolveDirArg } from '../helpers.js'

export async function cmdPrettyPrintPath(
  args: string[],
  opts: OutputOptions,
  getConfigPath: () => string
): Promise<number> {
  let path: string | undefined
  let style = !opts.noColor
  let width: number | undefined

  for (let i = 0; i < args.length; i++) {
    const arg = args[i]
    if (arg === '--no-style') {
      style = false
    } else if ((arg === '--max-width' || arg === '-w') && args[i + 1]) {
      const nextArg = args[++i]
      width = nextArg !== undefined ? parseCount(nextArg) : undefined
      if (width === undefined) {
        error(`invalid width: ${nextArg ?? ''}`, opts)
        return EXIT_USAGE
      }
    } else if (arg !== undefined && !arg.startsWith('-') && path === undefined) {
      path = arg
    } else {
      path = undefined
      break
    }
  }

  if (path === undefined) {
    error('Usage: dirhop pretty-print-path <path> [--no-style] [--max-width <n>]', opts)
    return EXIT_USAGE
  }

  const { navigator } = openNavigator(getConfigPath)
  try {
    const absolute = resolveDirArg(path)
    const pretty = navigator.prettyPath(absolute, { width, style: style && !opts.json })
    output(opts.json ? { path: absolute, pretty } : pretty, opts)
    return EXIT_SUCCESS
  } finally {
    navigator.close()
  }
}
