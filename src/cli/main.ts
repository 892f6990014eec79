import { parseArgv, reportFailure, EXIT_SUCCESS, EXIT_USAGE, error } from './core.js'
import { showHelp } from './help.js'
import {
  cmdAddPath,
  cmdDeletePath,
  cmdHistory,
  cmdLasts,
  cmdPaths,
  cmdSuggest,
} from './commands/paths.js'
import {
  cmdAddShortcut,
  cmdDeleteShortcut,
  cmdPrintShortcut,
  cmdShortcuts,
} from './commands/shortcuts.js'
import {
  cmdExportPaths,
  cmdExportShortcuts,
  cmdImportPaths,
  cmdImportShortcuts,
} from './commands/transfer.js'
import { cmdPrettyPrintPath } from './commands/pretty.js'
import { cmdPick } from './commands/pick.js'
import { cmdConfig } from './commands/config.js'
import { cmdShellInit } from './commands/shell.js'
import { NAME } from './constants.js'
import { getConfigPath } from '../config.js'
import { VERSION } from '../version.js'

export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  const { flags, command, args, help, version } = parseArgv(argv)

  if (flags.debug) {
    process.env.DIRHOP_DEBUG = '1'
  }

  if (help) {
    showHelp()
    return EXIT_SUCCESS
  }

  if (version) {
    console.log(VERSION)
    return EXIT_SUCCESS
  }

  if (!command) {
    showHelp()
    return EXIT_USAGE
  }

  try {
    switch (command) {
      case 'add-path':
        return await cmdAddPath(args, flags, getConfigPath)
      case 'delete-path':
        return await cmdDeletePath(args, flags, getConfigPath)
      case 'paths':
        return await cmdPaths(args, flags, getConfigPath)
      case 'history':
        return await cmdHistory(args, flags, getConfigPath)
      case 'lasts':
        return await cmdLasts(flags, getConfigPath)
      case 'suggest':
        return await cmdSuggest(args, flags, getConfigPath)
      case 'add-shortcut':
        return await cmdAddShortcut(args, flags, getConfigPath)
      case 'delete-shortcut':
        return await cmdDeleteShortcut(args, flags, getConfigPath)
      case 'print-shortcut':
        return await cmdPrintShortcut(args, flags, getConfigPath)
      case 'shortcuts':
        return await cmdShortcuts(args, flags, getConfigPath)
      case 'import-paths':
        return await cmdImportPaths(args, flags, getConfigPath)
      case 'import-shortcuts':
        return await cmdImportShortcuts(args, flags, getConfigPath)
      case 'export-paths':
        return await cmdExportPaths(args, flags, getConfigPath)
      case 'export-shortcuts':
        return await cmdExportShortcuts(args, flags, getConfigPath)
      case 'pretty-print-path':
        return await cmdPrettyPrintPath(args, flags, getConfigPath)
      case 'pick':
        return await cmdPick(args, flags, getConfigPath)
      case 'config':
        return await cmdConfig(args, flags, getConfigPath)
      case 'shell-init':
        return await cmdShellInit(args, flags)
      default:
        error(`unknown command: ${command}`, flags)
        console.error(`Run '${NAME} --help' for usage.`)
        return EXIT_USAGE
    }
  } catch (err) {
    return reportFailure(err, flags)
  }
}
