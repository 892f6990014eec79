import { writeFileSync } from 'node:fs'
import { resolve } from 'node:path'
import ora from 'ora'
import type { ImportReport } from '../../types.js'
import {
  error,
  info,
  output,
  EXIT_ERROR,
  EXIT_SUCCESS,
  EXIT_USAGE,
  type OutputOptions,
} from '../core.js'
import { openNavigator } from '../helpers.js'
import type { Navigator } from '../../index.js'

type ImportKind = 'paths' | 'shortcuts'

async function runImport(
  kind: ImportKind,
  args: string[],
  opts: OutputOptions,
  getConfigPath: () => string
): Promise<number> {
  const file = args[0]
  if (!file) {
    error(`Usage: dirhop import-${kind} <file>`, opts)
    return EXIT_USAGE
  }

  const { navigator } = openNavigator(getConfigPath)
  const spinner = opts.quiet || opts.json ? null : ora(`Importing ${kind} from ${file}...`).start()
  try {
    let report: ImportReport
    try {
      const filePath = resolve(file)
      report = kind === 'paths' ? navigator.importPaths(filePath) : navigator.importShortcuts(filePath)
    } catch (err) {
      spinner?.fail(`Import failed: ${err instanceof Error ? err.message : String(err)}`)
      if (!spinner) {
        error(err instanceof Error ? err.message : String(err), opts)
      }
      return EXIT_ERROR
    }

    if (opts.json) {
      output({ file, ...report }, opts)
    } else if (report.skipped > 0) {
      spinner?.warn(`Imported ${report.imported} ${kind}, skipped ${report.skipped}`)
    } else {
      spinner?.succeed(`Imported ${report.imported} ${kind}`)
    }
    return EXIT_SUCCESS
  } finally {
    navigator.close()
  }
}

export async function cmdImportPaths(
  args: string[],
  opts: OutputOptions,
  getConfigPath: () => string
): Promise<number> {
  return runImport('paths', args, opts, getConfigPath)
}

export async function cmdImportShortcuts(
  args: string[],
  opts: OutputOptions,
  getConfigPath: () => string
): Promise<number> {
  return runImport('shortcuts', args, opts, getConfigPath)
}

function exportData(kind: ImportKind, navigator: Navigator): unknown {
  return kind === 'paths' ? navigator.exportPaths() : navigator.exportShortcuts()
}

async function runExport(
  kind: ImportKind,
  args: string[],
  opts: OutputOptions,
  getConfigPath: () => string
): Promise<number> {
  const file = args[0]
  const { navigator } = openNavigator(getConfigPath)
  try {
    const json = `${JSON.stringify(exportData(kind, navigator), null, 2)}\n`
    if (file === undefined || file === '-') {
      process.stdout.write(json)
    } else {
      writeFileSync(resolve(file), json)
      info(`Exported ${kind} to ${file}`, opts)
    }
    return EXIT_SUCCESS
  } finally {
    navigator.close()
  }
}

export async function cmdExportPaths(
  args: string[],
  opts: OutputOptions,
  getConfigPath: () => string
): Promise<number> {
  return runExport('paths', args, opts, getConfigPath)
}

export async function cmdExportShortcuts(
  args: string[],
  opts: OutputOptions,
  getConfigPath: () => string
): Promise<number> {
  return runExport('shortcuts', args, opts, getConfigPath)
}
