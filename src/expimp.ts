/**
 * Bulk import and export of paths and shortcuts.
 *
 * Files are JSON or TOML, picked by extension:
 *
 * ```toml
 * [[paths]]
 * date = "1717000000"
 * path = "/home/me/src"
 *
 * [[shortcuts]]
 * name = "src"
 * path = "/home/me/src"
 * description = "sources"
 * ```
 *
 * Records go through `addPath` / `addShortcut`. A bad record is logged and
 * skipped; only an unreadable or unparsable file aborts the import.
 *
 * @module expimp
 */

import { readFileSync } from 'node:fs'
import { extname } from 'node:path'
import TOML from 'toml'
import { z } from 'zod'
import type { Db } from './db.js'
import { ImportError, ensureError } from './errors.js'
import { addPath, listAllPaths } from './paths.js'
import { addShortcut, listAllShortcuts } from './shortcuts.js'
import type { ImportReport } from './types.js'

// ============================================================================
// Record Schemas
// ============================================================================

export const PathRecordSchema = z.object({
  date: z.union([z.string(), z.number()]).transform(value => String(value)),
  path: z.string().min(1),
})

export const ShortcutRecordSchema = z.object({
  name: z.string().min(1),
  path: z.string().min(1),
  description: z.string().nullish(),
})

export type PathRecord = z.infer<typeof PathRecordSchema>
export type ShortcutRecord = z.infer<typeof ShortcutRecordSchema>

const PathsFileSchema = z.object({ paths: z.array(z.unknown()) })
const ShortcutsFileSchema = z.object({ shortcuts: z.array(z.unknown()) })

const EPOCH_SECONDS = /^\d+$/

// ============================================================================
// File Reading
// ============================================================================

/**
 * Reads and parses an import file.
 *
 * @throws ImportError when the file cannot be read or parsed
 */
export function readImportFile(filePath: string): unknown {
  let content: string
  try {
    content = readFileSync(filePath, 'utf-8')
  } catch (err) {
    throw ImportError.unreadable(filePath, ensureError(err))
  }

  const ext = extname(filePath).toLowerCase()
  try {
    if (ext === '.toml') {
      return TOML.parse(content)
    }
    if (ext === '.json') {
      return JSON.parse(content)
    }
  } catch (err) {
    throw ImportError.malformed(filePath, 'parse error', ensureError(err))
  }
  throw ImportError.malformed(filePath, `unsupported extension "${ext}" (use .json or .toml)`)
}

function logSkipped(errors: string[], message: string): void {
  console.warn(`[dirhop] ${message}`)
  errors.push(message)
}

function describeIssues(error: z.ZodError): string {
  return error.issues.map(issue => `${issue.path.join('.') || 'record'}: ${issue.message}`).join('; ')
}

// ============================================================================
// Import
// ============================================================================

/**
 * Adds path records; each must carry the visit date as epoch seconds.
 */
export function importPathRecords(db: Db, records: readonly unknown[]): ImportReport {
  const errors: string[] = []
  let imported = 0

  records.forEach((record, index) => {
    const parsed = PathRecordSchema.safeParse(record)
    if (!parsed.success) {
      logSkipped(errors, `paths[${index}] skipped: ${describeIssues(parsed.error)}`)
      return
    }
    const { date, path } = parsed.data
    if (!EPOCH_SECONDS.test(date.trim())) {
      logSkipped(errors, `paths[${index}] skipped: invalid date "${date}"`)
      return
    }
    try {
      addPath(db, path, Number.parseInt(date.trim(), 10))
      imported += 1
    } catch (err) {
      logSkipped(errors, `paths[${index}] failed: ${ensureError(err).message}`)
    }
  })

  return { imported, skipped: records.length - imported, errors }
}

/**
 * Adds shortcut records, replacing shortcuts with the same name.
 */
export function importShortcutRecords(db: Db, records: readonly unknown[]): ImportReport {
  const errors: string[] = []
  let imported = 0

  records.forEach((record, index) => {
    const parsed = ShortcutRecordSchema.safeParse(record)
    if (!parsed.success) {
      logSkipped(errors, `shortcuts[${index}] skipped: ${describeIssues(parsed.error)}`)
      return
    }
    const { name, path, description } = parsed.data
    try {
      addShortcut(db, name, path, description)
      imported += 1
    } catch (err) {
      logSkipped(errors, `shortcuts[${index}] failed: ${ensureError(err).message}`)
    }
  })

  return { imported, skipped: records.length - imported, errors }
}

/**
 * Imports the `paths` array of a JSON or TOML file.
 *
 * @throws ImportError when the file is unusable as a whole
 */
export function importPathsFile(db: Db, filePath: string): ImportReport {
  const parsed = PathsFileSchema.safeParse(readImportFile(filePath))
  if (!parsed.success) {
    throw ImportError.malformed(filePath, 'expected a "paths" array')
  }
  return importPathRecords(db, parsed.data.paths)
}

/**
 * Imports the `shortcuts` array of a JSON or TOML file.
 *
 * @throws ImportError when the file is unusable as a whole
 */
export function importShortcutsFile(db: Db, filePath: string): ImportReport {
  const parsed = ShortcutsFileSchema.safeParse(readImportFile(filePath))
  if (!parsed.success) {
    throw ImportError.malformed(filePath, 'expected a "shortcuts" array')
  }
  return importShortcutRecords(db, parsed.data.shortcuts)
}

// ============================================================================
// Export
// ============================================================================

/**
 * The current path set, oldest first, in import format.
 */
export function exportPaths(db: Db): { paths: PathRecord[] } {
  return {
    paths: listAllPaths(db).map(entry => ({ date: String(entry.date), path: entry.path })),
  }
}

/**
 * All shortcuts in import format.
 */
export function exportShortcuts(db: Db): { shortcuts: ShortcutRecord[] } {
  return {
    shortcuts: listAllShortcuts(db).map(shortcut => ({
      name: shortcut.name,
      path: shortcut.path,
      ...(shortcut.description !== null ? { description: shortcut.description } : {}),
    })),
  }
}
