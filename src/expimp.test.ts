/**
 * Tests for bulk import and export.
 *
 * @module expimp.test
 */

import { describe, test, expect, beforeEach, afterEach, vi } from 'vitest'
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { closeDatabase, openDatabase, type Db } from './db.js'
import { ImportError } from './errors.js'
import {
  exportPaths,
  exportShortcuts,
  importPathRecords,
  importPathsFile,
  importShortcutsFile,
} from './expimp.js'
import { addPath, listAllPaths, listPathHistory } from './paths.js'
import { addShortcut, listAllShortcuts } from './shortcuts.js'

// ============================================================================
// Test Utilities
// ============================================================================

let tempDir: string
let db: Db

beforeEach(() => {
  tempDir = mkdtempSync(join(tmpdir(), 'dirhop-expimp-test-'))
  db = openDatabase(':memory:')
  vi.spyOn(console, 'warn').mockImplementation(() => {})
})

afterEach(() => {
  closeDatabase(db)
  vi.restoreAllMocks()
  try {
    rmSync(tempDir, { recursive: true })
  } catch {
    // Ignore cleanup errors
  }
})

function writeFile(name: string, content: string): string {
  const filePath = join(tempDir, name)
  writeFileSync(filePath, content)
  return filePath
}

const settings = {
  includeShortcuts: true,
  smartSuggestions: { active: false, depth: 5, count: 3 },
  homeDir: '/home/tester',
}

// ============================================================================
// Import
// ============================================================================

describe('importPathsFile', () => {
  test('imports valid JSON records and skips bad ones', () => {
    const filePath = writeFile(
      'paths.json',
      JSON.stringify({
        paths: [
          { date: '100', path: '/a' },
          { date: 200, path: '/b' },
          { date: 'yesterday', path: '/c' },
          { path: '/d' },
        ],
      })
    )

    const report = importPathsFile(db, filePath)

    expect(report.imported).toBe(2)
    expect(report.skipped).toBe(2)
    expect(report.errors[0]).toBe('paths[2] skipped: invalid date "yesterday"')
    expect(report.errors[1]?.startsWith('paths[3] skipped: ')).toBe(true)
    expect(console.warn).toHaveBeenCalledWith('[dirhop] paths[2] skipped: invalid date "yesterday"')
    expect(listAllPaths(db).map(e => [e.path, e.date])).toEqual([
      ['/a', 100],
      ['/b', 200],
    ])
  })

  test('imports TOML arrays of tables into both tables', () => {
    const filePath = writeFile(
      'paths.toml',
      `[[paths]]
date = "100"
path = "/t"

[[paths]]
date = "150"
path = "/t"
`
    )

    expect(importPathsFile(db, filePath)).toEqual({ imported: 2, skipped: 0, errors: [] })
    expect(listAllPaths(db).map(e => [e.path, e.date])).toEqual([['/t', 150]])
    expect(listPathHistory(db, { offset: 0, limit: 10, filter: '' }, settings)).toHaveLength(2)
  })

  test('rejects unusable files as a whole', () => {
    expect(() => importPathsFile(db, join(tempDir, 'absent.json'))).toThrow(ImportError)
    expect(() => importPathsFile(db, writeFile('paths.yaml', 'paths: []'))).toThrow(
      'unsupported extension ".yaml"'
    )
    expect(() => importPathsFile(db, writeFile('broken.json', '{'))).toThrow(ImportError)
    expect(() => importPathsFile(db, writeFile('other.json', '{"dirs": []}'))).toThrow(
      'expected a "paths" array'
    )
  })
})

describe('importShortcutsFile', () => {
  test('adds shortcuts and replaces existing names', () => {
    addShortcut(db, 'web', '/old')
    const filePath = writeFile(
      'shortcuts.toml',
      `[[shortcuts]]
name = "web"
path = "/srv/www"
description = "site"

[[shortcuts]]
name = "tmp"
path = "/tmp"

[[shortcuts]]
name = ""
path = "/nowhere"
`
    )

    const report = importShortcutsFile(db, filePath)

    expect(report.imported).toBe(2)
    expect(report.skipped).toBe(1)
    expect(listAllShortcuts(db).map(s => [s.name, s.path, s.description])).toEqual([
      ['tmp', '/tmp', null],
      ['web', '/srv/www', 'site'],
    ])
  })
})

describe('importPathRecords', () => {
  test('accepts an empty batch', () => {
    expect(importPathRecords(db, [])).toEqual({ imported: 0, skipped: 0, errors: [] })
  })
})

// ============================================================================
// Export
// ============================================================================

describe('export', () => {
  test('writes paths oldest first with string dates', () => {
    addPath(db, '/b', 20)
    addPath(db, '/a', 10)

    expect(exportPaths(db)).toEqual({
      paths: [
        { date: '10', path: '/a' },
        { date: '20', path: '/b' },
      ],
    })
  })

  test('omits missing shortcut descriptions', () => {
    addShortcut(db, 'b', '/b', 'bee')
    addShortcut(db, 'a', '/a')

    expect(exportShortcuts(db)).toEqual({
      shortcuts: [
        { name: 'a', path: '/a' },
        { name: 'b', path: '/b', description: 'bee' },
      ],
    })
  })

  test('an export file imports back into an empty store', () => {
    addPath(db, '/x', 5)
    addShortcut(db, 'x', '/x', 'ex')
    const pathsFile = writeFile('out-paths.json', JSON.stringify(exportPaths(db)))
    const shortcutsFile = writeFile('out-shortcuts.json', JSON.stringify(exportShortcuts(db)))

    const other = openDatabase(':memory:')
    try {
      importPathsFile(other, pathsFile)
      importShortcutsFile(other, shortcutsFile)
      expect(exportPaths(other)).toEqual(exportPaths(db))
      expect(exportShortcuts(other)).toEqual(exportShortcuts(db))
    } finally {
      closeDatabase(other)
    }
  })
})
