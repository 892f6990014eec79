/**
 * End-to-end tests of the command dispatcher against a temporary store.
 *
 * @module cli/main.test
 */

import { afterEach, beforeEach, describe, expect, test, vi, type MockInstance } from 'vitest'
import Database from 'better-sqlite3'
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { EXIT_ERROR, EXIT_FATAL, EXIT_SUCCESS, EXIT_USAGE } from './core.js'
import { main } from './main.js'

let tempDir: string
let dbPath: string
let log: MockInstance<typeof console.log>
let err: MockInstance<typeof console.error>

beforeEach(() => {
  tempDir = mkdtempSync(join(tmpdir(), 'dirhop-cli-test-'))
  dbPath = join(tempDir, 'dirhop.db')
  const configPath = join(tempDir, 'config.toml')
  writeFileSync(configPath, `db_path = "${dbPath}"\n\n[smart_suggestions]\nactive = false\n`)
  vi.stubEnv('DIRHOP_CONFIG_PATH', configPath)
  vi.stubEnv('HOME', '/home/tester')
  log = vi.spyOn(console, 'log').mockImplementation(() => {})
  err = vi.spyOn(console, 'error').mockImplementation(() => {})
})

afterEach(() => {
  vi.unstubAllEnvs()
  vi.restoreAllMocks()
  try {
    rmSync(tempDir, { recursive: true })
  } catch {
    // Ignore cleanup errors
  }
})

function lastLog(): unknown {
  return log.mock.calls.at(-1)?.[0]
}

describe('main', () => {
  test('records and lists paths', async () => {
    expect(await main(['add-path', '/srv/www'])).toBe(EXIT_SUCCESS)
    expect(await main(['add-path', '/opt/tools'])).toBe(EXIT_SUCCESS)

    expect(await main(['paths', 'srv', '--json'])).toBe(EXIT_SUCCESS)
    const listed: unknown = JSON.parse(String(lastLog()))
    expect(listed).toMatchObject([{ path: '/srv/www', isPredicted: false }])
  })

  test('prints a shortcut path or nothing', async () => {
    await main(['add-shortcut', 'www', '/srv/www', 'public', 'site'])

    expect(await main(['print-shortcut', 'www'])).toBe(EXIT_SUCCESS)
    expect(lastLog()).toBe('/srv/www')

    log.mockClear()
    expect(await main(['print-shortcut', 'nope'])).toBe(EXIT_SUCCESS)
    expect(log).not.toHaveBeenCalled()

    await main(['shortcuts', '--json'])
    expect(JSON.parse(String(lastLog()))).toMatchObject([{ name: 'www', description: 'public site' }])
  })

  test('pretty-prints with shortcuts and home', async () => {
    await main(['add-shortcut', 'www', '/srv/www'])

    await main(['pretty-print-path', '/srv/www/blog', '--no-style'])
    expect(lastLog()).toBe('[www]/blog')

    await main(['pretty-print-path', '~/notes', '--no-style', '--max-width', '5'])
    expect(lastLog()).toBe('~/*es')
  })

  test('exports paths as JSON to a file', async () => {
    const outFile = join(tempDir, 'out.json')
    await main(['add-path', '/a'])

    expect(await main(['export-paths', outFile, '-q'])).toBe(EXIT_SUCCESS)
    const exported: unknown = JSON.parse(readFileSync(outFile, 'utf-8'))
    expect(exported).toMatchObject({ paths: [{ path: '/a' }] })
  })

  test('usage errors and unknown commands exit with 2', async () => {
    expect(await main(['delete-path', 'abc'])).toBe(EXIT_USAGE)
    expect(await main(['frobnicate'])).toBe(EXIT_USAGE)
    expect(err).toHaveBeenCalledWith('dirhop: unknown command: frobnicate')
  })

  test('a failed import exits with 1', async () => {
    expect(await main(['import-paths', join(tempDir, 'absent.json'), '--json'])).toBe(EXIT_ERROR)
  })

  test('a newer database schema is fatal', async () => {
    const raw = new Database(dbPath)
    raw.exec(`
      CREATE TABLE version (version INTEGER PRIMARY KEY);
      INSERT INTO version (version) VALUES (99);
      CREATE TABLE paths (id INTEGER PRIMARY KEY, path TEXT NOT NULL, date INTEGER NOT NULL);
    `)
    raw.close()

    expect(await main(['paths'])).toBe(EXIT_FATAL)
  })

  test('shell-init prints the shell functions', async () => {
    expect(await main(['shell-init', '--bin', '/usr/local/bin/dirhop'])).toBe(EXIT_SUCCESS)
    const script = String(lastLog())
    expect(script.startsWith("DIRHOP_BIN='/usr/local/bin/dirhop'\n")).toBe(true)
    expect(script).toContain('"$DIRHOP_BIN" add-path "$PWD"')
  })

  test('config --path honours DIRHOP_CONFIG_PATH', async () => {
    await main(['config', '--path'])
    expect(lastLog()).toBe(join(tempDir, 'config.toml'))
  })
})
