import { afterEach, describe, expect, test, vi } from 'vitest'
import {
  EXIT_ERROR,
  EXIT_FATAL,
  error,
  exitCodeFor,
  info,
  output,
  parseArgv,
  reportFailure,
  type OutputOptions,
} from './core.js'
import { ConfigError, DatabaseError, ImportError, MigrationError } from '../errors.js'

const plain: OutputOptions = { json: false, quiet: false, noColor: true, debug: false }

afterEach(() => {
  vi.restoreAllMocks()
})

describe('parseArgv', () => {
  test('extracts global flags anywhere in argv', () => {
    const parsed = parseArgv(['paths', '--json', 'src', '-q', '--debug', '--no-color'])

    expect(parsed.flags).toEqual({ json: true, quiet: true, noColor: true, debug: true })
    expect(parsed.command).toBe('paths')
    expect(parsed.args).toEqual(['src'])
    expect(parsed.help).toBe(false)
  })

  test('recognises help and version in any position', () => {
    expect(parseArgv(['help']).help).toBe(true)
    expect(parseArgv(['paths', '-h']).help).toBe(true)
    expect(parseArgv(['-v'])).toMatchObject({ version: true, command: undefined, args: [] })
  })
})

describe('failures', () => {
  test('only migration errors are fatal', () => {
    expect(exitCodeFor(MigrationError.unsupportedVersion(9, 2))).toBe(EXIT_FATAL)
    expect(exitCodeFor(ImportError.unreadable('/tmp/x.json'))).toBe(EXIT_ERROR)
    expect(exitCodeFor(ConfigError.validationError('bad'))).toBe(EXIT_ERROR)
    expect(exitCodeFor(DatabaseError.locked('/tmp/db'))).toBe(EXIT_ERROR)
    expect(exitCodeFor('boom')).toBe(EXIT_ERROR)
  })

  test('reportFailure prints the cause of migration errors and the code in json', () => {
    const err = vi.spyOn(console, 'error').mockImplementation(() => {})
    const cause = new Error('duplicate column name: description')

    expect(reportFailure(MigrationError.scriptFailed(0, cause), plain)).toBe(EXIT_FATAL)
    expect(reportFailure(ImportError.unreadable('/tmp/x.json', cause), { ...plain, json: true })).toBe(
      EXIT_ERROR
    )

    expect(err).toHaveBeenNthCalledWith(
      1,
      'dirhop: MigrationError [MIGRATION_ERROR]: Migration from schema version 0 failed\n  Caused by: duplicate column name: description'
    )
    expect(err).toHaveBeenNthCalledWith(
      2,
      '{"error":"Cannot read import file /tmp/x.json","code":"IMPORT_ERROR"}'
    )
  })

  test('reportFailure shows the cause of other errors only with --debug', () => {
    const err = vi.spyOn(console, 'error').mockImplementation(() => {})
    const failure = DatabaseError.fromSqliteError(new Error('disk I/O error'))

    reportFailure(failure, plain)
    reportFailure(failure, { ...plain, debug: true })

    expect(err).toHaveBeenNthCalledWith(1, 'dirhop: SQLite error: disk I/O error')
    expect(err).toHaveBeenNthCalledWith(
      2,
      'dirhop: DatabaseError [DATABASE_ERROR]: SQLite error: disk I/O error\n  Caused by: disk I/O error'
    )
  })
})

describe('output helpers', () => {
  test('output prints JSON in json mode and nothing when quiet', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {})

    output({ a: 1 }, { ...plain, json: true })
    output('hidden', { ...plain, quiet: true })

    expect(log).toHaveBeenCalledTimes(1)
    expect(log).toHaveBeenCalledWith('{\n  "a": 1\n}')
  })

  test('error prefixes the program name', () => {
    const err = vi.spyOn(console, 'error').mockImplementation(() => {})

    error('bad', plain)
    error('bad', { ...plain, json: true })

    expect(err).toHaveBeenNthCalledWith(1, 'dirhop: bad')
    expect(err).toHaveBeenNthCalledWith(2, '{"error":"bad"}')
  })

  test('info is suppressed in json mode', () => {
    const err = vi.spyOn(console, 'error').mockImplementation(() => {})

    info('note', { ...plain, json: true })
    info('note', plain)

    expect(err).toHaveBeenCalledTimes(1)
  })
})
