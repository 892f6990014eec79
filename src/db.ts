/**
 * Database layer for dirhop.
 *
 * Opens the SQLite store and brings its schema to the current version.
 * Migration payloads live as SQL files in `dbschema/`: `current.sql`
 * builds a fresh database, and `<v>.sql` upgrades version v to v+1.
 *
 * @module db
 */

import Database from 'better-sqlite3'
import { existsSync, mkdirSync, readFileSync } from 'node:fs'
import { dirname, join } from 'node:path'
import { fileURLToPath } from 'node:url'
import {
  DatabaseError,
  ErrorPatterns,
  MigrationError,
  ensureError,
  isMigrationError,
  matchesErrorPattern,
} from './errors.js'
import { debugLog } from './utils.js'

export type Db = Database.Database

// ============================================================================
// Constants
// ============================================================================

/** Schema version this release writes and reads */
export const SCHEMA_VERSION = 2

const IN_MEMORY = ':memory:'

// ============================================================================
// Migration Scripts
// ============================================================================

/**
 * Locates the `dbschema` directory by walking up from this module, so the
 * lookup works both from sources and from the compiled `dist/` tree.
 */
export function findSchemaDir(): string {
  let dir = dirname(fileURLToPath(import.meta.url))
  for (;;) {
    const candidate = join(dir, 'dbschema')
    if (existsSync(join(candidate, 'current.sql'))) {
      return candidate
    }
    const parent = dirname(dir)
    if (parent === dir) {
      throw MigrationError.scriptMissing(join('dbschema', 'current.sql'), SCHEMA_VERSION)
    }
    dir = parent
  }
}

function readScript(schemaDir: string, fileName: string, version: number): string {
  const scriptPath = join(schemaDir, fileName)
  try {
    return readFileSync(scriptPath, 'utf-8')
  } catch (err) {
    throw MigrationError.scriptMissing(
      scriptPath,
      version,
      err instanceof Error ? err : new Error(String(err))
    )
  }
}

// ============================================================================
// Schema Versioning
// ============================================================================

/**
 * Checks if a table exists in the database.
 */
function tableExists(db: Db, tableName: string): boolean {
  const result = db
    .prepare<[string], { count: number }>(
      "SELECT COUNT(*) as count FROM sqlite_master WHERE type='table' AND name = ?"
    )
    .get(tableName)
  return (result?.count ?? 0) > 0
}

/**
 * Reads the applied schema version.
 *
 * A missing or empty version table reads as 0, the oldest schema.
 */
export function getSchemaVersion(db: Db): number {
  if (!tableExists(db, 'version')) {
    return 0
  }
  try {
    const row = db
      .prepare<[], { version: number | null }>('SELECT MAX(version) as version FROM version')
      .get()
    return row?.version ?? 0
  } catch (err) {
    debugLog('db', 'Unreadable version table, assuming version 0', err)
    return 0
  }
}

function columnExists(db: Db, table: string, column: string): boolean {
  return db
    .prepare<[], { name: string }>(`PRAGMA table_info(${table})`)
    .all()
    .some(row => row.name === column)
}

/**
 * Columns an upgrade step adds, keyed by the version it upgrades from.
 * Applied before that step's script, and skipped when already present.
 */
const ADDED_COLUMNS: Readonly<
  Record<number, ReadonlyArray<{ table: string; column: string; type: string }>>
> = {
  0: [{ table: 'shortcuts', column: 'description', type: 'TEXT' }],
}

function addMissingColumns(db: Db, version: number): void {
  for (const { table, column, type } of ADDED_COLUMNS[version] ?? []) {
    if (!columnExists(db, table, column)) {
      db.exec(`ALTER TABLE ${table} ADD COLUMN ${column} ${type}`)
    }
  }
}

function stampVersion(db: Db, version: number): void {
  db.exec('DELETE FROM version')
  db.prepare('INSERT INTO version (version) VALUES (?)').run(version)
}

/**
 * Brings the schema to SCHEMA_VERSION.
 *
 * An empty database gets `current.sql`. Otherwise every upgrade script
 * from the stored version up runs once, in order. All of it happens in
 * one transaction; any failure rolls back and throws a MigrationError.
 * Steps are safe to repeat, so a database that lost its version row
 * replays the whole chain from 0.
 *
 * @param db - Open database connection
 * @param schemaDir - Directory holding the SQL scripts
 * @throws MigrationError (fatal) on any read, parse or execution failure
 */
export function migrateSchema(db: Db, schemaDir: string = findSchemaDir()): void {
  const fresh = !tableExists(db, 'paths')
  const from = fresh ? SCHEMA_VERSION : getSchemaVersion(db)

  if (!fresh && from === SCHEMA_VERSION) {
    return
  }
  if (from > SCHEMA_VERSION) {
    throw MigrationError.unsupportedVersion(from, SCHEMA_VERSION)
  }

  // Read every script before touching the database
  const scripts: Array<{ version: number; sql: string }> = []
  if (fresh) {
    scripts.push({ version: 0, sql: readScript(schemaDir, 'current.sql', 0) })
  } else {
    for (let version = from; version < SCHEMA_VERSION; version++) {
      scripts.push({ version, sql: readScript(schemaDir, `${version}.sql`, version) })
    }
  }

  db.exec('BEGIN IMMEDIATE')
  try {
    for (const script of scripts) {
      debugLog('db', fresh ? 'Creating schema' : `Upgrading schema from version ${script.version}`)
      try {
        if (!fresh) {
          addMissingColumns(db, script.version)
        }
        db.exec(script.sql)
      } catch (err) {
        throw MigrationError.scriptFailed(
          script.version,
          err instanceof Error ? err : new Error(String(err))
        )
      }
    }
    stampVersion(db, SCHEMA_VERSION)
    db.exec('COMMIT')
  } catch (err) {
    db.exec('ROLLBACK')
    if (isMigrationError(err)) {
      throw err
    }
    throw MigrationError.scriptFailed(from, err instanceof Error ? err : new Error(String(err)))
  }
}

// ============================================================================
// Database Operations
// ============================================================================

/**
 * Options for opening the store.
 */
export interface OpenDatabaseOptions {
  /** Directory holding the migration scripts (default: bundled dbschema/) */
  readonly schemaDir?: string
}

/**
 * Opens or creates the SQLite database and migrates its schema.
 *
 * @param dbPath - Path to the database file, or ":memory:"
 * @param options - Open options
 * @returns Open database connection
 * @throws MigrationError if the schema cannot be brought up to date (fatal)
 * @throws DatabaseError if the database cannot be opened
 *
 * @example
 * ```ts
 * const db = openDatabase(config.db_path)
 * try {
 *   addPath(db, '/home/me/src')
 * } finally {
 *   closeDatabase(db)
 * }
 * ```
 */
export function openDatabase(
  dbPath: string,
  options: OpenDatabaseOptions = {}
): Db {
  let db: Db
  try {
    if (dbPath !== IN_MEMORY) {
      mkdirSync(dirname(dbPath), { recursive: true })
    }
    db = new Database(dbPath)
    db.pragma('journal_mode = WAL')
  } catch (err) {
    if (matchesErrorPattern(err, ErrorPatterns.DATABASE_LOCKED)) {
      throw DatabaseError.locked(dbPath)
    }
    throw DatabaseError.connectionFailed(
      dbPath,
      err instanceof Error ? err : new Error(String(err))
    )
  }

  try {
    migrateSchema(db, options.schemaDir)
  } catch (err) {
    if (isMigrationError(err)) {
      closeDatabase(db)
      throw err
    }
    const version = getSchemaVersion(db)
    closeDatabase(db)
    throw MigrationError.scriptFailed(version, err instanceof Error ? err : new Error(String(err)))
  }

  return db
}

/**
 * Closes the database connection.
 *
 * @param db - Database connection to close
 */
export function closeDatabase(db: Db): void {
  try {
    db.close()
  } catch (err) {
    console.warn(
      '[dirhop] Warning closing database:',
      err instanceof Error ? err.message : String(err)
    )
  }
}

/**
 * Runs `fn` inside an immediate transaction, rolling back on failure.
 */
export function inTransaction<T>(db: Db, fn: () => T): T {
  db.exec('BEGIN IMMEDIATE')
  try {
    const result = fn()
    db.exec('COMMIT')
    return result
  } catch (err) {
    db.exec('ROLLBACK')
    throw err
  }
}

/**
 * Wraps an unknown failure from a query as a DatabaseError.
 */
export function toDatabaseError(err: unknown): DatabaseError {
  if (err instanceof DatabaseError) {
    return err
  }
  const cause = ensureError(err)
  if (matchesErrorPattern(cause, ErrorPatterns.DATABASE_CLOSED)) {
    return DatabaseError.closed(cause)
  }
  if (matchesErrorPattern(cause, ErrorPatterns.DATABASE_CORRUPT)) {
    return DatabaseError.corrupt(cause)
  }
  return DatabaseError.fromSqliteError(cause)
}

/**
 * Escapes special characters for SQLite LIKE queries.
 *
 * In LIKE patterns, '%' and '_' are wildcards, and '\' is the escape character.
 */
export function escapeLikePattern(value: string): string {
  return value.replace(/[\\%_]/g, match => `\\${match}`)
}
