/**
 * Main entry point for the dirhop library.
 *
 * Exposes a `createNavigator` factory that records visited directories,
 * manages shortcuts and answers ranked, paginated queries.
 *
 * @module index
 *
 * @example
 * ```ts
 * import { createNavigator } from './index.js'
 *
 * const nav = createNavigator()
 *
 * nav.addPath('/home/me/src/app')
 * nav.addShortcut('app', '/home/me/src/app', 'main project')
 *
 * // First page, predictions included
 * const page = nav.listPaths(0, 10, '', false)
 *
 * // Interactive window over the same data
 * const cache = nav.createPathCache()
 * cache.updateFilter(10, 'app', true)
 *
 * nav.close()
 * ```
 */

import { WindowedResultCache } from './cache.js'
import { loadConfig, toSearchSettings, type Config } from './config.js'
import { closeDatabase, openDatabase, type Db } from './db.js'
import {
  exportPaths as dbExportPaths,
  exportShortcuts as dbExportShortcuts,
  importPathsFile,
  importShortcutsFile,
  type PathRecord,
  type ShortcutRecord,
} from './expimp.js'
import {
  addPath as dbAddPath,
  deletePath as dbDeletePath,
  listPathHistory as dbListPathHistory,
  listPaths as dbListPaths,
  listRecentPaths as dbListRecentPaths,
} from './paths.js'
import { prettyPath, type PrettyPathOptions } from './pretty.js'
import {
  addShortcut as dbAddShortcut,
  deleteShortcut as dbDeleteShortcut,
  deleteShortcutById as dbDeleteShortcutById,
  findShortcut as dbFindShortcut,
  listAllShortcuts as dbListAllShortcuts,
  listShortcuts as dbListShortcuts,
} from './shortcuts.js'
import { suggestNextPaths } from './smart.js'
import type {
  DataStateListener,
  ImportReport,
  ListSource,
  PathEntry,
  SearchSettings,
  Shortcut,
} from './types.js'
import { getHomeDir } from './utils.js'

// ============================================================================
// Type Definitions
// ============================================================================

/**
 * Options for creating a navigator instance.
 */
export interface NavigatorOptions {
  /** Path to the TOML config file (default: $XDG_CONFIG_HOME/dirhop/config.toml) */
  readonly configPath?: string
  /** Already loaded configuration; takes precedence over configPath */
  readonly config?: Config
  /** Path to the SQLite database (default: config db_path) */
  readonly dbPath?: string
  /** Directory holding the migration scripts */
  readonly schemaDir?: string
  /** Home directory, never suggested (default: $HOME) */
  readonly homeDir?: string
}

/**
 * Options for a single suggestion run. Omitted values come from config.
 */
export interface SuggestRequest {
  readonly depth?: number
  readonly count?: number
}

/**
 * Navigator interface for recording visits and querying directories.
 */
export interface Navigator {
  /** List source over the current path set */
  readonly pathSource: ListSource<PathEntry>
  /** List source over shortcuts */
  readonly shortcutSource: ListSource<Shortcut>

  addPath(path: string, date?: number): void
  deletePath(id: number): void
  listPaths(offset: number, limit: number, filter: string, fuzzy: boolean): PathEntry[]
  listPathHistory(offset: number, limit: number, filter: string): PathEntry[]
  listRecentPaths(count: number): PathEntry[]
  /** Predictions after `matchPath` (default: the most recent path) */
  suggest(matchPath?: string, request?: SuggestRequest): PathEntry[]

  addShortcut(name: string, path: string, description?: string | null): void
  deleteShortcut(name: string): void
  deleteShortcutById(id: number): void
  findShortcut(name: string): Shortcut | undefined
  listShortcuts(offset: number, limit: number, filter: string, fuzzy: boolean): Shortcut[]
  listAllShortcuts(): Shortcut[]

  importPaths(filePath: string): ImportReport
  importShortcuts(filePath: string): ImportReport
  exportPaths(): { paths: PathRecord[] }
  exportShortcuts(): { shortcuts: ShortcutRecord[] }

  prettyPath(path: string, options?: Partial<PrettyPathOptions>): string

  createPathCache(listener?: DataStateListener): WindowedResultCache<PathEntry>
  createShortcutCache(listener?: DataStateListener): WindowedResultCache<Shortcut>

  /** Settings snapshot the next query will use */
  settings(): SearchSettings
  /** Closes the database connection */
  close(): void
}

// ============================================================================
// Implementation
// ============================================================================

/**
 * Navigator backed by one SQLite connection.
 */
class NavigatorImpl implements Navigator {
  readonly pathSource: ListSource<PathEntry>
  readonly shortcutSource: ListSource<Shortcut>
  private readonly db: Db
  private readonly config: Config
  private readonly homeDir: string

  constructor(db: Db, config: Config, homeDir: string) {
    this.db = db
    this.config = config
    this.homeDir = homeDir
    this.pathSource = {
      list: (offset, limit, filter, fuzzy) => this.listPaths(offset, limit, filter, fuzzy),
    }
    this.shortcutSource = {
      list: (offset, limit, filter, fuzzy) => this.listShortcuts(offset, limit, filter, fuzzy),
    }
  }

  settings(): SearchSettings {
    return toSearchSettings(this.config, this.homeDir)
  }

  addPath(path: string, date?: number): void {
    dbAddPath(this.db, path, date)
  }

  deletePath(id: number): void {
    dbDeletePath(this.db, id)
  }

  listPaths(offset: number, limit: number, filter: string, fuzzy: boolean): PathEntry[] {
    return dbListPaths(this.db, { offset, limit, filter, fuzzy }, this.settings())
  }

  listPathHistory(offset: number, limit: number, filter: string): PathEntry[] {
    return dbListPathHistory(this.db, { offset, limit, filter }, this.settings())
  }

  listRecentPaths(count: number): PathEntry[] {
    return dbListRecentPaths(this.db, count)
  }

  suggest(matchPath?: string, request: SuggestRequest = {}): PathEntry[] {
    const settings = this.settings()
    const anchor = matchPath ?? this.listRecentPaths(1)[0]?.path
    if (anchor === undefined) {
      return []
    }
    return suggestNextPaths(
      this.db,
      anchor,
      {
        depth: request.depth ?? settings.smartSuggestions.depth,
        count: request.count ?? settings.smartSuggestions.count,
        homeDir: settings.homeDir,
      },
      this.listAllShortcuts()
    )
  }

  addShortcut(name: string, path: string, description?: string | null): void {
    dbAddShortcut(this.db, name, path, description)
  }

  deleteShortcut(name: string): void {
    dbDeleteShortcut(this.db, name)
  }

  deleteShortcutById(id: number): void {
    dbDeleteShortcutById(this.db, id)
  }

  findShortcut(name: string): Shortcut | undefined {
    return dbFindShortcut(this.db, name)
  }

  listShortcuts(offset: number, limit: number, filter: string, fuzzy: boolean): Shortcut[] {
    return dbListShortcuts(this.db, { offset, limit, filter, fuzzy })
  }

  listAllShortcuts(): Shortcut[] {
    return dbListAllShortcuts(this.db)
  }

  importPaths(filePath: string): ImportReport {
    return importPathsFile(this.db, filePath)
  }

  importShortcuts(filePath: string): ImportReport {
    return importShortcutsFile(this.db, filePath)
  }

  exportPaths(): { paths: PathRecord[] } {
    return dbExportPaths(this.db)
  }

  exportShortcuts(): { shortcuts: ShortcutRecord[] } {
    return dbExportShortcuts(this.db)
  }

  prettyPath(path: string, options: Partial<PrettyPathOptions> = {}): string {
    return prettyPath(path, this.listAllShortcuts(), {
      width: options.width ?? this.config.display.max_width,
      homeDir: options.homeDir ?? this.homeDir,
      style: options.style,
    })
  }

  createPathCache(listener?: DataStateListener): WindowedResultCache<PathEntry> {
    return new WindowedResultCache('paths', this.pathSource, listener)
  }

  createShortcutCache(listener?: DataStateListener): WindowedResultCache<Shortcut> {
    return new WindowedResultCache('shortcuts', this.shortcutSource, listener)
  }

  close(): void {
    closeDatabase(this.db)
  }
}

// ============================================================================
// Factory
// ============================================================================

/**
 * Creates a navigator, loading config and opening (and migrating) the store.
 *
 * @param options - Config, database and home directory overrides
 * @returns A ready navigator; call `close()` when done
 * @throws ConfigError if the config file is invalid
 * @throws MigrationError if the schema cannot be migrated (fatal)
 * @throws DatabaseError if the database cannot be opened
 */
export function createNavigator(options: NavigatorOptions = {}): Navigator {
  const config = options.config ?? loadConfig(options.configPath)
  const dbPath = options.dbPath ?? config.db_path
  const db = openDatabase(dbPath, { schemaDir: options.schemaDir })
  return new NavigatorImpl(db, config, options.homeDir ?? getHomeDir())
}

// ============================================================================
// Re-exports
// ============================================================================

export { WindowedResultCache } from './cache.js'
export { SmartRanker } from './smart.js'
export { assignShortcut, findShortcutFor, isAncestorPath } from './resolver.js'
export { reducePath, shortenPath } from './pretty.js'
export * from './errors.js'

export type {
  DataStateListener,
  DataStatePayload,
  ImportReport,
  ListSource,
  PathEntry,
  SearchSettings,
  Shortcut,
} from './types.js'
export type { Config } from './config.js'
export type { PathRecord, ShortcutRecord } from './expimp.js'
