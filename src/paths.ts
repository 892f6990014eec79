/**
 * Path index: the current path set and the append-only history log.
 *
 * The current set holds one row per distinct path with its latest visit.
 * The history log gets one row per visit and is never rewritten by
 * navigation. Every listed entry is decorated with its most specific
 * shortcut.
 *
 * @module paths
 */

import { sep } from 'node:path'
import { escapeLikePattern, inTransaction, toDatabaseError, type Db } from './db.js'
import { fuzzyScoreTokens } from './fuzzy.js'
import { ancestorShortcuts, assignShortcut, assignShortcuts } from './resolver.js'
import { listAllShortcuts } from './shortcuts.js'
import { suggestNextPaths } from './smart.js'
import type { ListRequest, PathEntry, SearchSettings, Shortcut } from './types.js'
import { debugLog, nowSeconds } from './utils.js'

interface PathRow {
  id: number
  path: string
  date: number
}

const ORDER_BY = 'ORDER BY date DESC, id DESC'

function toEntry(row: PathRow): PathEntry {
  return { id: row.id, path: row.path, date: row.date, isPredicted: false }
}

// ============================================================================
// Mutations
// ============================================================================

/**
 * Records a visit of `path`.
 *
 * Replaces the current-set row for the path and appends to the history
 * log, atomically.
 *
 * @param db - Open database connection
 * @param path - Visited directory
 * @param date - Visit time in epoch seconds (default: now)
 * @throws DatabaseError if any write fails; nothing is kept in that case
 */
export function addPath(db: Db, path: string, date: number = nowSeconds()): void {
  debugLog('paths', `add path=${path} date=${date}`)
  try {
    const remove = db.prepare('DELETE FROM paths WHERE path = ?')
    const insert = db.prepare('INSERT INTO paths (path, date) VALUES (?, ?)')
    const append = db.prepare('INSERT INTO paths_history (path, date) VALUES (?, ?)')
    inTransaction(db, () => {
      remove.run(path)
      insert.run(path, date)
      append.run(path, date)
    })
  } catch (err) {
    throw toDatabaseError(err)
  }
}

/**
 * Removes a row from the current set. History is untouched and unknown
 * ids are a no-op.
 */
export function deletePath(db: Db, id: number): void {
  try {
    db.prepare('DELETE FROM paths WHERE id = ?').run(id)
  } catch (err) {
    throw toDatabaseError(err)
  }
}

// ============================================================================
// Exact Listing
// ============================================================================

function selectExact(
  db: Db,
  table: 'paths' | 'paths_history',
  offset: number,
  limit: number,
  filter: string,
  includeShortcuts: boolean
): PathRow[] {
  if (limit <= 0) {
    return []
  }
  if (filter === '') {
    return db
      .prepare<[number, number], PathRow>(
        `SELECT id, path, date FROM ${table} ${ORDER_BY} LIMIT ? OFFSET ?`
      )
      .all(limit, offset)
  }

  const like = `%${escapeLikePattern(filter)}%`
  const shortcutClause = includeShortcuts
    ? `OR EXISTS (
         SELECT 1 FROM shortcuts s
         WHERE (s.name LIKE @like ESCAPE '\\' OR s.description LIKE @like ESCAPE '\\')
           AND (t.path = s.path OR substr(t.path, 1, length(s.path) + 1) = s.path || @sep)
       )`
    : ''
  // Same boundary as isAncestorPath
  const params = includeShortcuts ? { like, limit, offset, sep } : { like, limit, offset }

  return db
    .prepare<{ like: string; limit: number; offset: number; sep?: string }, PathRow>(
      `SELECT t.id AS id, t.path AS path, t.date AS date FROM ${table} t
       WHERE t.path LIKE @like ESCAPE '\\' ${shortcutClause}
       ORDER BY t.date DESC, t.id DESC
       LIMIT @limit OFFSET @offset`
    )
    .all(params)
}

function mostRecentPath(db: Db): string | undefined {
  const row = db
    .prepare<[], { path: string }>(`SELECT path FROM paths ${ORDER_BY} LIMIT 1`)
    .get()
  return row?.path
}

/**
 * Exact listing. With an empty filter and smart suggestions on, the
 * predicted entries come first, reversed so the best guess sits right
 * above the most recent real entry; pages after the first skip however
 * many predictions were already shown.
 */
function listPathsExact(
  db: Db,
  request: ListRequest,
  settings: SearchSettings,
  shortcuts: readonly Shortcut[]
): PathEntry[] {
  const { offset, limit, filter } = request
  const smart = settings.smartSuggestions

  let predicted: PathEntry[] = []
  if (filter === '' && smart.active && smart.depth > 0 && smart.count > 0) {
    const current = mostRecentPath(db)
    if (current !== undefined) {
      predicted = suggestNextPaths(
        db,
        current,
        { depth: smart.depth, count: smart.count, homeDir: settings.homeDir },
        shortcuts
      ).reverse()
    }
  }

  let head: PathEntry[] = []
  let realOffset = offset - predicted.length
  let realLimit = limit
  if (offset < predicted.length) {
    head = predicted.slice(offset, offset + limit)
    realOffset = 0
    realLimit = limit - head.length
  }

  const rows = selectExact(db, 'paths', realOffset, realLimit, filter, settings.includeShortcuts)
  return [...head, ...assignShortcuts(rows.map(toEntry), shortcuts)]
}

// ============================================================================
// Fuzzy Listing
// ============================================================================

/**
 * Best score of a path: the path alone, or the path with the name and
 * description of any shortcut covering it.
 */
function scorePath(
  filter: string,
  path: string,
  shortcuts: readonly Shortcut[],
  includeShortcuts: boolean
): number {
  let best = fuzzyScoreTokens(filter, path)
  if (!includeShortcuts) {
    return best
  }
  for (const shortcut of ancestorShortcuts(path, shortcuts)) {
    const text = [path, shortcut.name, shortcut.description]
      .filter((part): part is string => Boolean(part))
      .join(' ')
    best = Math.max(best, fuzzyScoreTokens(filter, text))
  }
  return best
}

function listPathsFuzzy(
  db: Db,
  request: ListRequest,
  settings: SearchSettings,
  shortcuts: readonly Shortcut[]
): PathEntry[] {
  const { offset, limit, filter } = request
  if (limit <= 0) {
    return []
  }
  const entries = db
    .prepare<[], PathRow>(`SELECT id, path, date FROM paths ${ORDER_BY}`)
    .all()
    .map(toEntry)

  if (filter.trim() === '') {
    return assignShortcuts(entries.slice(offset, offset + limit), shortcuts)
  }

  return entries
    .map(entry => ({
      entry,
      score: scorePath(filter, entry.path, shortcuts, settings.includeShortcuts),
    }))
    .filter(scored => scored.score >= 0)
    .sort((a, b) => b.score - a.score)
    .slice(offset, offset + limit)
    .map(scored => assignShortcut(scored.entry, shortcuts))
}

// ============================================================================
// Public Listing
// ============================================================================

/**
 * Lists current paths page by page.
 *
 * @param db - Open database connection
 * @param request - Window, filter text and matching mode
 * @param settings - Query settings snapshot for this call
 * @returns Entries decorated with their shortcuts
 * @throws DatabaseError if a query fails
 *
 * @example
 * ```ts
 * listPaths(db, { offset: 0, limit: 10, filter: 'src', fuzzy: false }, settings)
 * ```
 */
export function listPaths(db: Db, request: ListRequest, settings: SearchSettings): PathEntry[] {
  debugLog(
    'paths',
    `list offset=${request.offset} limit=${request.limit} filter=${request.filter} fuzzy=${request.fuzzy}`
  )
  try {
    const shortcuts = listAllShortcuts(db)
    return request.fuzzy
      ? listPathsFuzzy(db, request, settings, shortcuts)
      : listPathsExact(db, request, settings, shortcuts)
  } catch (err) {
    throw toDatabaseError(err)
  }
}

/**
 * Lists the history log, newest first. Same filtering as the exact
 * listing, without predictions.
 *
 * @throws DatabaseError if the query fails
 */
export function listPathHistory(
  db: Db,
  request: Omit<ListRequest, 'fuzzy'>,
  settings: SearchSettings
): PathEntry[] {
  try {
    const shortcuts = listAllShortcuts(db)
    const rows = selectExact(
      db,
      'paths_history',
      request.offset,
      request.limit,
      request.filter,
      settings.includeShortcuts
    )
    return assignShortcuts(rows.map(toEntry), shortcuts)
  } catch (err) {
    throw toDatabaseError(err)
  }
}

/**
 * The `count` most recent current paths, without predictions.
 */
export function listRecentPaths(db: Db, count: number): PathEntry[] {
  try {
    const shortcuts = listAllShortcuts(db)
    const rows = selectExact(db, 'paths', 0, count, '', false)
    return assignShortcuts(rows.map(toEntry), shortcuts)
  } catch (err) {
    throw toDatabaseError(err)
  }
}

/**
 * The whole current set, oldest first. Used by export.
 */
export function listAllPaths(db: Db): PathEntry[] {
  try {
    return db
      .prepare<[], PathRow>('SELECT id, path, date FROM paths ORDER BY date ASC, id ASC')
      .all()
      .map(toEntry)
  } catch (err) {
    throw toDatabaseError(err)
  }
}
