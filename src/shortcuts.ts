/**
 * Shortcut registry: named directory bookmarks.
 *
 * Names are unique; re-adding a name replaces the old bookmark.
 *
 * @module shortcuts
 */

import { escapeLikePattern, inTransaction, toDatabaseError, type Db } from './db.js'
import { fuzzyScoreTokens } from './fuzzy.js'
import type { ListRequest, Shortcut } from './types.js'
import { debugLog } from './utils.js'

interface ShortcutRow {
  id: number
  name: string
  path: string
  description: string | null
}

const SELECT_COLUMNS = 'SELECT id, name, path, description FROM shortcuts'
const ORDER_BY = 'ORDER BY name ASC, id DESC'

function toShortcut(row: ShortcutRow): Shortcut {
  return {
    id: row.id,
    name: row.name,
    path: row.path,
    description: row.description,
  }
}

// ============================================================================
// Mutations
// ============================================================================

/**
 * Binds `name` to `path`, replacing any shortcut with the same name.
 *
 * @throws DatabaseError if the write fails
 */
export function addShortcut(
  db: Db,
  name: string,
  path: string,
  description?: string | null
): void {
  debugLog('shortcuts', `add name=${name} path=${path}`)
  try {
    const remove = db.prepare('DELETE FROM shortcuts WHERE name = ?')
    const insert = db.prepare('INSERT INTO shortcuts (name, path, description) VALUES (?, ?, ?)')
    inTransaction(db, () => {
      remove.run(name)
      insert.run(name, path, description ?? null)
    })
  } catch (err) {
    throw toDatabaseError(err)
  }
}

/**
 * Deletes the shortcut called `name`. Unknown names are a no-op.
 */
export function deleteShortcut(db: Db, name: string): void {
  try {
    db.prepare('DELETE FROM shortcuts WHERE name = ?').run(name)
  } catch (err) {
    throw toDatabaseError(err)
  }
}

/**
 * Deletes a shortcut by row id. Unknown ids are a no-op.
 */
export function deleteShortcutById(db: Db, id: number): void {
  try {
    db.prepare('DELETE FROM shortcuts WHERE id = ?').run(id)
  } catch (err) {
    throw toDatabaseError(err)
  }
}

// ============================================================================
// Queries
// ============================================================================

/**
 * Looks up a shortcut by exact name.
 */
export function findShortcut(db: Db, name: string): Shortcut | undefined {
  try {
    const row = db
      .prepare<[string], ShortcutRow>(`${SELECT_COLUMNS} WHERE name = ? ORDER BY id DESC LIMIT 1`)
      .get(name)
    return row ? toShortcut(row) : undefined
  } catch (err) {
    throw toDatabaseError(err)
  }
}

/**
 * Every shortcut, ordered by name then newest first.
 */
export function listAllShortcuts(db: Db): Shortcut[] {
  try {
    return db.prepare<[], ShortcutRow>(`${SELECT_COLUMNS} ${ORDER_BY}`).all().map(toShortcut)
  } catch (err) {
    throw toDatabaseError(err)
  }
}

function listShortcutsExact(db: Db, request: ListRequest): Shortcut[] {
  const { offset, limit, filter } = request
  if (filter === '') {
    return db
      .prepare<[number, number], ShortcutRow>(`${SELECT_COLUMNS} ${ORDER_BY} LIMIT ? OFFSET ?`)
      .all(limit, offset)
      .map(toShortcut)
  }
  const like = `%${escapeLikePattern(filter)}%`
  return db
    .prepare<{ like: string; limit: number; offset: number }, ShortcutRow>(
      `${SELECT_COLUMNS}
       WHERE name LIKE @like ESCAPE '\\'
          OR path LIKE @like ESCAPE '\\'
          OR description LIKE @like ESCAPE '\\'
       ${ORDER_BY}
       LIMIT @limit OFFSET @offset`
    )
    .all({ like, limit, offset })
    .map(toShortcut)
}

function shortcutSearchText(shortcut: Shortcut): string {
  return [shortcut.name, shortcut.path, shortcut.description]
    .filter((part): part is string => Boolean(part))
    .join(' ')
}

function listShortcutsFuzzy(db: Db, request: ListRequest): Shortcut[] {
  const { offset, limit, filter } = request
  if (limit === 0) {
    return []
  }
  const all = listAllShortcuts(db)
  if (filter.trim() === '') {
    return all.slice(offset, offset + limit)
  }
  return all
    .map(shortcut => ({ shortcut, score: fuzzyScoreTokens(filter, shortcutSearchText(shortcut)) }))
    .filter(scored => scored.score >= 0)
    .sort((a, b) => b.score - a.score)
    .slice(offset, offset + limit)
    .map(scored => scored.shortcut)
}

/**
 * Lists shortcuts page by page.
 *
 * Exact mode matches name, path or description by case-insensitive
 * containment, ordered by name. Fuzzy mode scores all of them and orders
 * by score.
 *
 * @throws DatabaseError if the query fails
 */
export function listShortcuts(db: Db, request: ListRequest): Shortcut[] {
  debugLog(
    'shortcuts',
    `list offset=${request.offset} limit=${request.limit} filter=${request.filter} fuzzy=${request.fuzzy}`
  )
  try {
    return request.fuzzy ? listShortcutsFuzzy(db, request) : listShortcutsExact(db, request)
  } catch (err) {
    throw toDatabaseError(err)
  }
}
