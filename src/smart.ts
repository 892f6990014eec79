/**
 * Smart suggestions: predicts the next directory from past navigation.
 *
 * For the last `depth` visits of a directory, the history log is read
 * forward to see where the user went next. A path seen right after a
 * visit weighs `2^(count - 1)` times more than one seen `count - 1` steps
 * later; the small `depth - i - 1` term favours more recent visits among
 * equal ranks. Paths found after several visits sum their weights.
 * Weights are bigints: at the largest depth and count the sums pass
 * 2^53, where the depth term would be lost in a float.
 *
 * @module smart
 */

import { MAX_SUGGESTION_PARAM } from './config.js'
import { toDatabaseError, type Db } from './db.js'
import { assignShortcut } from './resolver.js'
import type { PathEntry, Shortcut } from './types.js'
import { debugLog } from './utils.js'

// ============================================================================
// Ranker
// ============================================================================

/**
 * A path and its accumulated weight.
 */
export interface RankedPath {
  readonly path: string
  readonly score: bigint
}

/**
 * Accumulates weights for paths seen after anchor visits.
 */
export class SmartRanker {
  private readonly depth: number
  private readonly count: number
  private readonly scores = new Map<string, bigint>()

  /**
   * @param depth - Number of anchor visits being mined
   * @param count - Number of paths kept per anchor and in the result
   */
  constructor(depth: number, count: number) {
    this.depth = depth
    this.count = count
  }

  /**
   * Adds one observation.
   *
   * @param anchorIndex - 0 for the most recent anchor visit
   * @param path - Path seen after the anchor
   * @param rank - 0 when seen immediately after the anchor
   */
  add(anchorIndex: number, path: string, rank: number): void {
    if (rank >= this.count) {
      console.warn(`[dirhop] Ignoring suggestion rank ${rank} (count is ${this.count})`)
      return
    }
    const score =
      ((1n << BigInt(this.count - 1 - rank)) << 2n) + BigInt(this.depth - anchorIndex - 1)
    this.scores.set(path, (this.scores.get(path) ?? 0n) + score)
  }

  /**
   * Best `count` paths, highest weight first. Ties keep insertion order.
   */
  collect(): RankedPath[] {
    return Array.from(this.scores, ([path, score]) => ({ path, score }))
      .sort((a, b) => (a.score === b.score ? 0 : a.score < b.score ? 1 : -1))
      .slice(0, this.count)
  }
}

// ============================================================================
// Suggester
// ============================================================================

/**
 * Parameters of one suggestion run.
 */
export interface SuggestOptions {
  /** Past visits of the anchor directory to mine */
  readonly depth: number
  /** Maximum number of suggestions */
  readonly count: number
  /** Never suggested */
  readonly homeDir: string
}

interface HistoryRow {
  id: number
  path: string
  date: number
}

function clampParam(name: string, value: number): number {
  if (value > MAX_SUGGESTION_PARAM) {
    console.warn(
      `[dirhop] Suggestion ${name} ${value} exceeds ${MAX_SUGGESTION_PARAM}, using ${MAX_SUGGESTION_PARAM}`
    )
    return MAX_SUGGESTION_PARAM
  }
  return value
}

/**
 * Predicts where the user goes after `matchPath`.
 *
 * @param db - Open database connection
 * @param matchPath - Anchor directory, usually the current one
 * @param options - Depth, count and home directory
 * @param shortcuts - Used to decorate the results
 * @returns Predicted entries, best first, all with `isPredicted` set
 * @throws DatabaseError if the history cannot be read
 *
 * @example
 * ```ts
 * // history: /src -> /src/app -> /src -> /docs
 * suggestNextPaths(db, '/src', { depth: 1, count: 5, homeDir }, [])
 * // [{ path: '/docs', isPredicted: true, ... }]
 * ```
 */
export function suggestNextPaths(
  db: Db,
  matchPath: string,
  options: SuggestOptions,
  shortcuts: readonly Shortcut[]
): PathEntry[] {
  const { homeDir } = options
  if (matchPath === '') {
    return []
  }
  if (options.depth <= 0 || options.count <= 0) {
    console.warn(
      `[dirhop] Skipping suggestions: depth ${options.depth}, count ${options.count}`
    )
    return []
  }
  const depth = clampParam('depth', options.depth)
  const count = clampParam('count', options.count)

  try {
    const anchors = db
      .prepare<[string, number], { id: number }>(
        'SELECT id FROM paths_history WHERE path = ? ORDER BY date DESC, id DESC LIMIT ?'
      )
      .all(matchPath, depth)
    const following = db.prepare<[number], HistoryRow>(
      'SELECT id, path, date FROM paths_history WHERE id > ? ORDER BY id ASC'
    )

    const ranker = new SmartRanker(depth, count)
    const latestDate = new Map<string, number>()

    anchors.forEach((anchor, anchorIndex) => {
      const seen = new Set<string>()
      for (const row of following.iterate(anchor.id)) {
        if (row.path === matchPath) break
        if (row.path === homeDir || seen.has(row.path)) continue
        ranker.add(anchorIndex, row.path, seen.size)
        seen.add(row.path)
        latestDate.set(row.path, Math.max(latestDate.get(row.path) ?? 0, row.date))
        if (seen.size >= count) break
      }
    })

    const ranked = ranker.collect()
    debugLog('smart', `${ranked.length} suggestions after ${matchPath}`)

    return ranked.map(({ path }) =>
      assignShortcut(
        { id: 0, path, date: latestDate.get(path) ?? 0, isPredicted: true },
        shortcuts
      )
    )
  } catch (err) {
    throw toDatabaseError(err)
  }
}
