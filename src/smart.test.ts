/**
 * Tests for the sequence-mining suggester.
 *
 * @module smart.test
 */

import { describe, test, expect, beforeEach, afterEach, vi } from 'vitest'
import { closeDatabase, openDatabase, type Db } from './db.js'
import { addPath } from './paths.js'
import { SmartRanker, suggestNextPaths } from './smart.js'
import type { Shortcut } from './types.js'

// ============================================================================
// SmartRanker
// ============================================================================

describe('SmartRanker', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  test('weights earlier ranks exponentially and sums repeats', () => {
    const ranker = new SmartRanker(1, 5)
    ranker.add(0, 'a', 0)
    ranker.add(0, 'b', 1)
    ranker.add(0, 'c', 2)
    ranker.add(0, 'c', 2)
    ranker.add(0, 'c', 2)

    expect(ranker.collect()).toEqual([
      { path: 'a', score: 64n },
      { path: 'c', score: 48n },
      { path: 'b', score: 32n },
    ])
  })

  test('keeps only count paths', () => {
    const ranker = new SmartRanker(1, 2)
    ranker.add(0, 'b', 0)
    ranker.add(0, 'a', 0)
    ranker.add(0, 'b', 1)

    expect(ranker.collect().map(r => r.path)).toEqual(['b', 'a'])
  })

  test('favours recent anchors among equal ranks', () => {
    const ranker = new SmartRanker(3, 1)
    ranker.add(2, 'old', 0)
    ranker.add(0, 'new', 0)

    expect(ranker.collect()).toEqual([{ path: 'new', score: 6n }])
  })

  test('keeps the depth term exact for large counts', () => {
    const ranker = new SmartRanker(2, 1100)
    ranker.add(1, 'older', 0)
    ranker.add(0, 'newer', 0)

    const top = (1n << 1099n) << 2n
    expect(ranker.collect()).toEqual([
      { path: 'newer', score: top + 1n },
      { path: 'older', score: top },
    ])
  })

  test('ignores ranks beyond count with a warning', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    const ranker = new SmartRanker(1, 2)
    ranker.add(0, 'x', 2)

    expect(ranker.collect()).toEqual([])
    expect(warn).toHaveBeenCalledWith('[dirhop] Ignoring suggestion rank 2 (count is 2)')
  })
})

// ============================================================================
// suggestNextPaths
// ============================================================================

describe('suggestNextPaths', () => {
  const homeDir = '/home/tester'
  let db: Db

  beforeEach(() => {
    db = openDatabase(':memory:')
  })

  afterEach(() => {
    closeDatabase(db)
  })

  function visit(...paths: string[]): void {
    paths.forEach((path, index) => addPath(db, path, index + 1))
  }

  function suggest(depth: number, count: number, shortcuts: Shortcut[] = []): string[] {
    return suggestNextPaths(db, '/start', { depth, count, homeDir }, shortcuts).map(e => e.path)
  }

  test('predicts what followed the latest visit', () => {
    visit('/start', '/a', '/start', '/b')

    expect(suggest(1, 3)).toEqual(['/b'])
    expect(suggest(2, 3)).toEqual(['/b', '/a'])
  })

  test('combines several past visits', () => {
    visit('/start', '/old', '/start', '/new1', '/new2')

    expect(suggest(2, 5)).toEqual(['/new1', '/old', '/new2'])
  })

  test('mines up to depth visits and count paths each', () => {
    visit('/start', '/a', '/b', '/start', '/c', '/d', '/start', '/e', '/f')

    expect(suggest(1, 2)).toEqual(['/e', '/f'])
    expect(suggest(2, 4)).toEqual(['/e', '/c', '/f', '/d'])
    expect(suggest(3, 10)).toHaveLength(6)
  })

  test('skips home and repeated paths', () => {
    visit('/start', '/home/tester', '/x', '/x', '/y')

    expect(suggest(1, 3)).toEqual(['/x', '/y'])
  })

  test('returns predicted entries with the latest date and shortcut', () => {
    visit('/start', '/srv/www/site', '/start', '/srv/www/site')
    const shortcuts: Shortcut[] = [{ id: 1, name: 'www', path: '/srv/www', description: null }]

    const [entry] = suggestNextPaths(db, '/start', { depth: 2, count: 3, homeDir }, shortcuts)

    expect(entry).toEqual({
      id: 0,
      path: '/srv/www/site',
      date: 4,
      isPredicted: true,
      shortcut: shortcuts[0],
    })
  })

  test('returns nothing without history', () => {
    expect(suggest(5, 3)).toEqual([])
  })

  test('warns and returns nothing for zero parameters', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    visit('/start', '/a')

    expect(suggest(0, 3)).toEqual([])
    expect(suggest(3, 0)).toEqual([])
    expect(warn).toHaveBeenCalledWith('[dirhop] Skipping suggestions: depth 0, count 3')
    expect(warn).toHaveBeenCalledWith('[dirhop] Skipping suggestions: depth 3, count 0')
    warn.mockRestore()
  })

  test('caps depth and count at the configured maximum', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    visit('/start', '/a')

    expect(suggest(80, 2000)).toEqual(['/a'])
    expect(warn).toHaveBeenCalledWith('[dirhop] Suggestion depth 80 exceeds 50, using 50')
    expect(warn).toHaveBeenCalledWith('[dirhop] Suggestion count 2000 exceeds 50, using 50')
    warn.mockRestore()
  })

  test('depth 1 reads only the latest sequence, depth 2 promotes recurring paths', () => {
    visit('/start', '/a', '/b', '/c', '/start', '/a', '/b', '/d')

    expect(suggest(1, 5)).toEqual(['/a', '/b', '/d'])
    expect(suggest(2, 5)).toEqual(['/a', '/b', '/d', '/c'])
  })

  test('orders sums beyond 2^53 exactly at the largest depth and count', () => {
    const fillers = Array.from({ length: 49 }, (_, i) => `/f${i}`)
    const after = (anchor: number): string[] => {
      if ([0, 1, 2, 5].includes(anchor)) return ['/A']
      if ([3, 4, 6, 7].includes(anchor)) return ['/B']
      if (anchor === 49) return [...fillers, '/A']
      if (anchor === 36) return [...fillers, '/B']
      return []
    }
    const sequence: string[] = []
    for (let anchor = 49; anchor >= 0; anchor--) {
      sequence.push('/start', ...after(anchor))
    }
    visit(...sequence)

    // /A: 2^53 + 192, /B: 2^53 + 193
    expect(suggest(50, 50).slice(0, 2)).toEqual(['/B', '/A'])
  })
})
