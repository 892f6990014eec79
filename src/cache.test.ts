/**
 * Tests for the windowed result cache.
 *
 * @module cache.test
 */

import { describe, test, expect, beforeEach, afterEach, vi, type Mock } from 'vitest'
import { WindowedResultCache } from './cache.js'
import type { DataStatePayload, ListSource } from './types.js'

// ============================================================================
// Test Utilities
// ============================================================================

let data: string[]
let list: Mock<ListSource<string>['list']>
let source: ListSource<string>
let events: DataStatePayload[]
let cache: WindowedResultCache<string>

beforeEach(() => {
  data = Array.from({ length: 12 }, (_, i) => `item${i}`)
  list = vi.fn<ListSource<string>['list']>((offset, limit, filter) =>
    data.filter(item => item.includes(filter)).slice(offset, offset + limit)
  )
  source = { list }
  events = []
  cache = new WindowedResultCache('items', source, payload => {
    events.push(payload)
  })
})

afterEach(() => {
  vi.restoreAllMocks()
})

// ============================================================================
// Tests
// ============================================================================

describe('updateFilter', () => {
  test('fetches the first window and publishes it', () => {
    expect(cache.updateFilter(10, '', false)).toBe(true)

    expect(list).toHaveBeenCalledWith(0, 10, '', false)
    expect(cache.first).toBe(0)
    expect(cache.length).toBe(10)
    expect(events).toEqual([{ objectsType: 'items', isEmpty: false }])
  })

  test('an empty result clears the window', () => {
    cache.updateFilter(10, '', false)

    expect(cache.updateFilter(10, 'nothing', false)).toBe(true)
    expect(cache.entries).toEqual([])
    expect(cache.length).toBe(0)
    expect(cache.first).toBe(0)
    expect(events.at(-1)).toEqual({ objectsType: 'items', isEmpty: true })
  })
})

describe('update', () => {
  beforeEach(() => {
    cache.updateFilter(10, '', false)
    list.mockClear()
  })

  test('serves a subset from memory', () => {
    expect(cache.update(2, 3)).toBe(false)

    expect(list).not.toHaveBeenCalled()
    expect(cache.entries).toEqual(['item2', 'item3', 'item4'])
    expect(cache.first).toBe(2)
    expect(events).toHaveLength(2)
  })

  test('queries when the range leaves the window', () => {
    expect(cache.update(5, 10)).toBe(true)

    expect(list).toHaveBeenCalledWith(5, 10, '', false)
    expect(cache.entries).toEqual(data.slice(5))
  })

  test('scrolling past the end keeps the window', () => {
    expect(cache.update(12, 10)).toBe(false)
    expect(cache.first).toBe(0)
    expect(cache.length).toBe(10)

    cache.update(5, 10)
    expect(cache.update(6, 10)).toBe(false)
    expect(cache.first).toBe(5)
    expect(cache.length).toBe(7)
  })

  test('force always queries', () => {
    expect(cache.update(0, 5, true)).toBe(true)
    expect(list).toHaveBeenCalledTimes(1)
    expect(cache.length).toBe(5)
  })

  test('a failing source leaves the window alone', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    list.mockImplementationOnce(() => {
      throw new Error('disk gone')
    })

    expect(cache.update(0, 20)).toBe(false)
    expect(cache.length).toBe(10)
    expect(warn).toHaveBeenCalledWith('[dirhop] Failed to list items:', 'disk gone')
  })
})

describe('updateToOffset', () => {
  test('moves relative to the first entry and clamps at zero', () => {
    cache.updateFilter(4, '', false)

    cache.updateToOffset(4, 4)
    expect(cache.entries).toEqual(['item4', 'item5', 'item6', 'item7'])

    cache.updateToOffset(-10, 4)
    expect(cache.first).toBe(0)
    expect(cache.entries).toEqual(['item0', 'item1', 'item2', 'item3'])
  })
})

describe('fuzzy mode', () => {
  test('switching refetches and disables in-memory reuse', () => {
    cache.updateFilter(10, '', false)
    list.mockClear()

    expect(cache.setFuzzyMatch(false)).toBe(false)
    expect(cache.setFuzzyMatch(true)).toBe(true)
    expect(list).toHaveBeenLastCalledWith(0, 10, '', true)

    cache.update(1, 2)
    expect(list).toHaveBeenLastCalledWith(1, 2, '', true)
    expect(cache.fuzzy).toBe(true)
  })
})

describe('reload', () => {
  test('picks up external changes in the same window', () => {
    cache.updateFilter(3, 'item1', false)
    expect(cache.entries).toEqual(['item1', 'item10', 'item11'])

    data = data.filter(item => item !== 'item10')
    cache.reload()
    expect(cache.entries).toEqual(['item1', 'item11'])

    data = []
    cache.reload()
    expect(cache.length).toBe(0)
    expect(events.at(-1)).toEqual({ objectsType: 'items', isEmpty: true })
  })
})
