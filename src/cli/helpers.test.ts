import { describe, expect, test } from 'vitest'
import { parseCount, parseListArgs, shellEscape } from './helpers.js'

describe('shellEscape', () => {
  test('quotes single quotes', () => {
    expect(shellEscape("it's")).toBe(`'it'\\''s'`)
  })
})

describe('parseCount', () => {
  test('accepts non-negative integers only', () => {
    expect(parseCount('12')).toBe(12)
    expect(parseCount('0')).toBe(0)
    expect(parseCount('-1')).toBeUndefined()
    expect(parseCount('1.5')).toBeUndefined()
  })
})

describe('parseListArgs', () => {
  test('joins words into the filter and reads options', () => {
    expect(parseListArgs(['src', '--fuzzy', 'app', '--offset', '4', '-n', '3'], 10)).toEqual({
      filter: 'src app',
      fuzzy: true,
      offset: 4,
      limit: 3,
    })
  })

  test('uses the default limit', () => {
    expect(parseListArgs([], 7)).toEqual({ filter: '', fuzzy: false, offset: 0, limit: 7 })
  })

  test('reports the first malformed option', () => {
    expect(parseListArgs(['--limit', 'ten'], 10).invalid).toBe('--limit ten')
    expect(parseListArgs(['--bogus', '--offset'], 10).invalid).toBe('--bogus')
  })
})
