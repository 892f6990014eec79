/**
 * Subsequence scoring for fuzzy path and shortcut search.
 *
 * Works on code points, so accented and astral characters count as one.
 *
 * @module fuzzy
 */

/** Score returned when the query does not match */
export const NO_MATCH = -1

const BOUNDARY_CHARS = new Set(['', '/', '_', '-', ' ', '.'])

/**
 * Scores a whitespace-separated query against a target.
 *
 * Every token must match as a case-insensitive subsequence; the token
 * scores are summed. An empty query matches nothing.
 *
 * @returns Total score, or NO_MATCH
 *
 * @example
 * ```ts
 * fuzzyScoreTokens('us doc', '/home/user/documents') > 0 // true
 * fuzzyScoreTokens('xyz', '/home/user')               // -1
 * ```
 */
export function fuzzyScoreTokens(query: string, target: string): number {
  const tokens = query.trim().split(/\s+/).filter(Boolean)
  if (tokens.length === 0) {
    return NO_MATCH
  }
  let total = 0
  for (const token of tokens) {
    const score = fuzzyScore(token, target)
    if (score < 0) {
      return NO_MATCH
    }
    total += score
  }
  return total
}

/**
 * Scores one token against a target.
 *
 * Each matched character earns a point, plus a bonus after a word
 * boundary and a growing bonus (capped at 5) for consecutive matches.
 * Shorter targets and earlier matches score slightly higher.
 */
export function fuzzyScore(query: string, target: string): number {
  const needle = Array.from(query.toLowerCase())
  const hay = Array.from(target.toLowerCase())
  let score = 0
  let lastIndex = -1
  let streak = 0

  for (const ch of needle) {
    const idx = hay.indexOf(ch, lastIndex + 1)
    if (idx === -1) {
      return NO_MATCH
    }

    const prev = idx > 0 ? (hay[idx - 1] ?? '') : ''
    if (idx === lastIndex + 1) {
      streak += 1
    } else {
      streak = 1
    }

    score += 1
    if (BOUNDARY_CHARS.has(prev)) {
      score += 3
    }
    score += Math.min(streak, 5)

    lastIndex = idx
  }

  score += Math.max(0, 20 - hay.length / 10)
  score += Math.max(0, 10 - lastIndex / 10)

  return score
}
