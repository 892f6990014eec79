/**
 * Longest-prefix shortcut resolution.
 *
 * @module resolver
 */

import { sep } from 'node:path'
import type { PathEntry, Shortcut } from './types.js'

/**
 * True when `ancestor` is `path` itself or one of its parent directories.
 * The character after the prefix must be a path separator, so `/home/use`
 * does not cover `/home/user`.
 */
export function isAncestorPath(ancestor: string, path: string): boolean {
  if (!path.startsWith(ancestor)) {
    return false
  }
  return path.length === ancestor.length || path.charAt(ancestor.length) === sep
}

/**
 * Finds the most specific shortcut covering `path`.
 *
 * Among equal-length candidates the first one seen is kept.
 *
 * @param path - Directory to resolve
 * @param shortcuts - All known shortcuts
 * @param current - Shortcut already attached to the entry, if any
 * @returns The longest matching shortcut, or `current` when nothing is longer
 */
export function findShortcutFor(
  path: string,
  shortcuts: readonly Shortcut[],
  current?: Shortcut
): Shortcut | undefined {
  let match = current
  for (const shortcut of shortcuts) {
    if (!isAncestorPath(shortcut.path, path)) continue
    if (!match || shortcut.path.length > match.path.length) {
      match = shortcut
    }
  }
  return match
}

/**
 * Returns `entry` decorated with its most specific shortcut.
 *
 * @example
 * ```ts
 * assignShortcut(entry, [
 *   { id: 1, name: 'home', path: '/home', description: null },
 *   { id: 2, name: 'docs', path: '/home/user/docs', description: null },
 * ]).shortcut?.name // 'docs' for /home/user/docs/readme
 * ```
 */
export function assignShortcut(entry: PathEntry, shortcuts: readonly Shortcut[]): PathEntry {
  const shortcut = findShortcutFor(entry.path, shortcuts, entry.shortcut)
  if (shortcut === entry.shortcut) {
    return entry
  }
  return { ...entry, shortcut }
}

export function assignShortcuts(
  entries: readonly PathEntry[],
  shortcuts: readonly Shortcut[]
): PathEntry[] {
  return entries.map(entry => assignShortcut(entry, shortcuts))
}

/**
 * Every shortcut covering `path`, in input order.
 */
export function ancestorShortcuts(path: string, shortcuts: readonly Shortcut[]): Shortcut[] {
  return shortcuts.filter(shortcut => isAncestorPath(shortcut.path, path))
}
