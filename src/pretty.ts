/**
 * Width-limited path rendering.
 *
 * Paths under a shortcut are shown as `[name]/rest`, paths under the home
 * directory as `~/rest`. Text that does not fit keeps its end behind a
 * leading `*`. Widths count code points.
 *
 * @module pretty
 */

import { cyan, dim } from 'yoctocolors'
import { findShortcutFor } from './resolver.js'
import type { Shortcut } from './types.js'

/**
 * One rendered fragment; `kind` selects the style.
 */
interface Segment {
  readonly text: string
  readonly kind: 'plain' | 'shortcut' | 'home'
}

function chars(value: string): string[] {
  return Array.from(value)
}

/**
 * Keeps the last `size - 1` characters behind a `*`.
 */
function truncateStart(value: string, size: number): string {
  const list = chars(value)
  if (list.length <= size) {
    return value
  }
  return `*${list.slice(list.length - size + 1).join('')}`
}

function render(segments: readonly Segment[], style: boolean): string {
  return segments
    .map(segment => {
      if (!style) return segment.text
      if (segment.kind === 'shortcut') return cyan(segment.text)
      if (segment.kind === 'home') return dim(segment.text)
      return segment.text
    })
    .join('')
}

function reduceSegments(path: string, width: number, homeDir: string): Segment[] {
  if (width <= 0) {
    return []
  }
  const underHome = homeDir !== '' && (path === homeDir || path.startsWith(`${homeDir}/`))
  if (!underHome) {
    return [{ text: truncateStart(path, width), kind: 'plain' }]
  }

  const tilde: Segment = { text: '~', kind: 'home' }
  if (path === homeDir) {
    return [tilde]
  }
  if (width === 1) return [{ text: '*', kind: 'plain' }]
  if (width === 2) return [tilde, { text: '*', kind: 'plain' }]
  if (width === 3) return [tilde, { text: '/*', kind: 'plain' }]

  const rest = path.slice(homeDir.length + 1)
  return [tilde, { text: `/${truncateStart(rest, width - 2)}`, kind: 'plain' }]
}

function shortcutSegments(path: string, shortcut: Shortcut, width: number): Segment[] {
  const label: Segment = { text: `[${shortcut.name}]`, kind: 'shortcut' }
  const labelWidth = chars(shortcut.name).length + 3
  if (labelWidth === width) {
    return [label, { text: '*', kind: 'plain' }]
  }
  if (labelWidth > width) {
    return [{ text: '*', kind: 'plain' }]
  }
  if (path === shortcut.path) {
    return [label]
  }
  const rest = path.slice(shortcut.path.length + 1)
  return [label, { text: `/${truncateStart(rest, width - labelWidth)}`, kind: 'plain' }]
}

/**
 * Renders `path` relative to the home directory.
 *
 * @example
 * ```ts
 * reducePath('/home/me/src/app', 80, '/home/me') // '~/src/app'
 * reducePath('/var/log/nginx', 6, '/home/me')    // '*nginx'
 * ```
 */
export function reducePath(path: string, width: number, homeDir: string, style = false): string {
  return render(reduceSegments(path, width, homeDir), style)
}

/**
 * Renders `path` relative to its most specific shortcut.
 *
 * @returns The rendering, or undefined when no shortcut covers the path
 */
export function shortenPath(
  path: string,
  shortcuts: readonly Shortcut[],
  width: number,
  style = false
): string | undefined {
  if (width <= 0) {
    return undefined
  }
  const shortcut = findShortcutFor(path, shortcuts)
  if (!shortcut) {
    return undefined
  }
  return render(shortcutSegments(path, shortcut, width), style)
}

/**
 * Options for prettyPath.
 */
export interface PrettyPathOptions {
  readonly width: number
  readonly homeDir: string
  /** Colour shortcut names and the home tilde. Default: true */
  readonly style?: boolean
}

/**
 * Shortcut rendering when one applies, home-relative rendering otherwise.
 */
export function prettyPath(
  path: string,
  shortcuts: readonly Shortcut[],
  options: PrettyPathOptions
): string {
  const style = options.style ?? true
  return (
    shortenPath(path, shortcuts, options.width, style) ??
    reducePath(path, options.width, options.homeDir, style)
  )
}
