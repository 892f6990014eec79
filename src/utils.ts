/**
 * Shared utility functions for dirhop.
 *
 * Functions here only depend on Node built-ins to avoid circular imports.
 *
 * @module utils
 */

import { homedir } from 'node:os'
import { join } from 'node:path'

// ============================================================================
// Debug Utilities
// ============================================================================

/**
 * Debug logger that only outputs when DIRHOP_DEBUG env var is set.
 * Use for logging expected failures that don't need user attention.
 *
 * @param context - The subsystem context (e.g., 'db', 'smart', 'cache')
 * @param message - Human-readable description of what happened
 * @param error - Optional error object for additional context
 *
 * @example
 * ```ts
 * debugLog('db', 'Applying migration 1')
 * debugLog('cache', 'List call failed', err)
 * ```
 */
export function debugLog(context: string, message: string, error?: unknown): void {
  if (process.env.DIRHOP_DEBUG) {
    if (error) {
      console.debug(`[dirhop:${context}]`, message, error)
    } else {
      console.debug(`[dirhop:${context}]`, message)
    }
  }
}

// ============================================================================
// XDG Base Directory Utilities
// ============================================================================

/**
 * Gets the XDG config directory for dirhop.
 *
 * Uses XDG Base Directory Specification with fallbacks:
 * 1. $XDG_CONFIG_HOME/dirhop (if XDG_CONFIG_HOME is set)
 * 2. ~/.config/dirhop (if $HOME is set)
 * 3. ~/.dirhop (last resort fallback)
 *
 * @returns Absolute path to the config directory
 */
export function getConfigDir(): string {
  if (process.env.XDG_CONFIG_HOME) {
    return join(process.env.XDG_CONFIG_HOME, 'dirhop')
  }
  if (process.env.HOME) {
    return join(process.env.HOME, '.config', 'dirhop')
  }
  return join(homedir(), '.dirhop')
}

/**
 * Gets the XDG data directory for dirhop.
 *
 * Uses XDG Base Directory Specification with fallbacks:
 * 1. $XDG_DATA_HOME/dirhop (if XDG_DATA_HOME is set)
 * 2. ~/.local/share/dirhop (if $HOME is set)
 * 3. ~/.dirhop (last resort fallback)
 *
 * @returns Absolute path to the data directory
 */
export function getDataDir(): string {
  if (process.env.XDG_DATA_HOME) {
    return join(process.env.XDG_DATA_HOME, 'dirhop')
  }
  if (process.env.HOME) {
    return join(process.env.HOME, '.local', 'share', 'dirhop')
  }
  return join(homedir(), '.dirhop')
}

/**
 * The user's home directory, preferring $HOME like a shell would.
 */
export function getHomeDir(): string {
  return process.env.HOME ?? homedir()
}

// ============================================================================
// Path Utilities
// ============================================================================

/**
 * Expands ~ to the user's home directory.
 *
 * @param path - Path that may contain ~
 * @returns Path with ~ expanded to home directory
 *
 * @example
 * ```ts
 * expandTilde('~/Developer')  // '/home/username/Developer'
 * expandTilde('~')            // '/home/username'
 * expandTilde('/absolute')    // '/absolute'
 * ```
 */
export function expandTilde(path: string): string {
  if (path.startsWith('~/')) {
    return join(getHomeDir(), path.slice(2))
  }
  if (path === '~') {
    return getHomeDir()
  }
  return path
}

// ============================================================================
// Time Utilities
// ============================================================================

/** Current time in whole seconds since the epoch. */
export function nowSeconds(): number {
  return Math.floor(Date.now() / 1000)
}

function pad2(value: number): string {
  return String(value).padStart(2, '0')
}

/**
 * Formats epoch seconds as local `YYYY-MM-DD HH:MM:SS`.
 */
export function formatDate(seconds: number): string {
  const d = new Date(seconds * 1000)
  const day = `${d.getFullYear()}-${pad2(d.getMonth() + 1)}-${pad2(d.getDate())}`
  const time = `${pad2(d.getHours())}:${pad2(d.getMinutes())}:${pad2(d.getSeconds())}`
  return `${day} ${time}`
}
