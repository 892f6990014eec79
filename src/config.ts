/**
 * Configuration loading and validation for dirhop.
 *
 * Loads TOML configuration from $XDG_CONFIG_HOME/dirhop/config.toml,
 * validates the schema, expands paths, and provides sensible defaults.
 *
 * @module config
 */

import { readFileSync } from 'node:fs'
import { join } from 'node:path'
import TOML from 'toml'
import { ConfigError } from './errors.js'
import type { SearchSettings } from './types.js'
import { expandTilde, getConfigDir, getDataDir, getHomeDir } from './utils.js'

// ============================================================================
// Configuration Types
// ============================================================================

/**
 * Search behaviour.
 */
export interface SearchConfig {
  /** Match shortcut names/descriptions when filtering paths. Default: true */
  readonly include_shortcuts: boolean
  /** Initial matching mode of the picker. Default: false */
  readonly fuzzy: boolean
}

/**
 * Predictive "next directory" suggestions.
 */
export interface SmartSuggestionsConfig {
  /** Default: true */
  readonly active: boolean
  /** Past occurrences of the current directory to mine. Default: 5 */
  readonly depth: number
  /** Predictions shown above the history. Default: 3 */
  readonly count: number
}

/**
 * Output layout.
 */
export interface DisplayConfig {
  /** Entries per picker page. Default: 10 */
  readonly page_size: number
  /** Width used by pretty-print-path. Default: 80 */
  readonly max_width: number
}

/**
 * Complete dirhop configuration.
 */
export interface Config {
  /** SQLite database file, ~ expanded */
  readonly db_path: string
  readonly search: SearchConfig
  readonly smart_suggestions: SmartSuggestionsConfig
  readonly display: DisplayConfig
}

// ============================================================================
// Default Configuration
// ============================================================================

/** Upper bound for suggestion depth and count */
export const MAX_SUGGESTION_PARAM = 50

/**
 * Default configuration used when config file is missing or incomplete.
 */
export const DEFAULT_CONFIG: Config = {
  db_path: join(getDataDir(), 'dirhop.db'),
  search: {
    include_shortcuts: true,
    fuzzy: false,
  },
  smart_suggestions: {
    active: true,
    depth: 5,
    count: 3,
  },
  display: {
    page_size: 10,
    max_width: 80,
  },
} as const

// ============================================================================
// Configuration Loading
// ============================================================================

/** Default config file path (uses XDG Base Directory Specification) */
const CONFIG_PATH = join(getConfigDir(), 'config.toml')

/**
 * Raw TOML structure before validation.
 */
interface RawConfig {
  db_path?: unknown
  search?: unknown
  smart_suggestions?: unknown
  display?: unknown
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value)
}

/**
 * Validates an integer value with range checking.
 */
function validateInteger(
  value: unknown,
  defaultValue: number,
  field: string,
  max: number = Number.MAX_SAFE_INTEGER
): number {
  if (value === undefined || value === null) {
    return defaultValue
  }
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw ConfigError.validationError(`${field} must be an integer`)
  }
  if (value < 0) {
    throw ConfigError.validationError(`${field} must be non-negative`)
  }
  if (value > max) {
    throw ConfigError.validationError(`${field} must be at most ${max}`)
  }
  return value
}

function validateBoolean(value: unknown, defaultValue: boolean, field: string): boolean {
  if (value === undefined || value === null) {
    return defaultValue
  }
  if (typeof value !== 'boolean') {
    throw ConfigError.validationError(`${field} must be a boolean`)
  }
  return value
}

function validateString(value: unknown, defaultValue: string, field: string): string {
  if (value === undefined || value === null) {
    return defaultValue
  }
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw ConfigError.validationError(`${field} must be a non-empty string`)
  }
  return value
}

function validateSection(value: unknown, field: string): Record<string, unknown> {
  if (value === undefined) {
    return {}
  }
  if (!isRecord(value)) {
    throw ConfigError.validationError(`${field} must be a table`)
  }
  return value
}

/**
 * Validates raw TOML config and returns a fully typed Config object.
 * Merges with defaults for any missing values.
 */
export function validateConfig(raw: unknown): Config {
  if (!isRecord(raw)) {
    return DEFAULT_CONFIG
  }
  const rawConfig: RawConfig = raw
  const search = validateSection(rawConfig.search, 'search')
  const smart = validateSection(rawConfig.smart_suggestions, 'smart_suggestions')
  const display = validateSection(rawConfig.display, 'display')
  const defaults = DEFAULT_CONFIG

  return {
    db_path: expandTilde(validateString(rawConfig.db_path, defaults.db_path, 'db_path')),
    search: {
      include_shortcuts: validateBoolean(
        search.include_shortcuts,
        defaults.search.include_shortcuts,
        'search.include_shortcuts'
      ),
      fuzzy: validateBoolean(search.fuzzy, defaults.search.fuzzy, 'search.fuzzy'),
    },
    smart_suggestions: {
      active: validateBoolean(
        smart.active,
        defaults.smart_suggestions.active,
        'smart_suggestions.active'
      ),
      depth: validateInteger(
        smart.depth,
        defaults.smart_suggestions.depth,
        'smart_suggestions.depth',
        MAX_SUGGESTION_PARAM
      ),
      count: validateInteger(
        smart.count,
        defaults.smart_suggestions.count,
        'smart_suggestions.count',
        MAX_SUGGESTION_PARAM
      ),
    },
    display: {
      page_size: validateInteger(display.page_size, defaults.display.page_size, 'display.page_size'),
      max_width: validateInteger(display.max_width, defaults.display.max_width, 'display.max_width'),
    },
  }
}

function parseConfigText(content: string, configPath: string): Config {
  let raw: unknown
  try {
    raw = TOML.parse(content)
  } catch (err) {
    throw ConfigError.parseError(configPath, err instanceof Error ? err : new Error(String(err)))
  }
  return validateConfig(raw)
}

/**
 * Loads configuration from the TOML file.
 *
 * If the config file doesn't exist, returns sensible defaults.
 * If the config file is malformed, throws a ConfigError.
 * Missing values are filled with defaults.
 *
 * @param configPath - Optional custom config path (for testing)
 * @returns Fully validated Config object with ~ expanded in paths
 *
 * @example
 * ```ts
 * const config = loadConfig()
 * console.log(config.smart_suggestions.count) // 3
 * ```
 */
export function loadConfig(configPath: string = CONFIG_PATH): Config {
  let content: string
  try {
    content = readFileSync(configPath, 'utf-8')
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      return DEFAULT_CONFIG
    }
    throw ConfigError.parseError(configPath, err instanceof Error ? err : new Error(String(err)))
  }
  return parseConfigText(content, configPath)
}

/**
 * Derives the per-call query settings from a config.
 */
export function toSearchSettings(config: Config, homeDir: string = getHomeDir()): SearchSettings {
  return {
    includeShortcuts: config.search.include_shortcuts,
    smartSuggestions: {
      active: config.smart_suggestions.active,
      depth: config.smart_suggestions.depth,
      count: config.smart_suggestions.count,
    },
    homeDir,
  }
}

/**
 * Returns the default config path.
 * Useful for tools that want to show users where config is expected.
 */
export function getConfigPath(): string {
  return CONFIG_PATH
}
