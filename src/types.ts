/**
 * Shared type definitions for dirhop.
 *
 * Kept free of runtime imports so that any module can depend on it.
 *
 * @module types
 */

// ============================================================================
// Stored Entities
// ============================================================================

/**
 * A named bookmark binding a short identifier to a directory.
 */
export interface Shortcut {
  readonly id: number
  /** Unique name, e.g. "docs" */
  readonly name: string
  /** Absolute directory path */
  readonly path: string
  readonly description: string | null
}

/**
 * One directory occurrence, read from the current set, the history log,
 * or synthesized by the smart suggester.
 */
export interface PathEntry {
  readonly id: number
  readonly path: string
  /** Visit time in seconds since the epoch */
  readonly date: number
  /** Most specific shortcut covering this path, resolved at read time */
  readonly shortcut?: Shortcut
  /** True when produced by the smart suggester rather than read from storage */
  readonly isPredicted: boolean
}

// ============================================================================
// Listing
// ============================================================================

/**
 * A paginated, filterable list request.
 */
export interface ListRequest {
  readonly offset: number
  readonly limit: number
  /** Filter text; empty means no filter */
  readonly filter: string
  /** Subsequence scoring instead of substring containment */
  readonly fuzzy: boolean
}

/**
 * Any data source the windowed cache can page through.
 *
 * Implementations throw a DatabaseError on storage failure.
 */
export interface ListSource<T> {
  list(offset: number, limit: number, filter: string, fuzzy: boolean): T[]
}

// ============================================================================
// Settings and Notifications
// ============================================================================

/**
 * Smart suggestion parameters.
 */
export interface SmartSuggestionSettings {
  readonly active: boolean
  /** How many past occurrences of the current directory to mine */
  readonly depth: number
  /** How many predictions to produce */
  readonly count: number
}

/**
 * Settings that influence queries. Read fresh on every list call.
 */
export interface SearchSettings {
  /** Match shortcut names and descriptions when filtering paths */
  readonly includeShortcuts: boolean
  readonly smartSuggestions: SmartSuggestionSettings
  /** Never suggested as a next directory */
  readonly homeDir: string
}

/**
 * Payload published whenever a windowed cache changes its content.
 */
export interface DataStatePayload {
  readonly objectsType: string
  readonly isEmpty: boolean
}

export type DataStateListener = (payload: DataStatePayload) => void

/**
 * Outcome of a bulk import.
 */
export interface ImportReport {
  readonly imported: number
  readonly skipped: number
  readonly errors: readonly string[]
}
