/**
 * Error handling utilities for dirhop.
 *
 * Provides custom error types for distinct failure modes and type guards
 * for discriminating between error types in catch blocks.
 *
 * @module errors
 */

/**
 * Error codes for categorizing dirhop errors.
 * Used for programmatic error handling and logging.
 */
export const ErrorCode = {
  DATABASE_ERROR: 'DATABASE_ERROR',
  MIGRATION_ERROR: 'MIGRATION_ERROR',
  CONFIG_ERROR: 'CONFIG_ERROR',
  IMPORT_ERROR: 'IMPORT_ERROR',
} as const

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode]

/**
 * Base error class for dirhop errors.
 * Provides a common interface with error codes and cause chaining.
 */
export abstract class DirhopError extends Error {
  abstract readonly code: ErrorCode
  readonly cause?: Error

  constructor(message: string, options?: { cause?: Error }) {
    super(message)
    this.name = this.constructor.name
    this.cause = options?.cause

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }

  /**
   * Returns a formatted string including cause chain for logging.
   */
  toDetailedString(): string {
    let result = `${this.name} [${this.code}]: ${this.message}`
    if (this.cause) {
      result += `\n  Caused by: ${this.cause.message}`
    }
    return result
  }
}

/**
 * Error thrown when a query or write fails after startup.
 *
 * Recoverable: callers log it and, for listings, show an empty result.
 */
export class DatabaseError extends DirhopError {
  readonly code = ErrorCode.DATABASE_ERROR

  constructor(message: string, options?: { cause?: Error }) {
    super(message, options)
  }

  /**
   * Creates a DatabaseError from a SQLite error.
   */
  static fromSqliteError(err: Error): DatabaseError {
    return new DatabaseError(`SQLite error: ${err.message}`, { cause: err })
  }

  /**
   * Creates a DatabaseError for connection failures.
   */
  static connectionFailed(path: string, cause?: Error): DatabaseError {
    return new DatabaseError(`Failed to connect to database at ${path}`, {
      cause,
    })
  }

  /**
   * Creates a DatabaseError for locked database.
   */
  static locked(path: string): DatabaseError {
    return new DatabaseError(`Database is locked: ${path}`)
  }

  /**
   * Creates a DatabaseError for a connection used after close.
   */
  static closed(cause: Error): DatabaseError {
    return new DatabaseError('Database connection is closed', { cause })
  }

  /**
   * Creates a DatabaseError for a damaged database file.
   */
  static corrupt(cause: Error): DatabaseError {
    return new DatabaseError('Database file is corrupt', { cause })
  }
}

/**
 * Error thrown when the schema cannot be brought to the current version.
 *
 * Always fatal. The process entry point reports it and exits; nothing
 * below it should catch and continue.
 */
export class MigrationError extends DirhopError {
  readonly code = ErrorCode.MIGRATION_ERROR
  readonly fatal = true
  readonly version: number

  constructor(message: string, version: number, options?: { cause?: Error }) {
    super(message, options)
    this.version = version
  }

  /**
   * Creates a MigrationError for a script file that cannot be read.
   */
  static scriptMissing(scriptPath: string, version: number, cause?: Error): MigrationError {
    return new MigrationError(`Migration script not readable: ${scriptPath}`, version, {
      cause,
    })
  }

  /**
   * Creates a MigrationError for a script that failed to execute.
   */
  static scriptFailed(version: number, cause: Error): MigrationError {
    return new MigrationError(`Migration from schema version ${version} failed`, version, {
      cause,
    })
  }

  /**
   * Creates a MigrationError for a database written by a newer release.
   */
  static unsupportedVersion(version: number, supported: number): MigrationError {
    return new MigrationError(
      `Database schema version ${version} is newer than supported version ${supported}`,
      version
    )
  }
}

/**
 * Error thrown when configuration is invalid or cannot be loaded.
 */
export class ConfigError extends DirhopError {
  readonly code = ErrorCode.CONFIG_ERROR

  constructor(message: string, options?: { cause?: Error }) {
    super(message, options)
  }

  /**
   * Creates a ConfigError for TOML parsing failures.
   */
  static parseError(path: string, cause: Error): ConfigError {
    return new ConfigError(`Failed to parse config at ${path}`, { cause })
  }

  /**
   * Creates a ConfigError for validation failures.
   */
  static validationError(message: string): ConfigError {
    return new ConfigError(`Invalid configuration: ${message}`)
  }
}

/**
 * Error thrown when a whole import file cannot be used.
 * Single bad records are skipped, not raised.
 */
export class ImportError extends DirhopError {
  readonly code = ErrorCode.IMPORT_ERROR
  readonly filePath: string

  constructor(message: string, filePath: string, options?: { cause?: Error }) {
    super(message, options)
    this.filePath = filePath
  }

  static unreadable(filePath: string, cause?: Error): ImportError {
    return new ImportError(`Cannot read import file ${filePath}`, filePath, { cause })
  }

  static malformed(filePath: string, reason: string, cause?: Error): ImportError {
    return new ImportError(`Malformed import file ${filePath}: ${reason}`, filePath, { cause })
  }
}

// ============================================================================
// Type Guards
// ============================================================================

/**
 * Type guard for DirhopError base class.
 */
export function isDirhopError(err: unknown): err is DirhopError {
  return err instanceof DirhopError
}

/**
 * Type guard for DatabaseError.
 */
export function isDatabaseError(err: unknown): err is DatabaseError {
  return err instanceof DatabaseError
}

/**
 * Type guard for MigrationError.
 */
export function isMigrationError(err: unknown): err is MigrationError {
  return err instanceof MigrationError
}

/**
 * Type guard for ConfigError.
 */
export function isConfigError(err: unknown): err is ConfigError {
  return err instanceof ConfigError
}

export function isImportError(err: unknown): err is ImportError {
  return err instanceof ImportError
}

// ============================================================================
// Error Pattern Matching
// ============================================================================

/**
 * Patterns for detecting specific error conditions from raw SQLite errors.
 */
export const ErrorPatterns = {
  /** SQLite database locked pattern */
  DATABASE_LOCKED: /database\s+is\s+locked/i,

  /** SQLite database corrupted pattern */
  DATABASE_CORRUPT: /database\s+disk\s+image\s+is\s+malformed/i,

  /** Connection used after close() */
  DATABASE_CLOSED: /database\s+connection\s+is\s+not\s+open/i,
} as const

/**
 * Checks if an error message matches a specific pattern.
 *
 * @param err - The error to check
 * @param pattern - Regex pattern to match against
 * @returns true if the error message matches the pattern
 *
 * @example
 * ```ts
 * if (matchesErrorPattern(err, ErrorPatterns.DATABASE_LOCKED)) {
 *   throw DatabaseError.locked(dbPath)
 * }
 * ```
 */
export function matchesErrorPattern(err: unknown, pattern: RegExp): err is Error {
  if (err instanceof Error) {
    return pattern.test(err.message)
  }
  if (typeof err === 'string') {
    return pattern.test(err)
  }
  return false
}

/**
 * Ensures an unknown value is an Error instance.
 * Useful for catch blocks with unknown type.
 *
 * @param err - The unknown value from a catch block
 * @returns An Error instance
 */
export function ensureError(err: unknown): Error {
  if (err instanceof Error) {
    return err
  }
  return new Error(String(err))
}
