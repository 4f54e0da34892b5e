/**
 * Benchmark History Error Handling Module
 *
 * Provides a standardized error hierarchy for the whole codebase.
 * All errors extend from BenchmarkHistoryError which provides:
 * - Error codes for programmatic handling
 * - JSON serialization for CLI output
 * - Cause chaining for debugging
 * - Type guards for error checking
 *
 * Error Hierarchy:
 * - BenchmarkHistoryError (base class)
 *   - ValidationError (invalid arguments)
 *     - MalformedInputError (results document is not JSON)
 *   - NotFoundError (run or trend data not found)
 *     - RunNotFoundError
 *     - TrendDataNotFoundError
 *   - ConflictError (duplicate metric record within a run)
 *   - StorageError (store read/write failures)
 *     - StoreUnavailableError (store cannot be opened or written)
 *   - AlertEmissionError (regression detection failed after metrics were stored)
 *   - ConfigurationError (invalid configuration)
 *
 * @module errors
 */

// =============================================================================
// Error Codes
// =============================================================================

/**
 * Error codes for benchmark history operations.
 * These codes are stable and can be used for programmatic error handling.
 */
export enum ErrorCode {
  // General errors
  UNKNOWN = 'UNKNOWN',
  INTERNAL = 'INTERNAL',

  // Validation errors
  VALIDATION_FAILED = 'VALIDATION_FAILED',
  INVALID_INPUT = 'INVALID_INPUT',
  MALFORMED_INPUT = 'MALFORMED_INPUT',

  // Not found errors
  NOT_FOUND = 'NOT_FOUND',
  RUN_NOT_FOUND = 'RUN_NOT_FOUND',
  TREND_DATA_NOT_FOUND = 'TREND_DATA_NOT_FOUND',
  FILE_NOT_FOUND = 'FILE_NOT_FOUND',

  // Conflict errors
  CONFLICT = 'CONFLICT',
  UNIQUE_CONSTRAINT = 'UNIQUE_CONSTRAINT',

  // Storage errors
  STORAGE_ERROR = 'STORAGE_ERROR',
  STORAGE_UNAVAILABLE = 'STORAGE_UNAVAILABLE',
  STORAGE_WRITE_ERROR = 'STORAGE_WRITE_ERROR',

  // Detection errors
  ALERT_EMISSION_FAILED = 'ALERT_EMISSION_FAILED',

  // Configuration errors
  INVALID_CONFIG = 'INVALID_CONFIG',
}

// =============================================================================
// Serialized Error Format
// =============================================================================

/**
 * Serializable error format for JSON output
 */
export interface SerializedError {
  /** Error class name */
  name: string
  /** Error code for programmatic handling */
  code: ErrorCode
  /** Human-readable error message */
  message: string
  /** Stack trace (included outside production) */
  stack?: string | undefined
  /** Additional context data */
  context?: Record<string, unknown> | undefined
  /** Serialized cause (if error chaining) */
  cause?: SerializedError | undefined
}

// =============================================================================
// Base Error Class
// =============================================================================

/**
 * Base error class for all benchmark history errors.
 *
 * @example
 * ```typescript
 * throw new BenchmarkHistoryError('Operation failed', ErrorCode.INTERNAL, {
 *   operation: 'record',
 * })
 * ```
 */
export class BenchmarkHistoryError extends Error {
  override readonly name: string = 'BenchmarkHistoryError'
  readonly code: ErrorCode
  readonly context: Record<string, unknown>
  override readonly cause?: Error | undefined

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message)
    this.code = code
    this.context = context ?? {}
    this.cause = cause
    Object.setPrototypeOf(this, new.target.prototype)
  }

  /**
   * Serialize error for JSON output
   */
  toJSON(): SerializedError {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      stack: process.env.NODE_ENV !== 'production' ? this.stack : undefined,
      context: Object.keys(this.context).length > 0 ? this.context : undefined,
      cause: this.cause instanceof BenchmarkHistoryError ? this.cause.toJSON() : undefined,
    }
  }
}

// =============================================================================
// Validation Errors
// =============================================================================

/**
 * Error thrown when an argument or input value is invalid.
 */
export class ValidationError extends BenchmarkHistoryError {
  override readonly name: string = 'ValidationError'
  readonly field: string | undefined

  constructor(
    message: string,
    context?: { field?: string; value?: unknown },
    cause?: Error,
    code: ErrorCode = context?.field ? ErrorCode.INVALID_INPUT : ErrorCode.VALIDATION_FAILED
  ) {
    super(message, code, context, cause)
    this.field = context?.field
    Object.setPrototypeOf(this, new.target.prototype)
  }
}

/**
 * Error thrown when a results document cannot be parsed as JSON at all.
 * The run is not recorded.
 */
export class MalformedInputError extends ValidationError {
  override readonly name = 'MalformedInputError'
  readonly source: string | undefined

  constructor(message: string, source?: string, cause?: Error) {
    super(message, undefined, cause, ErrorCode.MALFORMED_INPUT)
    this.source = source
    if (source !== undefined) this.context.source = source
    Object.setPrototypeOf(this, MalformedInputError.prototype)
  }
}

// =============================================================================
// Not Found Errors
// =============================================================================

/**
 * Error thrown when a requested resource is not found.
 */
export class NotFoundError extends BenchmarkHistoryError {
  override readonly name: string = 'NotFoundError'

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.NOT_FOUND,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message, code, context, cause)
    Object.setPrototypeOf(this, new.target.prototype)
  }
}

/**
 * Error thrown when a run id does not exist in the store.
 */
export class RunNotFoundError extends NotFoundError {
  override readonly name = 'RunNotFoundError'
  readonly runId: number

  constructor(runId: number, cause?: Error) {
    super(`Run not found: #${runId}`, ErrorCode.RUN_NOT_FOUND, { runId }, cause)
    this.runId = runId
    Object.setPrototypeOf(this, RunNotFoundError.prototype)
  }
}

/**
 * Returned by the trend analyzer when a window holds no measurements.
 */
export class TrendDataNotFoundError extends NotFoundError {
  override readonly name = 'TrendDataNotFoundError'
  readonly framework: string
  readonly metric: string
  readonly windowDays: number

  constructor(framework: string, metric: string, windowDays: number) {
    super(
      `No ${metric} data found for ${framework} in the last ${windowDays} days`,
      ErrorCode.TREND_DATA_NOT_FOUND,
      { framework, metric, windowDays }
    )
    this.framework = framework
    this.metric = metric
    this.windowDays = windowDays
    Object.setPrototypeOf(this, TrendDataNotFoundError.prototype)
  }
}

// =============================================================================
// Conflict Errors
// =============================================================================

/**
 * Error thrown when a run would hold two records for the same framework and kind.
 */
export class ConflictError extends BenchmarkHistoryError {
  override readonly name = 'ConflictError'

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.CONFLICT,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message, code, context, cause)
    Object.setPrototypeOf(this, ConflictError.prototype)
  }
}

// =============================================================================
// Storage Errors
// =============================================================================

/**
 * Error thrown when a store operation fails.
 */
export class StorageError extends BenchmarkHistoryError {
  override readonly name: string = 'StorageError'
  readonly operation: string | undefined

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.STORAGE_ERROR,
    context?: { operation?: string; location?: string },
    cause?: Error
  ) {
    super(message, code, context, cause)
    this.operation = context?.operation
    Object.setPrototypeOf(this, new.target.prototype)
  }
}

/**
 * Error thrown when the store cannot be opened or written.
 * Fatal for `record`: no run id is returned and no run is visible.
 */
export class StoreUnavailableError extends StorageError {
  override readonly name = 'StoreUnavailableError'

  constructor(message: string, context?: { operation?: string; location?: string }, cause?: Error) {
    super(message, ErrorCode.STORAGE_UNAVAILABLE, context, cause)
    Object.setPrototypeOf(this, StoreUnavailableError.prototype)
  }
}

// =============================================================================
// Detection Errors
// =============================================================================

/**
 * Regression detection or alert writing failed after the run's metrics were
 * committed. The run stays recorded.
 */
export class AlertEmissionError extends BenchmarkHistoryError {
  override readonly name = 'AlertEmissionError'
  readonly runId: number

  constructor(runId: number, cause?: Error) {
    super(
      `Regression detection failed for run #${runId}${cause ? `: ${cause.message}` : ''}`,
      ErrorCode.ALERT_EMISSION_FAILED,
      { runId },
      cause
    )
    this.runId = runId
    Object.setPrototypeOf(this, AlertEmissionError.prototype)
  }
}

// =============================================================================
// Configuration Errors
// =============================================================================

/**
 * Error thrown when configuration is invalid.
 */
export class ConfigurationError extends BenchmarkHistoryError {
  override readonly name = 'ConfigurationError'
  readonly configKey: string | undefined

  constructor(message: string, configKey?: string, cause?: Error) {
    super(
      message,
      ErrorCode.INVALID_CONFIG,
      configKey !== undefined ? { configKey } : undefined,
      cause
    )
    this.configKey = configKey
    Object.setPrototypeOf(this, ConfigurationError.prototype)
  }
}

// =============================================================================
// Type Guards
// =============================================================================

/**
 * Check if an error is a BenchmarkHistoryError
 */
export function isBenchmarkHistoryError(error: unknown): error is BenchmarkHistoryError {
  return error instanceof BenchmarkHistoryError
}

/**
 * Check if an error is a ValidationError (or any subclass)
 */
export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError
}

/**
 * Check if an error is a NotFoundError (or any subclass)
 */
export function isNotFoundError(error: unknown): error is NotFoundError {
  return error instanceof NotFoundError ||
    (isBenchmarkHistoryError(error) && error.code.includes('NOT_FOUND'))
}

/**
 * Check if an error is a ConflictError
 */
export function isConflictError(error: unknown): error is ConflictError {
  return error instanceof ConflictError
}

/**
 * Check if an error is a StorageError (or any subclass)
 */
export function isStorageError(error: unknown): error is StorageError {
  return error instanceof StorageError ||
    (isBenchmarkHistoryError(error) && error.code.includes('STORAGE'))
}

// =============================================================================
// Error Factory Functions
// =============================================================================

/**
 * Wrap an unknown error in a BenchmarkHistoryError
 */
export function wrapError(error: unknown, context?: Record<string, unknown>): BenchmarkHistoryError {
  if (error instanceof BenchmarkHistoryError) {
    return error
  }

  if (error instanceof Error) {
    return new BenchmarkHistoryError(error.message, ErrorCode.INTERNAL, context, error)
  }

  return new BenchmarkHistoryError(String(error), ErrorCode.UNKNOWN, context)
}

/**
 * Normalize an unknown thrown value to an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error))
}
