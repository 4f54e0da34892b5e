/**
 * Result Type for Type-Safe Error Handling
 *
 * A Result<T, E> represents an operation that may succeed or fail without
 * throwing. Used where a failure is an expected outcome (no trend data in a
 * window, a JSON document that does not parse) rather than an exceptional one.
 *
 * @example
 * ```typescript
 * const result = analyzeTrend(store, 'jackson', 'latency_ms', 30)
 * if (isOk(result)) {
 *   console.log(result.value.mean)
 * } else {
 *   console.log(result.error.message)
 * }
 * ```
 */

// =============================================================================
// Core Result Type
// =============================================================================

/**
 * A discriminated union representing either a successful result (Ok) or a failure (Err).
 *
 * @typeParam T - The type of the success value
 * @typeParam E - The type of the error (defaults to Error)
 */
export type Result<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E }

// =============================================================================
// Constructors
// =============================================================================

/**
 * Creates a successful Result containing the given value.
 */
export const Ok = <T>(value: T): Result<T, never> => ({ ok: true, value })

/**
 * Creates a failed Result containing the given error.
 */
export const Err = <E>(error: E): Result<never, E> => ({ ok: false, error })

// =============================================================================
// Type Guards
// =============================================================================

/**
 * Type guard to check if a Result is in the Ok (success) state.
 */
export function isOk<T, E>(result: Result<T, E>): result is { ok: true; value: T } {
  return result.ok === true
}

/**
 * Type guard to check if a Result is in the Err (failure) state.
 */
export function isErr<T, E>(result: Result<T, E>): result is { ok: false; error: E } {
  return result.ok === false
}

// =============================================================================
// Utility Functions
// =============================================================================

/**
 * Wraps a function that may throw in a Result.
 */
export function tryCatch<T>(fn: () => T): Result<T, Error> {
  try {
    return Ok(fn())
  } catch (error) {
    return Err(error instanceof Error ? error : new Error(String(error)))
  }
}
