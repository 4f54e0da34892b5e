/**
 * JSON Validation Utilities
 *
 * Type guards and tolerant accessors for walking loosely-typed JSON
 * documents. Accessors never throw: a missing or mistyped key reads as
 * undefined.
 *
 * @module utils/json-validation
 */

// =============================================================================
// Type Guards
// =============================================================================

/**
 * Check if a value is a plain object (not null, array, or other types)
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Check if a value is an array
 */
export function isArray(value: unknown): value is unknown[] {
  return Array.isArray(value)
}

/**
 * Check if a value is a string
 */
export function isString(value: unknown): value is string {
  return typeof value === 'string'
}

/**
 * Check if a value is a number (including finite check)
 */
export function isNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value)
}

// =============================================================================
// Accessors
// =============================================================================

/**
 * Read a nested object, or undefined if absent or not an object
 */
export function getRecord(
  source: Record<string, unknown> | undefined,
  key: string
): Record<string, unknown> | undefined {
  const value = source?.[key]
  return isRecord(value) ? value : undefined
}

/**
 * Read a finite number, or undefined if absent or not a finite number
 */
export function getNumber(source: Record<string, unknown> | undefined, key: string): number | undefined {
  const value = source?.[key]
  return isNumber(value) ? value : undefined
}

/**
 * Read a string, or undefined if absent or not a string
 */
export function getString(source: Record<string, unknown> | undefined, key: string): string | undefined {
  const value = source?.[key]
  return isString(value) ? value : undefined
}

/**
 * Return the first defined number among the given keys
 */
export function firstNumber(
  source: Record<string, unknown> | undefined,
  ...keys: string[]
): number | undefined {
  for (const key of keys) {
    const value = getNumber(source, key)
    if (value !== undefined) return value
  }
  return undefined
}
