/**
 * Type exports
 *
 * @module types
 */

export * from './benchmark'
export * from './result'
