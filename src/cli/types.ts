/**
 * CLI Types and Utilities
 *
 * Shared types and utility functions for the benchmark-history CLI.
 * This module is imported by commands without creating circular
 * dependencies.
 */

import type { BenchmarkHistoryConfig } from '../config/loader'
import { loadConfig } from '../config/loader'
import type { ParsedArgs } from './args'

export { parseArgs, VALID_FORMATS } from './args'
export type { OutputFormatType, ParsedArgs } from './args'

// =============================================================================
// Output Utilities
// =============================================================================

/**
 * Print to stdout
 */
export function print(message: string): void {
  process.stdout.write(message + '\n')
}

/**
 * Print to stderr
 */
export function printError(message: string): void {
  process.stderr.write('Error: ' + message + '\n')
}

/**
 * Print a warning to stderr
 */
export function printWarning(message: string): void {
  process.stderr.write('Warning: ' + message + '\n')
}

/**
 * Print a value as JSON, honoring --pretty
 */
export function printJson(value: unknown, parsed: ParsedArgs): void {
  print(JSON.stringify(value, null, parsed.options.pretty ? 2 : 0))
}

// =============================================================================
// Configuration
// =============================================================================

/**
 * Resolve configuration for a command: defaults, config file, environment, then --db
 */
export function resolveConfig(parsed: ParsedArgs): BenchmarkHistoryConfig {
  return loadConfig({
    configPath: parsed.options.config,
    overrides: { database: { path: parsed.options.db } },
  })
}
