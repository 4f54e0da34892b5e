/**
 * Benchmark History Constants
 *
 * Centralized constants used throughout the codebase.
 * Eliminates magic numbers and provides single source of truth.
 */

// =============================================================================
// Regression Policy
// =============================================================================

/**
 * Percentage change beyond which a latency or throughput delta is classified
 * as a regression or improvement. The comparison is strict: exactly 10% is noise.
 */
export const REGRESSION_THRESHOLD_PCT = 10

/**
 * Percentage change beyond which a regression is classified as critical
 */
export const CRITICAL_THRESHOLD_PCT = 25

/**
 * Trend changes with an absolute value below this percentage are stable
 */
export const TREND_STABLE_THRESHOLD_PCT = 5

// =============================================================================
// Ingestion
// =============================================================================

/**
 * Microbenchmark operations used as the comparison point, in priority order
 */
export const MICROBENCHMARK_OPERATION_PRIORITY = ['roundtrip', 'serialize'] as const

/**
 * Integration scenario used as the canonical comparison basis across runs
 */
export const CANONICAL_SCENARIO = 'MEDIUM'

// =============================================================================
// Query Defaults
// =============================================================================

/**
 * Default number of runs returned by history queries
 */
export const DEFAULT_SHOW_LIMIT = 10

/**
 * Default number of alerts returned by alert queries
 */
export const DEFAULT_ALERT_LIMIT = 20

/**
 * Default trend window in days
 */
export const DEFAULT_TREND_DAYS = 30

/**
 * Runs and alerts included in an analysis summary
 */
export const ANALYZE_RUN_LIMIT = 20
export const ANALYZE_ALERT_LIMIT = 10

// =============================================================================
// Storage
// =============================================================================

/**
 * Default SQLite database file, relative to the working directory
 */
export const DEFAULT_DATABASE_PATH = 'benchmark_history.db'

/**
 * How long a writer waits for a lock held by another connection (ms)
 */
export const SQLITE_BUSY_TIMEOUT_MS = 5000

// =============================================================================
// Time / Size Units
// =============================================================================

/**
 * Bytes per kilobyte
 */
export const BYTES_PER_KB = 1024

/**
 * Milliseconds per second
 */
export const MS_PER_SECOND = 1000

/**
 * Milliseconds per day
 */
export const MS_PER_DAY = 24 * 60 * 60 * 1000
