/**
 * benchmark-history
 *
 * Benchmark history store with regression detection: ingest benchmark
 * result documents, keep every run in SQLite, compare each run with the
 * previous comparable one, and analyze per-framework trends.
 *
 * @example
 * ```typescript
 * import { BenchmarkTracker, SqliteHistoryStore } from 'benchmark-history'
 *
 * const store = new SqliteHistoryStore('benchmark_history.db')
 * const tracker = new BenchmarkTracker(store)
 * const { runId, alerts } = tracker.recordFile('results.json')
 * store.close()
 * ```
 *
 * @packageDocumentation
 */

// Data model
export * from './types'

// Errors
export * from './errors'

// Ingestion
export * from './ingest'

// Storage
export * from './history'

// Detection and alerts
export * from './regression'
export * from './alerts'

// Trends
export * from './trends'

// Configuration
export * from './config'

// Command surface
export {
  BenchmarkTracker,
  withTracker,
  type AnalysisSummary,
  type RecordResult,
  type ShowOptions,
  type ShowResult,
  type TrackerOptions,
  type TrendCommandOptions,
} from './tracker'

// Logging
export { consoleLogger, noopLogger, setLogger, type Logger } from './utils/logger'

export * from './constants'
