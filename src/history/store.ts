/**
 * History Store Interface
 *
 * Append-only, durable store of benchmark runs, their per-framework metric
 * records and the regression alerts raised against them. All operations are
 * synchronous; a store handle is owned by one caller and closed explicitly.
 *
 * Ordering between runs is by `runId` (insertion order), never by the
 * producer-supplied timestamp, so backfilled timestamps cannot change which
 * run is "previous".
 *
 * @module history/store
 */

import { ConflictError, ErrorCode, StorageError, ValidationError } from '../errors'
import type {
  AlertSeverity,
  AlertType,
  BenchmarkRun,
  FrameworkHistoryEntry,
  FrameworkMetricRecord,
  ListAlertsOptions,
  ListRunsOptions,
  MetricName,
  NewBenchmarkRun,
  NewFrameworkMetricRecord,
  NewRegressionAlert,
  RegressionAlert,
  ResultKind,
  RunKind,
  StoreStats,
} from '../types/benchmark'
import { METRIC_NAMES, isAlertSeverity, isMetricName, isResultKind, isRunKind } from '../types/benchmark'

// =============================================================================
// Interface
// =============================================================================

export interface HistoryStore {
  /** Database file path, or ':memory:' */
  readonly location: string

  /** Append a run and return its id */
  insertRun(run: NewBenchmarkRun): number

  /**
   * Append metric records to an existing run. All-or-nothing.
   *
   * @throws RunNotFoundError if the run does not exist
   * @throws ConflictError if a (framework, resultKind) pair already exists for the run
   */
  insertMetrics(runId: number, records: readonly NewFrameworkMetricRecord[]): void

  /** Append a run and its records in one transaction */
  recordRun(run: NewBenchmarkRun, records: readonly NewFrameworkMetricRecord[]): number

  getRun(runId: number): BenchmarkRun | null

  /** Records of a run, in insertion order */
  getMetrics(runId: number): FrameworkMetricRecord[]

  /**
   * The greatest runId smaller than `runId` with the same run kind, or null
   *
   * @throws RunNotFoundError if `runId` does not exist
   */
  findPreviousComparableRun(runId: number): number | null

  getMetric(runId: number, framework: string, resultKind: ResultKind): FrameworkMetricRecord | null

  /** Runs newest first */
  listRuns(options: ListRunsOptions): BenchmarkRun[]

  /** Records of one framework in runs stamped at or after `since`, oldest first */
  getFrameworkHistory(framework: string, since: Date, resultKind?: ResultKind): FrameworkHistoryEntry[]

  /** Append an alert and return its id */
  insertAlert(alert: NewRegressionAlert): number

  /** Alerts newest first */
  listAlerts(options: ListAlertsOptions): RegressionAlert[]

  stats(): StoreStats

  close(): void
}

export interface HistoryStoreOptions {
  /** Clock used for `recordedAt` */
  now?: (() => Date) | undefined
}

// =============================================================================
// Input Validation
// =============================================================================

/**
 * Normalize an ISO-8601 timestamp to `toISOString()` form so that string
 * comparison matches time order.
 */
export function normalizeTimestamp(value: string, field = 'timestamp'): string {
  const parsed = new Date(value)
  if (Number.isNaN(parsed.getTime())) {
    throw new ValidationError(`Invalid ${field}: ${value}`, { field, value })
  }
  return parsed.toISOString()
}

export function assertLimit(limit: number): void {
  if (!Number.isInteger(limit) || limit < 0) {
    throw new ValidationError(`Invalid limit: ${limit}`, { field: 'limit', value: limit })
  }
}

function assertMetricValues(record: NewFrameworkMetricRecord): void {
  for (const name of METRIC_NAMES) {
    const value = record.metrics[name]
    if (value !== null && !Number.isFinite(value)) {
      throw new ValidationError(`Invalid ${name} for ${record.framework}: ${value}`, { field: name, value })
    }
  }
}

/**
 * Validate a batch of records for one run: non-empty framework names, finite
 * metric values, and no repeated (framework, resultKind) pair.
 */
export function validateRecords(runId: number, records: readonly NewFrameworkMetricRecord[]): void {
  const seen = new Set<string>()
  for (const record of records) {
    if (record.framework.trim() === '') {
      throw new ValidationError('Framework name must not be empty', { field: 'framework', value: record.framework })
    }
    assertMetricValues(record)
    const key = metricKey(record.framework, record.resultKind)
    if (seen.has(key)) {
      throw duplicateRecordError(runId, record.framework, record.resultKind)
    }
    seen.add(key)
  }
}

export function metricKey(framework: string, resultKind: ResultKind): string {
  return `${framework}\u0000${resultKind}`
}

export function duplicateRecordError(runId: number, framework: string, resultKind: ResultKind): ConflictError {
  return new ConflictError(
    `Run #${runId} already has a ${resultKind} record for ${framework}`,
    ErrorCode.UNIQUE_CONSTRAINT,
    { runId, framework, resultKind }
  )
}

// =============================================================================
// Stored Value Narrowing
// =============================================================================

function corrupt(column: string, value: string): StorageError {
  return new StorageError(`Unexpected ${column} value in store: ${value}`, ErrorCode.STORAGE_ERROR, {
    operation: 'read',
  })
}

export function readRunKind(value: string): RunKind {
  if (isRunKind(value)) return value
  throw corrupt('run_type', value)
}

export function readResultKind(value: string): ResultKind {
  if (isResultKind(value)) return value
  throw corrupt('result_type', value)
}

export function readMetricName(value: string): MetricName {
  if (isMetricName(value)) return value
  throw corrupt('metric', value)
}

export function readSeverity(value: string): AlertSeverity {
  if (isAlertSeverity(value)) return value
  throw corrupt('severity', value)
}

export function readAlertType(value: string): AlertType {
  if (value === 'regression' || value === 'improvement' || value === 'anomaly') return value
  throw corrupt('alert_type', value)
}
