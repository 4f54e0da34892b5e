/**
 * Benchmark History Data Model
 *
 * Runs, per-framework metric records and regression alerts, as they are
 * stored and returned by the history store.
 *
 * @module types/benchmark
 */

// =============================================================================
// Enumerations
// =============================================================================

/** Kind of a recorded run; only runs of the same kind are compared */
export type RunKind = 'microbenchmark' | 'integration' | 'combined' | 'unknown'

export const RUN_KINDS: readonly RunKind[] = ['microbenchmark', 'integration', 'combined', 'unknown']

/** Kind of a single framework measurement within a run */
export type ResultKind = 'microbenchmark' | 'integration'

export const RESULT_KINDS: readonly ResultKind[] = ['microbenchmark', 'integration']

/** Names of the numeric metrics tracked per framework */
export type MetricName =
  | 'latency_ms'
  | 'throughput_ops_per_sec'
  | 'success_rate_percent'
  | 'serialized_size_bytes'
  | 'compression_ratio'
  | 'p50_ms'
  | 'p95_ms'
  | 'p99_ms'

export const METRIC_NAMES: readonly MetricName[] = [
  'latency_ms',
  'throughput_ops_per_sec',
  'success_rate_percent',
  'serialized_size_bytes',
  'compression_ratio',
  'p50_ms',
  'p95_ms',
  'p99_ms',
]

/**
 * Metrics where a rising value is bad. Every other metric is higher-is-better.
 */
export const LOWER_IS_BETTER: ReadonlySet<MetricName> = new Set<MetricName>([
  'latency_ms',
  'p50_ms',
  'p95_ms',
  'p99_ms',
  'serialized_size_bytes',
])

export type AlertType = 'regression' | 'improvement' | 'anomaly'

export type AlertSeverity = 'critical' | 'warning' | 'info'

export const ALERT_SEVERITIES: readonly AlertSeverity[] = ['critical', 'warning', 'info']

// =============================================================================
// Runs
// =============================================================================

/** A run as produced by ingestion, before the store assigns an id */
export interface NewBenchmarkRun {
  /** Producer-supplied instant, normalized to UTC ISO-8601 */
  timestamp: string
  runKind: RunKind
  totalFrameworks: number
  successfulFrameworks: number
  durationSeconds: number | null
  notes: string | null
}

/** A stored run */
export interface BenchmarkRun extends NewBenchmarkRun {
  runId: number
  /** When the store accepted the run */
  recordedAt: string
}

// =============================================================================
// Metric Records
// =============================================================================

/**
 * Metric values for one framework. `null` means not measured, which is
 * distinct from a measured zero.
 */
export type MetricValues = Record<MetricName, number | null>

/** A framework measurement as produced by ingestion */
export interface NewFrameworkMetricRecord {
  framework: string
  resultKind: ResultKind
  metrics: MetricValues
}

/** A stored framework measurement */
export interface FrameworkMetricRecord extends NewFrameworkMetricRecord {
  runId: number
}

/** A stored measurement joined with the timestamp of its run */
export interface FrameworkHistoryEntry extends FrameworkMetricRecord {
  timestamp: string
  runKind: RunKind
}

/**
 * Create a MetricValues map with every metric unmeasured, then apply overrides
 */
export function emptyMetrics(overrides: Partial<MetricValues> = {}): MetricValues {
  return {
    latency_ms: null,
    throughput_ops_per_sec: null,
    success_rate_percent: null,
    serialized_size_bytes: null,
    compression_ratio: null,
    p50_ms: null,
    p95_ms: null,
    p99_ms: null,
    ...overrides,
  }
}

// =============================================================================
// Alerts
// =============================================================================

/** An alert as produced by the regression detector */
export interface NewRegressionAlert {
  /** Detection instant */
  timestamp: string
  runId: number
  baselineRunId: number
  framework: string
  resultKind: ResultKind
  metric: MetricName
  alertType: AlertType
  severity: AlertSeverity
  oldValue: number
  newValue: number
  changePercent: number
  message: string
}

/** A stored alert */
export interface RegressionAlert extends NewRegressionAlert {
  id: number
}

// =============================================================================
// Queries
// =============================================================================

export interface ListRunsOptions {
  /** Only runs that contain a record for this framework */
  framework?: string | undefined
  limit: number
}

export interface ListAlertsOptions {
  severity?: AlertSeverity | undefined
  framework?: string | undefined
  /** Only alerts at or after this instant */
  since?: Date | undefined
  limit: number
}

/** Row counts and size of a store */
export interface StoreStats {
  runs: number
  metrics: number
  alerts: number
  sizeBytes: number
  /** Database file path, or ':memory:' */
  location: string
}

// =============================================================================
// Type Guards
// =============================================================================

export function isMetricName(value: string): value is MetricName {
  return (METRIC_NAMES as readonly string[]).includes(value)
}

export function isAlertSeverity(value: string): value is AlertSeverity {
  return (ALERT_SEVERITIES as readonly string[]).includes(value)
}

export function isRunKind(value: string): value is RunKind {
  return (RUN_KINDS as readonly string[]).includes(value)
}

export function isResultKind(value: string): value is ResultKind {
  return (RESULT_KINDS as readonly string[]).includes(value)
}
