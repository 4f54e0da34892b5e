/**
 * Regression Detector
 *
 * Compares each record of a newly recorded run with the same framework's
 * record in the previous comparable run, and appends a classified alert for
 * every latency or throughput change beyond the regression threshold.
 *
 * Thresholds are strict: a change of exactly 10% is noise. A metric that is
 * unmeasured, zero or negative on either side is never compared.
 *
 * @module regression/detector
 */

import { AlertLog } from '../alerts/alert-log'
import { CRITICAL_THRESHOLD_PCT, REGRESSION_THRESHOLD_PCT } from '../constants'
import type { HistoryStore } from '../history/store'
import type { AlertSeverity, AlertType, FrameworkMetricRecord, MetricName, RegressionAlert } from '../types/benchmark'
import { LOWER_IS_BETTER } from '../types/benchmark'
import { logger } from '../utils/logger'

// =============================================================================
// Types
// =============================================================================

/** Percentage thresholds, both positive */
export interface RegressionThresholds {
  /** Changes beyond this are regressions or improvements */
  regression: number
  /** Regressions beyond this are critical */
  critical: number
}

export const DEFAULT_THRESHOLDS: RegressionThresholds = {
  regression: REGRESSION_THRESHOLD_PCT,
  critical: CRITICAL_THRESHOLD_PCT,
}

/** Metrics compared between runs */
export const DETECTED_METRICS = ['latency_ms', 'throughput_ops_per_sec'] as const satisfies readonly MetricName[]

export interface ChangeClassification {
  alertType: AlertType
  severity: AlertSeverity
  changePercent: number
}

export interface DetectOptions {
  thresholds?: RegressionThresholds | undefined
  /** Clock for alert timestamps */
  now?: (() => Date) | undefined
  /** Log to append alerts to; defaults to one over the same store */
  alertLog?: AlertLog | undefined
  /** Called with each alert once it is appended, before the next one is written */
  onAlert?: ((alert: RegressionAlert) => void) | undefined
}

// =============================================================================
// Classification
// =============================================================================

/**
 * Signed percentage change from `previous` to `current`
 */
export function percentChange(previous: number, current: number): number {
  return ((current - previous) * 100) / previous
}

function isComparable(value: number | null): value is number {
  return value !== null && value > 0
}

/**
 * Classify the change of one metric between two runs.
 * Returns null for noise or when either side cannot be compared.
 *
 * @example
 * ```typescript
 * classifyChange('latency_ms', 10, 13)
 * // { alertType: 'regression', severity: 'critical', changePercent: 30 }
 * ```
 */
export function classifyChange(
  metric: MetricName,
  previous: number | null,
  current: number | null,
  thresholds: RegressionThresholds = DEFAULT_THRESHOLDS
): ChangeClassification | null {
  if (!isComparable(previous) || !isComparable(current)) return null

  const changePercent = percentChange(previous, current)
  // Positive means worse, whichever way the metric points
  const worsening = LOWER_IS_BETTER.has(metric) ? changePercent : -changePercent

  if (worsening > thresholds.regression) {
    return {
      alertType: 'regression',
      severity: worsening > thresholds.critical ? 'critical' : 'warning',
      changePercent,
    }
  }
  if (worsening < -thresholds.regression) {
    return { alertType: 'improvement', severity: 'info', changePercent }
  }
  return null
}

const METRIC_LABELS: Partial<Record<MetricName, string>> = {
  latency_ms: 'latency',
  throughput_ops_per_sec: 'throughput',
}

/**
 * Human-readable alert message, e.g. "jackson latency increased by 30.0%"
 */
export function formatAlertMessage(framework: string, metric: MetricName, classification: ChangeClassification): string {
  const label = METRIC_LABELS[metric] ?? metric
  const magnitude = Math.abs(classification.changePercent).toFixed(1)
  if (classification.alertType === 'improvement') {
    return `${framework} ${label} improved by ${magnitude}%`
  }
  const direction = classification.changePercent > 0 ? 'increased' : 'decreased'
  return `${framework} ${label} ${direction} by ${magnitude}%`
}

// =============================================================================
// Detection
// =============================================================================

function compareRecords(
  previous: FrameworkMetricRecord,
  current: FrameworkMetricRecord,
  thresholds: RegressionThresholds
): Array<{ metric: MetricName; classification: ChangeClassification }> {
  const changes: Array<{ metric: MetricName; classification: ChangeClassification }> = []
  for (const metric of DETECTED_METRICS) {
    const classification = classifyChange(metric, previous.metrics[metric], current.metrics[metric], thresholds)
    if (classification) changes.push({ metric, classification })
  }
  return changes
}

/**
 * Detect regressions for a recorded run and append them to the alert log.
 * A run with no comparable predecessor is a baseline and raises nothing.
 *
 * @returns The alerts appended, in detection order
 */
export function detectRegressions(store: HistoryStore, runId: number, options: DetectOptions = {}): RegressionAlert[] {
  const thresholds = options.thresholds ?? DEFAULT_THRESHOLDS
  const alertLog = options.alertLog ?? new AlertLog(store)
  const now = options.now ?? (() => new Date())

  const records = store.getMetrics(runId)
  const baselineRunId = store.findPreviousComparableRun(runId)
  if (baselineRunId === null) {
    logger.debug(`Run #${runId} has no comparable predecessor; treating it as a baseline`)
    return []
  }

  const timestamp = now().toISOString()
  const emitted: RegressionAlert[] = []

  for (const record of records) {
    const previous = store.getMetric(baselineRunId, record.framework, record.resultKind)
    if (!previous) {
      logger.debug(`No baseline for ${record.framework} (${record.resultKind}) in run #${baselineRunId}`)
      continue
    }

    for (const { metric, classification } of compareRecords(previous, record, thresholds)) {
      const oldValue = previous.metrics[metric]
      const newValue = record.metrics[metric]
      if (oldValue === null || newValue === null) continue

      const alert = alertLog.emit({
        timestamp,
        runId,
        baselineRunId,
        framework: record.framework,
        resultKind: record.resultKind,
        metric,
        alertType: classification.alertType,
        severity: classification.severity,
        oldValue,
        newValue,
        changePercent: classification.changePercent,
        message: formatAlertMessage(record.framework, metric, classification),
      })
      emitted.push(alert)
      options.onAlert?.(alert)
    }
  }

  logger.debug(`Run #${runId} compared against run #${baselineRunId}: ${emitted.length} alerts`)
  return emitted
}
