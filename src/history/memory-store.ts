/**
 * In-Memory History Store
 *
 * Non-durable HistoryStore for tests and dry runs. Same ordering, filtering
 * and error behavior as the SQLite store. Returned objects are copies.
 *
 * @module history/memory-store
 */

import { RunNotFoundError, StoreUnavailableError } from '../errors'
import type {
  BenchmarkRun,
  FrameworkHistoryEntry,
  FrameworkMetricRecord,
  ListAlertsOptions,
  ListRunsOptions,
  NewBenchmarkRun,
  NewFrameworkMetricRecord,
  NewRegressionAlert,
  RegressionAlert,
  ResultKind,
  StoreStats,
} from '../types/benchmark'
import type { HistoryStore, HistoryStoreOptions } from './store'
import { assertLimit, duplicateRecordError, metricKey, normalizeTimestamp, validateRecords } from './store'

function copyRecord(record: FrameworkMetricRecord): FrameworkMetricRecord {
  return { ...record, metrics: { ...record.metrics } }
}

/**
 * HistoryStore held in process memory
 */
export class MemoryHistoryStore implements HistoryStore {
  readonly location = ':memory:'
  private readonly now: () => Date
  private readonly runs: BenchmarkRun[] = []
  private readonly metrics: FrameworkMetricRecord[] = []
  private readonly alerts: RegressionAlert[] = []
  private nextRunId = 1
  private nextAlertId = 1
  private closed = false

  constructor(options: HistoryStoreOptions = {}) {
    this.now = options.now ?? (() => new Date())
  }

  insertRun(run: NewBenchmarkRun): number {
    this.assertOpen('insert run')
    const stored = this.prepareRun(run)
    this.appendRun(stored)
    return stored.runId
  }

  insertMetrics(runId: number, records: readonly NewFrameworkMetricRecord[]): void {
    this.assertOpen('insert metrics')
    if (!this.findRun(runId)) throw new RunNotFoundError(runId)
    this.checkRecords(runId, records)
    this.appendMetrics(runId, records)
  }

  recordRun(run: NewBenchmarkRun, records: readonly NewFrameworkMetricRecord[]): number {
    this.assertOpen('record run')
    const stored = this.prepareRun(run)
    // Validate everything before mutating so a failure leaves no run behind
    this.checkRecords(stored.runId, records)
    this.appendRun(stored)
    this.appendMetrics(stored.runId, records)
    return stored.runId
  }

  getRun(runId: number): BenchmarkRun | null {
    this.assertOpen('read run')
    const run = this.findRun(runId)
    return run ? { ...run } : null
  }

  getMetrics(runId: number): FrameworkMetricRecord[] {
    this.assertOpen('read metrics')
    return this.metrics.filter(m => m.runId === runId).map(copyRecord)
  }

  findPreviousComparableRun(runId: number): number | null {
    this.assertOpen('find comparable run')
    const run = this.findRun(runId)
    if (!run) throw new RunNotFoundError(runId)

    let previous: number | null = null
    for (const candidate of this.runs) {
      if (candidate.runId < runId && candidate.runKind === run.runKind) {
        if (previous === null || candidate.runId > previous) previous = candidate.runId
      }
    }
    return previous
  }

  getMetric(runId: number, framework: string, resultKind: ResultKind): FrameworkMetricRecord | null {
    this.assertOpen('read metric')
    const record = this.metrics.find(
      m => m.runId === runId && m.framework === framework && m.resultKind === resultKind
    )
    return record ? copyRecord(record) : null
  }

  listRuns(options: ListRunsOptions): BenchmarkRun[] {
    this.assertOpen('list runs')
    assertLimit(options.limit)
    const { framework } = options
    return this.runs
      .filter(run => framework === undefined || this.metrics.some(m => m.runId === run.runId && m.framework === framework))
      .sort((a, b) => b.runId - a.runId)
      .slice(0, options.limit)
      .map(run => ({ ...run }))
  }

  getFrameworkHistory(framework: string, since: Date, resultKind?: ResultKind): FrameworkHistoryEntry[] {
    this.assertOpen('read framework history')
    const cutoff = since.toISOString()
    const entries: FrameworkHistoryEntry[] = []

    for (const record of this.metrics) {
      if (record.framework !== framework) continue
      if (resultKind !== undefined && record.resultKind !== resultKind) continue
      const run = this.findRun(record.runId)
      if (!run || run.timestamp < cutoff) continue
      entries.push({ ...copyRecord(record), timestamp: run.timestamp, runKind: run.runKind })
    }

    return entries.sort((a, b) => {
      if (a.timestamp !== b.timestamp) return a.timestamp < b.timestamp ? -1 : 1
      return a.runId - b.runId
    })
  }

  insertAlert(alert: NewRegressionAlert): number {
    this.assertOpen('insert alert')
    const stored: RegressionAlert = { ...alert, timestamp: normalizeTimestamp(alert.timestamp), id: this.nextAlertId }
    this.nextAlertId++
    this.alerts.push(stored)
    return stored.id
  }

  listAlerts(options: ListAlertsOptions): RegressionAlert[] {
    this.assertOpen('list alerts')
    assertLimit(options.limit)
    const since = options.since?.toISOString()
    return this.alerts
      .filter(alert =>
        (options.severity === undefined || alert.severity === options.severity) &&
        (options.framework === undefined || alert.framework === options.framework) &&
        (since === undefined || alert.timestamp >= since)
      )
      .sort((a, b) => {
        if (a.timestamp !== b.timestamp) return a.timestamp < b.timestamp ? 1 : -1
        return b.id - a.id
      })
      .slice(0, options.limit)
      .map(alert => ({ ...alert }))
  }

  stats(): StoreStats {
    this.assertOpen('read stats')
    return {
      runs: this.runs.length,
      metrics: this.metrics.length,
      alerts: this.alerts.length,
      sizeBytes: Buffer.byteLength(JSON.stringify([this.runs, this.metrics, this.alerts])),
      location: this.location,
    }
  }

  close(): void {
    this.closed = true
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private assertOpen(operation: string): void {
    if (this.closed) {
      throw new StoreUnavailableError(`Cannot ${operation}: history store is closed`, {
        operation,
        location: this.location,
      })
    }
  }

  private findRun(runId: number): BenchmarkRun | undefined {
    return this.runs.find(run => run.runId === runId)
  }

  /** Build the stored run under the next id, without appending it */
  private prepareRun(run: NewBenchmarkRun): BenchmarkRun {
    return {
      ...run,
      timestamp: normalizeTimestamp(run.timestamp),
      runId: this.nextRunId,
      recordedAt: this.now().toISOString(),
    }
  }

  private appendRun(run: BenchmarkRun): void {
    this.runs.push(run)
    this.nextRunId = run.runId + 1
  }

  private checkRecords(runId: number, records: readonly NewFrameworkMetricRecord[]): void {
    validateRecords(runId, records)
    const existing = new Set(this.metrics.filter(m => m.runId === runId).map(m => metricKey(m.framework, m.resultKind)))
    for (const record of records) {
      if (existing.has(metricKey(record.framework, record.resultKind))) {
        throw duplicateRecordError(runId, record.framework, record.resultKind)
      }
    }
  }

  private appendMetrics(runId: number, records: readonly NewFrameworkMetricRecord[]): void {
    for (const record of records) {
      this.metrics.push({ runId, framework: record.framework, resultKind: record.resultKind, metrics: { ...record.metrics } })
    }
  }
}
