/**
 * SQLite History Store
 *
 * Durable HistoryStore on better-sqlite3. The database runs in WAL mode with
 * a busy timeout, so separate processes serialize their write transactions
 * while readers proceed. A run and its records commit in one transaction;
 * a failed commit leaves no visible run.
 *
 * @module history/sqlite-store
 */

import Database from 'better-sqlite3'
import { SQLITE_BUSY_TIMEOUT_MS } from '../constants'
import {
  ConflictError,
  ErrorCode,
  RunNotFoundError,
  StorageError,
  StoreUnavailableError,
  isBenchmarkHistoryError,
  toError,
} from '../errors'
import type {
  BenchmarkRun,
  FrameworkHistoryEntry,
  FrameworkMetricRecord,
  ListAlertsOptions,
  ListRunsOptions,
  MetricValues,
  NewBenchmarkRun,
  NewFrameworkMetricRecord,
  NewRegressionAlert,
  RegressionAlert,
  ResultKind,
  StoreStats,
} from '../types/benchmark'
import { METRIC_NAMES, emptyMetrics } from '../types/benchmark'
import { logger } from '../utils/logger'
import { SCHEMA } from './schema'
import type { HistoryStore, HistoryStoreOptions } from './store'
import {
  assertLimit,
  normalizeTimestamp,
  readAlertType,
  readMetricName,
  readResultKind,
  readRunKind,
  readSeverity,
  validateRecords,
} from './store'

// =============================================================================
// Row Types
// =============================================================================

interface RunRow {
  id: number
  timestamp: string
  run_type: string
  total_frameworks: number
  successful_frameworks: number
  duration_seconds: number | null
  notes: string | null
  recorded_at: string
}

type MetricRow = MetricValues & {
  run_id: number
  framework: string
  result_type: string
}

type HistoryRow = MetricRow & {
  timestamp: string
  run_type: string
}

interface AlertRow {
  id: number
  timestamp: string
  run_id: number
  baseline_run_id: number
  framework: string
  result_type: string
  metric: string
  alert_type: string
  severity: string
  old_value: number
  new_value: number
  change_percent: number
  message: string
}

type RunParams = Omit<RunRow, 'id'>

type MetricParams = MetricRow

type AlertParams = Omit<AlertRow, 'id'>

interface CountRow {
  count: number
}

// =============================================================================
// Row Mapping
// =============================================================================

function toRun(row: RunRow): BenchmarkRun {
  return {
    runId: row.id,
    timestamp: row.timestamp,
    runKind: readRunKind(row.run_type),
    totalFrameworks: row.total_frameworks,
    successfulFrameworks: row.successful_frameworks,
    durationSeconds: row.duration_seconds,
    notes: row.notes,
    recordedAt: row.recorded_at,
  }
}

function toMetrics(row: MetricValues): MetricValues {
  const metrics = emptyMetrics()
  for (const name of METRIC_NAMES) {
    metrics[name] = row[name]
  }
  return metrics
}

function toRecord(row: MetricRow): FrameworkMetricRecord {
  return {
    runId: row.run_id,
    framework: row.framework,
    resultKind: readResultKind(row.result_type),
    metrics: toMetrics(row),
  }
}

function toAlert(row: AlertRow): RegressionAlert {
  return {
    id: row.id,
    timestamp: row.timestamp,
    runId: row.run_id,
    baselineRunId: row.baseline_run_id,
    framework: row.framework,
    resultKind: readResultKind(row.result_type),
    metric: readMetricName(row.metric),
    alertType: readAlertType(row.alert_type),
    severity: readSeverity(row.severity),
    oldValue: row.old_value,
    newValue: row.new_value,
    changePercent: row.change_percent,
    message: row.message,
  }
}

/** SQLite extended result code of a driver error, e.g. SQLITE_CONSTRAINT_UNIQUE */
function sqliteCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code.startsWith('SQLITE_') ? error.code : undefined
  }
  return undefined
}

function openDatabase(path: string): Database.Database {
  let db: Database.Database | undefined
  try {
    db = new Database(path, { timeout: SQLITE_BUSY_TIMEOUT_MS })
    db.pragma('journal_mode = WAL')
    db.pragma('foreign_keys = ON')
    db.exec(SCHEMA)
    return db
  } catch (error) {
    const cause = toError(error)
    if (db?.open) db.close()
    throw new StoreUnavailableError(
      `Cannot open history store at ${path}: ${cause.message}`,
      { operation: 'open', location: path },
      cause
    )
  }
}

const METRIC_COLUMN_LIST = METRIC_NAMES.join(', ')
const METRIC_PARAM_LIST = METRIC_NAMES.map(name => `@${name}`).join(', ')

// =============================================================================
// SqliteHistoryStore
// =============================================================================

/**
 * HistoryStore backed by a SQLite database file (or `:memory:`).
 *
 * @example
 * ```typescript
 * const store = new SqliteHistoryStore('benchmark_history.db')
 * try {
 *   const runId = store.recordRun(run, records)
 * } finally {
 *   store.close()
 * }
 * ```
 */
export class SqliteHistoryStore implements HistoryStore {
  readonly location: string
  private readonly db: Database.Database
  private readonly now: () => Date

  private readonly insertRunStmt: Database.Statement<[RunParams]>
  private readonly insertMetricStmt: Database.Statement<[MetricParams]>
  private readonly insertAlertStmt: Database.Statement<[AlertParams]>
  private readonly getRunStmt: Database.Statement<[number], RunRow>
  private readonly getMetricsStmt: Database.Statement<[number], MetricRow>
  private readonly getMetricStmt: Database.Statement<[number, string, string], MetricRow>
  private readonly previousComparableStmt: Database.Statement<[string, number], { id: number }>

  private readonly recordTx: (run: RunParams, records: readonly NewFrameworkMetricRecord[]) => number
  private readonly insertMetricsTx: (runId: number, records: readonly NewFrameworkMetricRecord[]) => void

  constructor(path = ':memory:', options: HistoryStoreOptions = {}) {
    this.location = path
    this.now = options.now ?? (() => new Date())
    this.db = openDatabase(path)

    this.insertRunStmt = this.db.prepare<[RunParams]>(`
      INSERT INTO benchmark_runs
        (timestamp, run_type, total_frameworks, successful_frameworks, duration_seconds, notes, recorded_at)
      VALUES
        (@timestamp, @run_type, @total_frameworks, @successful_frameworks, @duration_seconds, @notes, @recorded_at)
    `)
    this.insertMetricStmt = this.db.prepare<[MetricParams]>(`
      INSERT INTO framework_results (run_id, framework, result_type, ${METRIC_COLUMN_LIST})
      VALUES (@run_id, @framework, @result_type, ${METRIC_PARAM_LIST})
    `)
    this.insertAlertStmt = this.db.prepare<[AlertParams]>(`
      INSERT INTO performance_alerts
        (timestamp, run_id, baseline_run_id, framework, result_type, metric, alert_type, severity,
         old_value, new_value, change_percent, message)
      VALUES
        (@timestamp, @run_id, @baseline_run_id, @framework, @result_type, @metric, @alert_type, @severity,
         @old_value, @new_value, @change_percent, @message)
    `)
    this.getRunStmt = this.db.prepare<[number], RunRow>('SELECT * FROM benchmark_runs WHERE id = ?')
    this.getMetricsStmt = this.db.prepare<[number], MetricRow>(
      'SELECT * FROM framework_results WHERE run_id = ? ORDER BY id'
    )
    this.getMetricStmt = this.db.prepare<[number, string, string], MetricRow>(
      'SELECT * FROM framework_results WHERE run_id = ? AND framework = ? AND result_type = ?'
    )
    this.previousComparableStmt = this.db.prepare<[string, number], { id: number }>(
      'SELECT id FROM benchmark_runs WHERE run_type = ? AND id < ? ORDER BY id DESC LIMIT 1'
    )

    this.insertMetricsTx = this.db.transaction((runId: number, records: readonly NewFrameworkMetricRecord[]) => {
      this.appendMetrics(runId, records)
    })
    this.recordTx = this.db.transaction((run: RunParams, records: readonly NewFrameworkMetricRecord[]) => {
      const runId = this.appendRun(run)
      this.appendMetrics(runId, records)
      return runId
    })
  }

  // ===========================================================================
  // Writes
  // ===========================================================================

  insertRun(run: NewBenchmarkRun): number {
    const params = this.toRunParams(run)
    return this.execute('insert run', () => this.appendRun(params))
  }

  insertMetrics(runId: number, records: readonly NewFrameworkMetricRecord[]): void {
    this.execute('insert metrics', () => this.insertMetricsTx(runId, records))
  }

  recordRun(run: NewBenchmarkRun, records: readonly NewFrameworkMetricRecord[]): number {
    const params = this.toRunParams(run)
    const runId = this.execute('record run', () => this.recordTx(params, records))
    logger.debug(`Recorded run #${runId} (${run.runKind}) with ${records.length} records`)
    return runId
  }

  insertAlert(alert: NewRegressionAlert): number {
    const params: AlertParams = {
      timestamp: normalizeTimestamp(alert.timestamp),
      run_id: alert.runId,
      baseline_run_id: alert.baselineRunId,
      framework: alert.framework,
      result_type: alert.resultKind,
      metric: alert.metric,
      alert_type: alert.alertType,
      severity: alert.severity,
      old_value: alert.oldValue,
      new_value: alert.newValue,
      change_percent: alert.changePercent,
      message: alert.message,
    }
    return this.execute('insert alert', () => Number(this.insertAlertStmt.run(params).lastInsertRowid))
  }

  // ===========================================================================
  // Reads
  // ===========================================================================

  getRun(runId: number): BenchmarkRun | null {
    const row = this.execute('read run', () => this.getRunStmt.get(runId))
    return row ? toRun(row) : null
  }

  getMetrics(runId: number): FrameworkMetricRecord[] {
    return this.execute('read metrics', () => this.getMetricsStmt.all(runId)).map(toRecord)
  }

  findPreviousComparableRun(runId: number): number | null {
    const run = this.getRun(runId)
    if (!run) throw new RunNotFoundError(runId)
    const row = this.execute('find comparable run', () => this.previousComparableStmt.get(run.runKind, runId))
    return row ? row.id : null
  }

  getMetric(runId: number, framework: string, resultKind: ResultKind): FrameworkMetricRecord | null {
    const row = this.execute('read metric', () => this.getMetricStmt.get(runId, framework, resultKind))
    return row ? toRecord(row) : null
  }

  listRuns(options: ListRunsOptions): BenchmarkRun[] {
    assertLimit(options.limit)
    const rows = this.execute('list runs', () => {
      if (options.framework === undefined) {
        return this.db
          .prepare<[number], RunRow>('SELECT * FROM benchmark_runs ORDER BY id DESC LIMIT ?')
          .all(options.limit)
      }
      return this.db
        .prepare<[string, number], RunRow>(`
          SELECT r.* FROM benchmark_runs r
          WHERE EXISTS (SELECT 1 FROM framework_results f WHERE f.run_id = r.id AND f.framework = ?)
          ORDER BY r.id DESC LIMIT ?
        `)
        .all(options.framework, options.limit)
    })
    return rows.map(toRun)
  }

  getFrameworkHistory(framework: string, since: Date, resultKind?: ResultKind): FrameworkHistoryEntry[] {
    const params: string[] = [framework, since.toISOString()]
    let sql = `
      SELECT f.*, r.timestamp AS timestamp, r.run_type AS run_type
      FROM framework_results f
      JOIN benchmark_runs r ON r.id = f.run_id
      WHERE f.framework = ? AND r.timestamp >= ?
    `
    if (resultKind !== undefined) {
      sql += ' AND f.result_type = ?'
      params.push(resultKind)
    }
    sql += ' ORDER BY r.timestamp ASC, r.id ASC, f.id ASC'

    const rows = this.execute('read framework history', () => this.db.prepare<string[], HistoryRow>(sql).all(...params))
    return rows.map(row => ({
      ...toRecord(row),
      timestamp: row.timestamp,
      runKind: readRunKind(row.run_type),
    }))
  }

  listAlerts(options: ListAlertsOptions): RegressionAlert[] {
    assertLimit(options.limit)
    const conditions: string[] = []
    const params: (string | number)[] = []

    if (options.severity !== undefined) {
      conditions.push('severity = ?')
      params.push(options.severity)
    }
    if (options.framework !== undefined) {
      conditions.push('framework = ?')
      params.push(options.framework)
    }
    if (options.since !== undefined) {
      conditions.push('timestamp >= ?')
      params.push(options.since.toISOString())
    }

    const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : ''
    const sql = `SELECT * FROM performance_alerts ${where} ORDER BY timestamp DESC, id DESC LIMIT ?`
    params.push(options.limit)

    const rows = this.execute('list alerts', () => this.db.prepare<(string | number)[], AlertRow>(sql).all(...params))
    return rows.map(toAlert)
  }

  stats(): StoreStats {
    return this.execute('read stats', () => {
      const count = (table: string): number =>
        this.db.prepare<[], CountRow>(`SELECT COUNT(*) AS count FROM ${table}`).get()?.count ?? 0
      const pageCount = this.db.pragma('page_count', { simple: true })
      const pageSize = this.db.pragma('page_size', { simple: true })

      return {
        runs: count('benchmark_runs'),
        metrics: count('framework_results'),
        alerts: count('performance_alerts'),
        sizeBytes: typeof pageCount === 'number' && typeof pageSize === 'number' ? pageCount * pageSize : 0,
        location: this.location,
      }
    })
  }

  close(): void {
    if (this.db.open) {
      this.db.close()
      logger.debug(`Closed history store at ${this.location}`)
    }
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private toRunParams(run: NewBenchmarkRun): RunParams {
    return {
      timestamp: normalizeTimestamp(run.timestamp),
      run_type: run.runKind,
      total_frameworks: run.totalFrameworks,
      successful_frameworks: run.successfulFrameworks,
      duration_seconds: run.durationSeconds,
      notes: run.notes,
      recorded_at: this.now().toISOString(),
    }
  }

  private appendRun(params: RunParams): number {
    return Number(this.insertRunStmt.run(params).lastInsertRowid)
  }

  private appendMetrics(runId: number, records: readonly NewFrameworkMetricRecord[]): void {
    if (!this.getRunStmt.get(runId)) throw new RunNotFoundError(runId)
    validateRecords(runId, records)
    for (const record of records) {
      this.insertMetricStmt.run({
        run_id: runId,
        framework: record.framework,
        result_type: record.resultKind,
        ...record.metrics,
      })
    }
  }

  /**
   * Run a store operation, translating driver failures into store errors
   */
  private execute<T>(operation: string, fn: () => T): T {
    if (!this.db.open) {
      throw new StoreUnavailableError(`Cannot ${operation}: history store is closed`, {
        operation,
        location: this.location,
      })
    }
    try {
      return fn()
    } catch (error) {
      throw this.translateError(operation, error)
    }
  }

  private translateError(operation: string, error: unknown): Error {
    if (isBenchmarkHistoryError(error)) return error

    const cause = toError(error)
    const code = sqliteCode(error)
    if (code === 'SQLITE_CONSTRAINT_UNIQUE') {
      return new ConflictError(`Cannot ${operation}: ${cause.message}`, ErrorCode.UNIQUE_CONSTRAINT, { operation }, cause)
    }
    if (code !== undefined) {
      return new StoreUnavailableError(
        `Cannot ${operation}: ${cause.message}`,
        { operation, location: this.location },
        cause
      )
    }
    return new StorageError(
      `Cannot ${operation}: ${cause.message}`,
      ErrorCode.STORAGE_WRITE_ERROR,
      { operation, location: this.location },
      cause
    )
  }
}
