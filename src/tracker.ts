/**
 * Benchmark Tracker
 *
 * The command surface over one history store handle: record a results
 * document (ingest, store, detect), and query history, alerts, trends and
 * store statistics. The handle is passed in explicitly; `withTracker` scopes
 * opening and closing it around a single command.
 *
 * Recording is synchronous once the document is in memory, so nothing else
 * in the process interleaves between storing a run and detecting its
 * regressions. Separate processes are serialized per transaction by SQLite.
 *
 * @module tracker
 */

import { readFileSync } from 'node:fs'
import { ANALYZE_ALERT_LIMIT, ANALYZE_RUN_LIMIT } from './constants'
import type { BenchmarkHistoryConfig } from './config/loader'
import { getDefaultConfig } from './config/loader'
import { AlertLog } from './alerts/alert-log'
import type { AlertQuery } from './alerts/alert-log'
import { AlertEmissionError, ErrorCode, NotFoundError, RunNotFoundError, toError, wrapError } from './errors'
import type { TrendDataNotFoundError } from './errors'
import type { HistoryStore } from './history/store'
import { SqliteHistoryStore } from './history/sqlite-store'
import { normalize, parseResultDocument } from './ingest/normalize'
import { detectRegressions } from './regression/detector'
import { analyzeTrend } from './trends/analyzer'
import type { TrendReport } from './trends/analyzer'
import type {
  AlertSeverity,
  BenchmarkRun,
  FrameworkMetricRecord,
  MetricName,
  RegressionAlert,
  ResultKind,
  StoreStats,
} from './types/benchmark'
import type { Result } from './types/result'
import { logger } from './utils/logger'

// =============================================================================
// Types
// =============================================================================

export interface TrackerOptions {
  /** Thresholds and query defaults; defaults to the built-in configuration */
  config?: BenchmarkHistoryConfig | undefined
  /** Clock for run fallbacks, alert timestamps and trend windows */
  now?: (() => Date) | undefined
}

export interface RecordResult {
  runId: number
  run: BenchmarkRun
  records: FrameworkMetricRecord[]
  alerts: RegressionAlert[]
  /** Set when detection failed after the run was stored; the run stays recorded */
  alertError: AlertEmissionError | null
}

export interface ShowOptions {
  framework?: string | undefined
  limit?: number | undefined
}

export interface ShowResult {
  runs: BenchmarkRun[]
  /** The framework's records in `runs`, newest run first; empty without a framework */
  frameworkResults: FrameworkMetricRecord[]
}

export interface TrendCommandOptions {
  days?: number | undefined
  resultKind?: ResultKind | undefined
}

export interface AnalysisSummary {
  runs: BenchmarkRun[]
  alerts: RegressionAlert[]
  alertCounts: Record<AlertSeverity, number>
}

// =============================================================================
// Tracker
// =============================================================================

export class BenchmarkTracker {
  readonly alertLog: AlertLog
  private readonly config: BenchmarkHistoryConfig
  private readonly now: () => Date

  constructor(readonly store: HistoryStore, options: TrackerOptions = {}) {
    this.config = options.config ?? getDefaultConfig()
    this.now = options.now ?? (() => new Date())
    this.alertLog = new AlertLog(store)
  }

  /**
   * Record a parsed results document and detect regressions against the
   * previous comparable run.
   *
   * @throws StoreUnavailableError if the run cannot be stored; nothing is recorded
   */
  record(document: unknown): RecordResult {
    const normalized = normalize(document, { now: this.now })
    const runId = this.store.recordRun(normalized.run, normalized.records)
    logger.info(`Recorded run #${runId} (${normalized.run.runKind}, ${normalized.records.length} results)`)

    const alerts: RegressionAlert[] = []
    let alertError: AlertEmissionError | null = null
    try {
      detectRegressions(this.store, runId, {
        thresholds: this.config.thresholds,
        now: this.now,
        alertLog: this.alertLog,
        onAlert: (alert) => alerts.push(alert),
      })
    } catch (error) {
      alertError = new AlertEmissionError(runId, toError(error))
      logger.error(alertError.message, error)
    }

    const run = this.store.getRun(runId)
    if (!run) throw new RunNotFoundError(runId)

    return { runId, run, records: this.store.getMetrics(runId), alerts, alertError }
  }

  /**
   * Parse and record raw results text
   *
   * @throws MalformedInputError if the text is not JSON
   */
  recordText(text: string, source?: string): RecordResult {
    return this.record(parseResultDocument(text, source))
  }

  /**
   * Read, parse and record a results file
   */
  recordFile(path: string): RecordResult {
    let text: string
    try {
      text = readFileSync(path, 'utf-8')
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        throw new NotFoundError(`Results file not found: ${path}`, ErrorCode.FILE_NOT_FOUND, { path }, error)
      }
      throw wrapError(error, { path })
    }
    return this.recordText(text, path)
  }

  /**
   * Recent runs, optionally only those containing a framework
   */
  show(options: ShowOptions = {}): ShowResult {
    const runs = this.store.listRuns({
      framework: options.framework,
      limit: options.limit ?? this.config.defaults.showLimit,
    })
    const { framework } = options
    const frameworkResults =
      framework === undefined
        ? []
        : runs.flatMap(run => this.store.getMetrics(run.runId).filter(r => r.framework === framework))
    return { runs, frameworkResults }
  }

  alerts(query: AlertQuery = {}): RegressionAlert[] {
    return this.alertLog.list({ ...query, limit: query.limit ?? this.config.defaults.alertLimit })
  }

  trend(
    framework: string,
    metric: MetricName,
    options: TrendCommandOptions = {}
  ): Result<TrendReport, TrendDataNotFoundError> {
    return analyzeTrend(this.store, framework, metric, options.days ?? this.config.defaults.trendDays, {
      resultKind: options.resultKind,
      stableThreshold: this.config.thresholds.trendStable,
      now: this.now,
    })
  }

  stats(): StoreStats {
    return this.store.stats()
  }

  /**
   * Recent runs and alerts, with alert counts by severity
   */
  analyze(): AnalysisSummary {
    const runs = this.store.listRuns({ limit: ANALYZE_RUN_LIMIT })
    const alerts = this.alertLog.list({ limit: ANALYZE_ALERT_LIMIT })
    const alertCounts: Record<AlertSeverity, number> = { critical: 0, warning: 0, info: 0 }
    for (const alert of alerts) {
      alertCounts[alert.severity]++
    }
    return { runs, alerts, alertCounts }
  }
}

// =============================================================================
// Scoped Access
// =============================================================================

/**
 * Open the configured SQLite store, run `fn` with a tracker over it, and
 * close the store whatever happens.
 *
 * @example
 * ```typescript
 * const result = withTracker(loadConfig(), tracker => tracker.recordFile('results.json'))
 * ```
 */
export function withTracker<T>(
  config: BenchmarkHistoryConfig,
  fn: (tracker: BenchmarkTracker) => T,
  options: Omit<TrackerOptions, 'config'> = {}
): T {
  const store = new SqliteHistoryStore(config.database.path, { now: options.now })
  try {
    return fn(new BenchmarkTracker(store, { config, now: options.now }))
  } finally {
    store.close()
  }
}
