/**
 * Trend Analyzer
 *
 * Windowed statistics over one framework's history for one metric, with a
 * first-half against second-half trend. Fewer than two points give no
 * direction. A series holds one result kind: without an explicit kind it
 * follows the kind of the framework's most recent point.
 *
 * @module trends/analyzer
 */

import { MS_PER_DAY, TREND_STABLE_THRESHOLD_PCT } from '../constants'
import { TrendDataNotFoundError, ValidationError } from '../errors'
import type { HistoryStore } from '../history/store'
import type { MetricName, ResultKind } from '../types/benchmark'
import { LOWER_IS_BETTER } from '../types/benchmark'
import type { Result } from '../types/result'
import { Err, Ok } from '../types/result'
import { logger } from '../utils/logger'

// =============================================================================
// Types
// =============================================================================

/** Trend direction, from the point of view of the metric's polarity */
export type TrendDirection = 'improving' | 'worsening' | 'stable'

/** A single data point in a trend series */
export interface TrendDataPoint {
  runId: number
  timestamp: string
  resultKind: ResultKind
  value: number
}

export interface SeriesStats {
  min: number
  max: number
  mean: number
  stdDev: number
}

export interface TrendReport extends SeriesStats {
  framework: string
  metric: MetricName
  windowDays: number
  resultKind: ResultKind
  count: number
  latest: number
  firstHalfMean: number | null
  secondHalfMean: number | null
  /** Null when the window holds fewer than two points */
  trendChangePercent: number | null
  direction: TrendDirection | null
  dataPoints: TrendDataPoint[]
}

export interface TrendOptions {
  /** Only records of this kind; defaults to the kind of the most recent record */
  resultKind?: ResultKind | undefined
  /** Changes with an absolute value below this percentage are stable */
  stableThreshold?: number | undefined
  now?: (() => Date) | undefined
}

export interface HalfSplitTrend {
  firstHalfMean: number
  secondHalfMean: number
  changePercent: number
  direction: TrendDirection
}

// =============================================================================
// Statistics
// =============================================================================

function average(values: readonly number[]): number {
  return values.reduce((a, b) => a + b, 0) / values.length
}

/**
 * Calculate statistics for a series of values
 */
export function calculateStats(values: readonly number[]): SeriesStats {
  if (values.length === 0) {
    return { min: 0, max: 0, mean: 0, stdDev: 0 }
  }

  const min = Math.min(...values)
  const max = Math.max(...values)
  const mean = average(values)

  const squaredDiffs = values.map(v => (v - mean) ** 2)
  const stdDev = Math.sqrt(average(squaredDiffs))

  return { min, max, mean, stdDev }
}

/**
 * Compare the mean of the first half of a series with the mean of the
 * second half. For odd lengths the middle value belongs to the second half.
 * Returns null for fewer than two values.
 */
export function calculateHalfSplitTrend(
  values: readonly number[],
  metric: MetricName,
  stableThreshold: number = TREND_STABLE_THRESHOLD_PCT
): HalfSplitTrend | null {
  if (values.length < 2) return null

  const mid = Math.floor(values.length / 2)
  const firstHalfMean = average(values.slice(0, mid))
  const secondHalfMean = average(values.slice(mid))
  const changePercent = firstHalfMean === 0 ? 0 : ((secondHalfMean - firstHalfMean) * 100) / firstHalfMean

  let direction: TrendDirection
  if (Math.abs(changePercent) < stableThreshold) {
    direction = 'stable'
  } else {
    const rising = changePercent > 0
    direction = rising === LOWER_IS_BETTER.has(metric) ? 'worsening' : 'improving'
  }

  return { firstHalfMean, secondHalfMean, changePercent, direction }
}

// =============================================================================
// Analysis
// =============================================================================

/**
 * Analyze the trend of one metric for one framework over the last `windowDays`.
 *
 * @throws ValidationError if `windowDays` is not a positive number
 */
export function analyzeTrend(
  store: HistoryStore,
  framework: string,
  metric: MetricName,
  windowDays: number,
  options: TrendOptions = {}
): Result<TrendReport, TrendDataNotFoundError> {
  if (!Number.isFinite(windowDays) || windowDays <= 0) {
    throw new ValidationError(`Invalid trend window: ${windowDays} days`, { field: 'days', value: windowDays })
  }

  const now = options.now ?? (() => new Date())
  const since = new Date(now().getTime() - windowDays * MS_PER_DAY)

  const measured: TrendDataPoint[] = []
  for (const entry of store.getFrameworkHistory(framework, since, options.resultKind)) {
    const value = entry.metrics[metric]
    if (value === null) continue
    measured.push({ runId: entry.runId, timestamp: entry.timestamp, resultKind: entry.resultKind, value })
  }

  const latestPoint = measured.at(-1)
  if (!latestPoint) {
    return Err(new TrendDataNotFoundError(framework, metric, windowDays))
  }

  const resultKind = options.resultKind ?? latestPoint.resultKind
  const dataPoints = measured.filter(dp => dp.resultKind === resultKind)
  if (dataPoints.length < measured.length) {
    logger.info(
      `Trend for ${framework} ${metric} uses ${resultKind} results; ` +
        `${measured.length - dataPoints.length} results of another kind left out`
    )
  }

  const values = dataPoints.map(dp => dp.value)
  const trend = calculateHalfSplitTrend(values, metric, options.stableThreshold)

  return Ok({
    framework,
    metric,
    windowDays,
    resultKind,
    count: values.length,
    ...calculateStats(values),
    latest: latestPoint.value,
    firstHalfMean: trend?.firstHalfMean ?? null,
    secondHalfMean: trend?.secondHalfMean ?? null,
    trendChangePercent: trend?.changePercent ?? null,
    direction: trend?.direction ?? null,
    dataPoints,
  })
}
