/**
 * Trend Analyzer Tests
 */

import { describe, it, expect, beforeEach, vi } from 'vitest'
import { TrendDataNotFoundError, ValidationError } from '../../../src/errors'
import { MemoryHistoryStore } from '../../../src/history'
import { analyzeTrend, calculateHalfSplitTrend, calculateStats } from '../../../src/trends/analyzer'
import type { MetricValues, ResultKind } from '../../../src/types/benchmark'
import { isErr, isOk } from '../../../src/types/result'
import { setLogger } from '../../../src/utils/logger'
import { fixedClock, makeRecord, makeRun } from '../../helpers/fixtures'

describe('calculateStats', () => {
  it('should compute min, max, mean and population standard deviation', () => {
    expect(calculateStats([10, 10, 10, 20, 20, 20])).toEqual({ min: 10, max: 20, mean: 15, stdDev: 5 })
  })

  it('should return zeros for an empty series', () => {
    expect(calculateStats([])).toEqual({ min: 0, max: 0, mean: 0, stdDev: 0 })
  })

  it('should give a single value no deviation', () => {
    expect(calculateStats([7])).toEqual({ min: 7, max: 7, mean: 7, stdDev: 0 })
  })
})

describe('calculateHalfSplitTrend', () => {
  it('should call rising latency worsening', () => {
    expect(calculateHalfSplitTrend([10, 10, 10, 20, 20, 20], 'latency_ms')).toEqual({
      firstHalfMean: 10,
      secondHalfMean: 20,
      changePercent: 100,
      direction: 'worsening',
    })
  })

  it('should call rising throughput improving', () => {
    expect(calculateHalfSplitTrend([10, 10, 10, 20, 20, 20], 'throughput_ops_per_sec')?.direction).toBe('improving')
  })

  it('should call falling latency improving', () => {
    expect(calculateHalfSplitTrend([20, 10], 'latency_ms')).toEqual({
      firstHalfMean: 20,
      secondHalfMean: 10,
      changePercent: -50,
      direction: 'improving',
    })
  })

  it('should put the middle value of an odd series in the second half', () => {
    expect(calculateHalfSplitTrend([10, 20, 30], 'latency_ms')).toMatchObject({
      firstHalfMean: 10,
      secondHalfMean: 25,
      changePercent: 150,
    })
  })

  it('should call a change below 5% stable', () => {
    expect(calculateHalfSplitTrend([100, 104], 'latency_ms')?.direction).toBe('stable')
    expect(calculateHalfSplitTrend([100, 105], 'latency_ms')?.direction).toBe('worsening')
  })

  it('should honor a custom stable threshold', () => {
    expect(calculateHalfSplitTrend([100, 105], 'latency_ms', 10)?.direction).toBe('stable')
  })

  it('should report no change when the first half averages zero', () => {
    expect(calculateHalfSplitTrend([0, 10], 'latency_ms')).toEqual({
      firstHalfMean: 0,
      secondHalfMean: 10,
      changePercent: 0,
      direction: 'stable',
    })
  })

  it('should return null for fewer than two values', () => {
    expect(calculateHalfSplitTrend([5], 'latency_ms')).toBeNull()
    expect(calculateHalfSplitTrend([], 'latency_ms')).toBeNull()
  })
})

describe('analyzeTrend', () => {
  let store: MemoryHistoryStore
  const now = fixedClock('2024-06-10T00:00:00.000Z')

  function recordAt(day: string, metrics: Partial<MetricValues>, resultKind: ResultKind = 'integration'): number {
    return store.recordRun(makeRun(resultKind, { timestamp: `2024-06-${day}T00:00:00.000Z` }), [
      makeRecord('jackson', resultKind, metrics),
    ])
  }

  beforeEach(() => {
    store = new MemoryHistoryStore()
  })

  it('should report statistics and a worsening latency trend', () => {
    const values = [10, 10, 10, 20, 20, 20]
    values.forEach((value, i) => recordAt(`0${i + 1}`, { latency_ms: value }))

    const result = analyzeTrend(store, 'jackson', 'latency_ms', 30, { now })

    if (!isOk(result)) throw result.error
    expect(result.value).toMatchObject({
      framework: 'jackson',
      metric: 'latency_ms',
      windowDays: 30,
      resultKind: 'integration',
      count: 6,
      min: 10,
      max: 20,
      mean: 15,
      stdDev: 5,
      latest: 20,
      firstHalfMean: 10,
      secondHalfMean: 20,
      trendChangePercent: 100,
      direction: 'worsening',
    })
    expect(result.value.dataPoints.map(dp => dp.value)).toEqual(values)
    expect(result.value.dataPoints[0]).toEqual({
      runId: 1,
      timestamp: '2024-06-01T00:00:00.000Z',
      resultKind: 'integration',
      value: 10,
    })
  })

  it('should report an improving throughput trend', () => {
    ;[10, 10, 10, 20, 20, 20].forEach((value, i) => recordAt(`0${i + 1}`, { throughput_ops_per_sec: value }))

    const result = analyzeTrend(store, 'jackson', 'throughput_ops_per_sec', 30, { now })

    if (!isOk(result)) throw result.error
    expect(result.value.direction).toBe('improving')
  })

  it('should report no direction for a single point', () => {
    recordAt('05', { latency_ms: 12 })

    const result = analyzeTrend(store, 'jackson', 'latency_ms', 30, { now })

    if (!isOk(result)) throw result.error
    expect(result.value).toMatchObject({
      count: 1,
      latest: 12,
      mean: 12,
      stdDev: 0,
      firstHalfMean: null,
      secondHalfMean: null,
      trendChangePercent: null,
      direction: null,
    })
  })

  it('should include only points inside the window', () => {
    recordAt('01', { latency_ms: 5 })
    recordAt('08', { latency_ms: 7 })
    recordAt('09', { latency_ms: 9 })

    const result = analyzeTrend(store, 'jackson', 'latency_ms', 3, { now })

    if (!isOk(result)) throw result.error
    expect(result.value.dataPoints.map(dp => dp.value)).toEqual([7, 9])
  })

  it('should skip records where the metric was not measured', () => {
    recordAt('01', { latency_ms: 5 })
    recordAt('02', { latency_ms: null, p99_ms: 20 })
    recordAt('03', { latency_ms: 6 })

    const result = analyzeTrend(store, 'jackson', 'latency_ms', 30, { now })

    if (!isOk(result)) throw result.error
    expect(result.value.count).toBe(2)
    expect(result.value.latest).toBe(6)
  })

  it('should filter by result kind', () => {
    recordAt('01', { latency_ms: 50 }, 'integration')
    recordAt('02', { latency_ms: 2 }, 'microbenchmark')

    const result = analyzeTrend(store, 'jackson', 'latency_ms', 30, { now, resultKind: 'microbenchmark' })

    if (!isOk(result)) throw result.error
    expect(result.value.resultKind).toBe('microbenchmark')
    expect(result.value.dataPoints.map(dp => [dp.resultKind, dp.value])).toEqual([['microbenchmark', 2]])
  })

  it('should follow the most recent result kind when none is given', () => {
    const spy = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() }
    setLogger(spy)
    recordAt('01', { latency_ms: 4 }, 'microbenchmark')
    recordAt('02', { latency_ms: 50 }, 'integration')
    recordAt('03', { latency_ms: 2 }, 'microbenchmark')

    const result = analyzeTrend(store, 'jackson', 'latency_ms', 30, { now })

    if (!isOk(result)) throw result.error
    expect(result.value.resultKind).toBe('microbenchmark')
    expect(result.value.dataPoints.map(dp => dp.value)).toEqual([4, 2])
    expect(result.value.direction).toBe('improving')
    expect(spy.info).toHaveBeenCalledWith(
      'Trend for jackson latency_ms uses microbenchmark results; 1 results of another kind left out'
    )
  })

  it('should return TrendDataNotFoundError when the window is empty', () => {
    recordAt('01', { latency_ms: 5 })

    const result = analyzeTrend(store, 'ghost', 'latency_ms', 30, { now })

    expect(isErr(result)).toBe(true)
    if (!isErr(result)) return
    expect(result.error).toBeInstanceOf(TrendDataNotFoundError)
    expect(result.error.message).toBe('No latency_ms data found for ghost in the last 30 days')
  })

  it.each([0, -1, Number.NaN])('should reject a window of %s days', days => {
    expect(() => analyzeTrend(store, 'jackson', 'latency_ms', days, { now })).toThrow(ValidationError)
  })
})
