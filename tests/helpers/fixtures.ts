/**
 * Test data builders for runs, metric records and results documents
 */

import type {
  MetricValues,
  NewBenchmarkRun,
  NewFrameworkMetricRecord,
  NewRegressionAlert,
  ResultKind,
  RunKind,
} from '../../src/types/benchmark'
import { emptyMetrics } from '../../src/types/benchmark'

/** A clock frozen at the given instant */
export function fixedClock(iso: string): () => Date {
  return () => new Date(iso)
}

export function makeRun(runKind: RunKind = 'integration', overrides: Partial<NewBenchmarkRun> = {}): NewBenchmarkRun {
  return {
    timestamp: '2024-06-01T12:00:00.000Z',
    runKind,
    totalFrameworks: 1,
    successfulFrameworks: 1,
    durationSeconds: null,
    notes: null,
    ...overrides,
  }
}

export function makeRecord(
  framework: string,
  resultKind: ResultKind = 'integration',
  metrics: Partial<MetricValues> = {}
): NewFrameworkMetricRecord {
  return { framework, resultKind, metrics: emptyMetrics(metrics) }
}

export function makeAlert(overrides: Partial<NewRegressionAlert> = {}): NewRegressionAlert {
  return {
    timestamp: '2024-06-01T12:00:00.000Z',
    runId: 2,
    baselineRunId: 1,
    framework: 'jackson',
    resultKind: 'integration',
    metric: 'latency_ms',
    alertType: 'regression',
    severity: 'warning',
    oldValue: 10,
    newValue: 12,
    changePercent: 20,
    message: 'jackson latency increased by 20.0%',
    ...overrides,
  }
}

export interface IntegrationFixture {
  avgResponseTimeMs?: number
  successRate?: number
  p50Ms?: number
  p95Ms?: number
  p99Ms?: number
  successfulTests?: number
}

/**
 * An integration results document with one MEDIUM scenario per framework
 */
export function integrationDocument(
  frameworks: Record<string, IntegrationFixture>,
  metadata: Record<string, unknown> = { timestamp: '2024-06-01T12:00:00Z' }
): Record<string, unknown> {
  const results: Record<string, unknown> = {}
  for (const [name, fixture] of Object.entries(frameworks)) {
    const summary: Record<string, unknown> = {}
    if (fixture.avgResponseTimeMs !== undefined) summary.avg_response_time_ms = fixture.avgResponseTimeMs
    if (fixture.successRate !== undefined) summary.success_rate = fixture.successRate
    const percentiles: Record<string, unknown> = {}
    if (fixture.p50Ms !== undefined) percentiles.p50_ms = fixture.p50Ms
    if (fixture.p95Ms !== undefined) percentiles.p95_ms = fixture.p95Ms
    if (fixture.p99Ms !== undefined) percentiles.p99_ms = fixture.p99Ms
    if (Object.keys(percentiles).length > 0) summary.percentiles = percentiles

    results[name] = {
      name,
      summary: { successful_tests: fixture.successfulTests ?? 0 },
      scenarios: { MEDIUM: { summary } },
    }
  }
  return { metadata, results }
}

/**
 * A microbenchmark results document with a roundtrip operation per framework
 */
export function microbenchmarkDocument(
  frameworks: Record<string, { score: number; unit: string }>,
  metadata: Record<string, unknown> = { timestamp: '2024-06-01T12:00:00Z' }
): Record<string, unknown> {
  const jmh: Record<string, unknown> = {}
  for (const [name, { score, unit }] of Object.entries(frameworks)) {
    jmh[name] = { roundtrip: { score, unit } }
  }
  return { metadata, jmh_results: jmh }
}
