/**
 * Result Normalization
 *
 * Turns a parsed results document into one BenchmarkRun and its
 * per-framework metric records. Tolerant by construction: every missing
 * or mistyped field reads as "not measured" (null), and an unrecognized
 * document still yields a run of kind `unknown` with no records.
 *
 * @module ingest/normalize
 */

import { CANONICAL_SCENARIO, MICROBENCHMARK_OPERATION_PRIORITY, MS_PER_SECOND } from '../constants'
import { MalformedInputError } from '../errors'
import type { MetricValues, NewBenchmarkRun, NewFrameworkMetricRecord } from '../types/benchmark'
import { emptyMetrics } from '../types/benchmark'
import { isErr, tryCatch } from '../types/result'
import { firstNumber, getNumber, getRecord, getString } from '../utils/json-validation'
import { logger } from '../utils/logger'
import { classifyDocument } from './shapes'
import type { IntegrationEntry, MicrobenchmarkEntry, OperationMap, ResultDocument } from './shapes'

// =============================================================================
// Types
// =============================================================================

export interface NormalizedRun {
  run: NewBenchmarkRun
  records: NewFrameworkMetricRecord[]
}

export interface NormalizeOptions {
  /** Clock used when the document carries no usable timestamp */
  now?: (() => Date) | undefined
}

// =============================================================================
// Parsing
// =============================================================================

/**
 * Parse raw results text as JSON.
 *
 * @param source - File name or label included in the error
 * @throws MalformedInputError when the text is not JSON
 */
export function parseResultDocument(text: string, source?: string): unknown {
  const parsed = tryCatch((): unknown => JSON.parse(text))
  if (isErr(parsed)) {
    const where = source ? ` in ${source}` : ''
    throw new MalformedInputError(`Invalid JSON${where}: ${parsed.error.message}`, source, parsed.error)
  }
  return parsed.value
}

// =============================================================================
// Microbenchmark Extraction
// =============================================================================

const THROUGHPUT_UNIT = /^ops\/(s|ms|us|ns)$/
const TIME_UNIT = /^(s|ms|us|ns)\/op$/

/** Multiplier from ops/<unit> to ops/s */
const OPS_PER_SECOND_FACTOR: Record<string, number> = { s: 1, ms: 1e3, us: 1e6, ns: 1e9 }

/** Multiplier from <unit>/op to ms/op */
const MS_PER_OP_FACTOR: Record<string, number> = { s: 1e3, ms: 1, us: 1e-3, ns: 1e-6 }

interface ScoredMeasurement {
  latencyMs?: number | undefined
  throughput?: number | undefined
}

/**
 * Convert a unit-tagged score. Throughput converts to latency as 1000 / ops-per-second;
 * a time score passes through as milliseconds.
 */
export function convertScore(score: number, unit: string): ScoredMeasurement {
  const throughputMatch = THROUGHPUT_UNIT.exec(unit)
  const throughputFactor = throughputMatch?.[1] ? OPS_PER_SECOND_FACTOR[throughputMatch[1]] : undefined
  if (throughputFactor !== undefined) {
    const throughput = score * throughputFactor
    return {
      throughput,
      latencyMs: throughput > 0 ? MS_PER_SECOND / throughput : undefined,
    }
  }

  const timeMatch = TIME_UNIT.exec(unit)
  const timeFactor = timeMatch?.[1] ? MS_PER_OP_FACTOR[timeMatch[1]] : undefined
  if (timeFactor !== undefined) {
    const latencyMs = score * timeFactor
    return {
      latencyMs,
      throughput: latencyMs > 0 ? MS_PER_SECOND / latencyMs : undefined,
    }
  }

  logger.warn(`Unrecognized microbenchmark unit: ${unit}`)
  return {}
}

/**
 * Pick the comparison operation: roundtrip, then serialize
 */
export function pickOperation(operations: OperationMap): Record<string, unknown> | undefined {
  for (const name of MICROBENCHMARK_OPERATION_PRIORITY) {
    if (!Object.hasOwn(operations, name)) continue
    const operation = operations[name]
    if (operation) return operation
  }
  return undefined
}

function extractMicrobenchmarkMetrics(entry: MicrobenchmarkEntry): MetricValues {
  const operation = pickOperation(entry.operations)
  if (!operation) {
    logger.debug(`No roundtrip or serialize operation for ${entry.framework}`)
    return emptyMetrics()
  }

  const score = firstNumber(operation, 'score', 'raw_score')
  const unit = getString(operation, 'unit') ?? getString(operation, 'scoreUnit')
  const scored = score !== undefined && unit !== undefined ? convertScore(score, unit) : {}

  return emptyMetrics({
    latency_ms: getNumber(operation, 'latency_ms') ?? scored.latencyMs ?? null,
    throughput_ops_per_sec: getNumber(operation, 'throughput_ops_per_sec') ?? scored.throughput ?? null,
  })
}

// =============================================================================
// Integration Extraction
// =============================================================================

/**
 * Extract metrics from the MEDIUM scenario, the only scenario compared across runs
 */
function extractIntegrationMetrics(entry: IntegrationEntry): MetricValues {
  const scenario = getRecord(getRecord(entry.entry, 'scenarios'), CANONICAL_SCENARIO)
  const summary = getRecord(scenario, 'summary')
  const percentiles = getRecord(summary, 'percentiles')
  const unified = getRecord(getRecord(scenario, 'v2_unified_result'), 'data')

  return emptyMetrics({
    latency_ms: getNumber(summary, 'avg_response_time_ms') ?? null,
    success_rate_percent: getNumber(summary, 'success_rate') ?? null,
    p50_ms: getNumber(percentiles, 'p50_ms') ?? getNumber(summary, 'p50_ms') ?? null,
    p95_ms: getNumber(percentiles, 'p95_ms') ?? getNumber(summary, 'p95_ms') ?? null,
    p99_ms: getNumber(percentiles, 'p99_ms') ?? getNumber(summary, 'p99_ms') ?? null,
    serialized_size_bytes: firstNumber(unified, 'averageSerializedSizeBytes', 'totalSizeBytes') ?? null,
    compression_ratio: getNumber(unified, 'averageCompressionRatio') ?? null,
  })
}

function reportsSuccessfulTests(entry: IntegrationEntry): boolean {
  return (getNumber(getRecord(entry.entry, 'summary'), 'successful_tests') ?? 0) > 0
}

// =============================================================================
// Normalization
// =============================================================================

function resolveTimestamp(metadata: Record<string, unknown> | undefined, now: () => Date): string {
  const raw = getString(metadata, 'timestamp')
  if (raw !== undefined) {
    const parsed = new Date(raw)
    if (!Number.isNaN(parsed.getTime())) return parsed.toISOString()
    logger.warn(`Ignoring unparseable run timestamp: ${raw}`)
  }
  return now().toISOString()
}

function collectRecords(document: ResultDocument): NewFrameworkMetricRecord[] {
  const records: NewFrameworkMetricRecord[] = []

  if (document.kind === 'microbenchmark' || document.kind === 'combined') {
    for (const entry of document.microbenchmarks) {
      records.push({
        framework: entry.framework,
        resultKind: 'microbenchmark',
        metrics: extractMicrobenchmarkMetrics(entry),
      })
    }
  }

  if (document.kind === 'integration' || document.kind === 'combined') {
    for (const entry of document.integration) {
      records.push({
        framework: entry.framework,
        resultKind: 'integration',
        metrics: extractIntegrationMetrics(entry),
      })
    }
  }

  // At most one record per (framework, kind); the first occurrence wins
  const seen = new Set<string>()
  return records.filter(record => {
    const key = `${record.framework}\u0000${record.resultKind}`
    if (seen.has(key)) {
      logger.warn(`Duplicate ${record.resultKind} result for ${record.framework}; keeping the first`)
      return false
    }
    seen.add(key)
    return true
  })
}

function countSuccessful(document: ResultDocument, records: NewFrameworkMetricRecord[]): number {
  const successful = new Set<string>()
  for (const record of records) {
    const { latency_ms, throughput_ops_per_sec } = record.metrics
    if ((latency_ms ?? 0) > 0 || (throughput_ops_per_sec ?? 0) > 0) {
      successful.add(record.framework)
    }
  }
  if (document.kind === 'integration' || document.kind === 'combined') {
    for (const entry of document.integration) {
      if (reportsSuccessfulTests(entry)) successful.add(entry.framework)
    }
  }
  return successful.size
}

/**
 * Normalize a classified document into a run and its records
 */
export function normalizeDocument(document: ResultDocument, options: NormalizeOptions = {}): NormalizedRun {
  const now = options.now ?? (() => new Date())
  const records = collectRecords(document)
  const durationSeconds = getNumber(document.metadata, 'duration_seconds')

  const run: NewBenchmarkRun = {
    timestamp: resolveTimestamp(document.metadata, now),
    runKind: document.kind,
    totalFrameworks: new Set(records.map(r => r.framework)).size,
    successfulFrameworks: countSuccessful(document, records),
    durationSeconds: durationSeconds ?? null,
    notes: getString(document.metadata, 'notes') ?? null,
  }

  logger.debug(`Normalized ${run.runKind} run with ${records.length} records`)
  return { run, records }
}

/**
 * Normalize an arbitrary parsed results document. Never throws.
 *
 * @example
 * ```typescript
 * const { run, records } = normalize(parseResultDocument(text))
 * ```
 */
export function normalize(raw: unknown, options: NormalizeOptions = {}): NormalizedRun {
  return normalizeDocument(classifyDocument(raw), options)
}
