/**
 * Result Document Shapes
 *
 * Benchmark drivers emit several document shapes. Classification happens
 * once, up front, producing a tagged union; field extraction then works
 * on the typed sections only.
 *
 * Recognized top-level keys:
 *   jmh_results                 microbenchmark section (keyed by framework, or a raw JMH array)
 *   results                     integration section (keyed by framework)
 *   integration_results.results integration section embedded in a combined report
 *   [ {benchmark, primaryMetric} ]  a raw JMH array as the whole document
 *
 * @module ingest/shapes
 */

import { isArray, isRecord, getNumber, getRecord, getString } from '../utils/json-validation'

// =============================================================================
// Types
// =============================================================================

/** Operation measurements of one framework, keyed by operation name */
export type OperationMap = Record<string, Record<string, unknown>>

export interface MicrobenchmarkEntry {
  framework: string
  operations: OperationMap
}

export interface IntegrationEntry {
  framework: string
  /** Raw per-framework integration object (summary, scenarios, ...) */
  entry: Record<string, unknown>
}

interface DocumentBase {
  metadata: Record<string, unknown> | undefined
}

export interface MicrobenchmarkDocument extends DocumentBase {
  kind: 'microbenchmark'
  microbenchmarks: MicrobenchmarkEntry[]
}

export interface IntegrationDocument extends DocumentBase {
  kind: 'integration'
  integration: IntegrationEntry[]
}

export interface CombinedDocument extends DocumentBase {
  kind: 'combined'
  microbenchmarks: MicrobenchmarkEntry[]
  integration: IntegrationEntry[]
}

export interface UnknownDocument extends DocumentBase {
  kind: 'unknown'
}

export type ResultDocument =
  | MicrobenchmarkDocument
  | IntegrationDocument
  | CombinedDocument
  | UnknownDocument

// =============================================================================
// Framework Names
// =============================================================================

const BENCHMARK_SUFFIX = 'Benchmark'

/**
 * Map a framework identifier onto its canonical name.
 * JMH class names drop their `Benchmark` suffix (`JacksonBenchmark` -> `Jackson`);
 * case is preserved.
 */
export function canonicalFrameworkName(raw: string): string {
  const name = raw.trim()
  if (name.length > BENCHMARK_SUFFIX.length && name.endsWith(BENCHMARK_SUFFIX)) {
    return name.slice(0, -BENCHMARK_SUFFIX.length)
  }
  return name
}

// =============================================================================
// Section Readers
// =============================================================================

/**
 * Operation names come from the input, so every one (`__proto__` included)
 * must land as an own key.
 */
function toOperationMap(operations: Map<string, Record<string, unknown>>): OperationMap {
  return Object.fromEntries(operations)
}

/**
 * Read a `jmh_results` object keyed by framework, then by operation
 */
function readMicrobenchmarkObject(section: Record<string, unknown>): MicrobenchmarkEntry[] {
  const entries: MicrobenchmarkEntry[] = []
  for (const [key, value] of Object.entries(section)) {
    if (!isRecord(value)) continue
    const operations = new Map<string, Record<string, unknown>>()
    for (const [operation, measurement] of Object.entries(value)) {
      if (isRecord(measurement)) operations.set(operation, measurement)
    }
    const framework = canonicalFrameworkName(key)
    if (framework) entries.push({ framework, operations: toOperationMap(operations) })
  }
  return entries
}

/**
 * Read raw JMH output: `[{ benchmark: 'pkg.JacksonBenchmark.serialize', primaryMetric: { score, scoreUnit } }]`
 */
function readMicrobenchmarkArray(section: unknown[]): MicrobenchmarkEntry[] {
  const byFramework = new Map<string, Map<string, Record<string, unknown>>>()

  for (const item of section) {
    if (!isRecord(item)) continue
    const benchmark = getString(item, 'benchmark')
    if (!benchmark) continue

    const parts = benchmark.split('.')
    if (parts.length < 2) continue
    const operation = parts[parts.length - 1]
    const className = parts[parts.length - 2]
    if (!operation || !className) continue

    const primaryMetric = getRecord(item, 'primaryMetric')
    const measurement: Record<string, unknown> = {}
    const score = getNumber(primaryMetric, 'score')
    const unit = getString(primaryMetric, 'scoreUnit')
    if (score !== undefined) measurement.score = score
    if (unit !== undefined) measurement.unit = unit

    const framework = canonicalFrameworkName(className)
    const operations = byFramework.get(framework) ?? new Map<string, Record<string, unknown>>()
    operations.set(operation, measurement)
    byFramework.set(framework, operations)
  }

  return Array.from(byFramework, ([framework, operations]) => ({
    framework,
    operations: toOperationMap(operations),
  }))
}

function readMicrobenchmarks(section: unknown): MicrobenchmarkEntry[] | undefined {
  if (isArray(section)) return readMicrobenchmarkArray(section)
  if (isRecord(section)) return readMicrobenchmarkObject(section)
  return undefined
}

/**
 * Read an integration section keyed by framework. The entry's `name` wins over its key.
 */
function readIntegration(section: Record<string, unknown>): IntegrationEntry[] {
  const entries: IntegrationEntry[] = []
  for (const [key, value] of Object.entries(section)) {
    if (!isRecord(value)) continue
    const framework = canonicalFrameworkName(getString(value, 'name') ?? key)
    if (framework) entries.push({ framework, entry: value })
  }
  return entries
}

function findIntegrationSection(document: Record<string, unknown>): Record<string, unknown> | undefined {
  return getRecord(document, 'results') ?? getRecord(getRecord(document, 'integration_results'), 'results')
}

// =============================================================================
// Classification
// =============================================================================

/**
 * Classify a parsed JSON value into one of the known document shapes.
 * Never throws; anything unrecognized is an UnknownDocument.
 */
export function classifyDocument(raw: unknown): ResultDocument {
  if (isArray(raw)) {
    return { kind: 'microbenchmark', metadata: undefined, microbenchmarks: readMicrobenchmarkArray(raw) }
  }

  if (!isRecord(raw)) {
    return { kind: 'unknown', metadata: undefined }
  }

  const metadata = getRecord(raw, 'metadata')
  const microbenchmarks = readMicrobenchmarks(raw.jmh_results)
  const integrationSection = findIntegrationSection(raw)
  const integration = integrationSection ? readIntegration(integrationSection) : undefined

  if (microbenchmarks && integration) {
    return { kind: 'combined', metadata, microbenchmarks, integration }
  }
  if (microbenchmarks) {
    return { kind: 'microbenchmark', metadata, microbenchmarks }
  }
  if (integration) {
    return { kind: 'integration', metadata, integration }
  }
  return { kind: 'unknown', metadata }
}
