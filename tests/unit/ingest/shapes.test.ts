/**
 * Result Document Classification Tests
 */

import { describe, it, expect } from 'vitest'
import { canonicalFrameworkName, classifyDocument } from '../../../src/ingest/shapes'

describe('canonicalFrameworkName', () => {
  it('should strip a trailing Benchmark suffix', () => {
    expect(canonicalFrameworkName('JacksonBenchmark')).toBe('Jackson')
  })

  it('should keep a name that is only the suffix', () => {
    expect(canonicalFrameworkName('Benchmark')).toBe('Benchmark')
  })

  it('should trim whitespace and preserve case', () => {
    expect(canonicalFrameworkName('  ProtoBuf ')).toBe('ProtoBuf')
  })
})

describe('classifyDocument', () => {
  it('should classify a document with jmh_results as microbenchmark', () => {
    const doc = classifyDocument({ jmh_results: { Kryo: { roundtrip: { score: 1, unit: 'ops/s' } } } })

    expect(doc.kind).toBe('microbenchmark')
    if (doc.kind !== 'microbenchmark') return
    expect(doc.microbenchmarks).toEqual([{ framework: 'Kryo', operations: { roundtrip: { score: 1, unit: 'ops/s' } } }])
  })

  it('should classify a document with results as integration', () => {
    const doc = classifyDocument({ results: { avro: { summary: {} } } })

    expect(doc.kind).toBe('integration')
  })

  it('should classify a document with both sections as combined', () => {
    const doc = classifyDocument({
      jmh_results: { Avro: {} },
      integration_results: { results: { Avro: { scenarios: {} } } },
    })

    expect(doc.kind).toBe('combined')
    if (doc.kind !== 'combined') return
    expect(doc.microbenchmarks.map(e => e.framework)).toEqual(['Avro'])
    expect(doc.integration.map(e => e.framework)).toEqual(['Avro'])
  })

  it('should classify a raw JMH array as microbenchmark grouped by class', () => {
    const doc = classifyDocument([
      { benchmark: 'org.bench.JacksonBenchmark.serialize', primaryMetric: { score: 900, scoreUnit: 'ops/s' } },
      { benchmark: 'org.bench.JacksonBenchmark.roundtrip', primaryMetric: { score: 300, scoreUnit: 'ops/s' } },
      { benchmark: 'org.bench.AvroBenchmark.serialize', primaryMetric: { score: 2.5, scoreUnit: 'us/op' } },
      { benchmark: 'malformed' },
      'not an object',
    ])

    expect(doc).toEqual({
      kind: 'microbenchmark',
      metadata: undefined,
      microbenchmarks: [
        {
          framework: 'Jackson',
          operations: {
            serialize: { score: 900, unit: 'ops/s' },
            roundtrip: { score: 300, unit: 'ops/s' },
          },
        },
        { framework: 'Avro', operations: { serialize: { score: 2.5, unit: 'us/op' } } },
      ],
    })
  })

  it('should keep an operation named __proto__ as a plain entry', () => {
    const doc = classifyDocument(
      JSON.parse('{"jmh_results":{"Kryo":{"__proto__":{"roundtrip":{"score":1,"unit":"ms/op"}}}}}')
    )

    if (doc.kind !== 'microbenchmark') throw new Error(`unexpected kind ${doc.kind}`)
    const operations = doc.microbenchmarks[0]?.operations ?? {}
    expect(Object.keys(operations)).toEqual(['__proto__'])
    expect(Object.getPrototypeOf(operations)).toBe(Object.prototype)
    expect(Object.hasOwn(operations, 'roundtrip')).toBe(false)
  })

  it('should keep a raw JMH benchmark named __proto__ as a plain entry', () => {
    const doc = classifyDocument([
      { benchmark: 'org.bench.KryoBenchmark.__proto__', primaryMetric: { score: 1, scoreUnit: 'ms/op' } },
    ])

    if (doc.kind !== 'microbenchmark') throw new Error(`unexpected kind ${doc.kind}`)
    const operations = doc.microbenchmarks[0]?.operations ?? {}
    expect(Object.keys(operations)).toEqual(['__proto__'])
    expect(Object.getPrototypeOf(operations)).toBe(Object.prototype)
  })

  it('should prefer an integration entry name over its key', () => {
    const doc = classifyDocument({ results: { 'jackson-service': { name: 'Jackson' } } })

    if (doc.kind !== 'integration') throw new Error(`unexpected kind ${doc.kind}`)
    expect(doc.integration[0]?.framework).toBe('Jackson')
  })

  it('should skip framework entries that are not objects', () => {
    const doc = classifyDocument({ results: { jackson: { summary: {} }, broken: 17, empty: null } })

    if (doc.kind !== 'integration') throw new Error(`unexpected kind ${doc.kind}`)
    expect(doc.integration.map(e => e.framework)).toEqual(['jackson'])
  })

  it('should keep metadata when present', () => {
    const doc = classifyDocument({ metadata: { notes: 'x' }, results: {} })

    expect(doc.metadata).toEqual({ notes: 'x' })
  })

  it.each([
    ['an unrelated object', { foo: 'bar' }],
    ['a mistyped jmh_results', { jmh_results: 'oops' }],
    ['an array-valued results', { results: [] }],
    ['a number', 42],
    ['a string', 'hello'],
    ['null', null],
  ])('should classify %s as unknown', (_label, raw) => {
    expect(classifyDocument(raw).kind).toBe('unknown')
  })
})
