/**
 * Show Command
 *
 * Show recent runs, or one framework's recent results.
 *
 * Usage:
 *   benchmark-history show [--framework <name>] [--limit <n>]
 */

import { withTracker } from '../../tracker'
import type { ParsedArgs } from '../types'
import { print, printJson, resolveConfig } from '../types'
import { formatValue, simpleTable } from '../utils'

export function showCommand(parsed: ParsedArgs): number {
  const config = resolveConfig(parsed)
  const { framework } = parsed.options
  const result = withTracker(config, tracker => tracker.show({ framework, limit: parsed.options.limit }))

  if (parsed.options.format === 'json') {
    printJson(result, parsed)
    return 0
  }

  if (result.runs.length === 0) {
    print(framework ? `No runs found for ${framework}` : 'No runs recorded')
    return 0
  }

  if (framework === undefined) {
    print(
      simpleTable(
        ['Run', 'Timestamp', 'Kind', 'Frameworks', 'Successful', 'Duration (s)'],
        result.runs.map(run => [
          run.runId,
          run.timestamp,
          run.runKind,
          run.totalFrameworks,
          run.successfulFrameworks,
          formatValue(run.durationSeconds, 1),
        ])
      )
    )
    return 0
  }

  const timestamps = new Map(result.runs.map(run => [run.runId, run.timestamp]))
  print(`History for ${framework}`)
  print(
    simpleTable(
      ['Run', 'Timestamp', 'Kind', 'Latency (ms)', 'Throughput (ops/s)', 'Success (%)'],
      result.frameworkResults.map(record => [
        record.runId,
        timestamps.get(record.runId) ?? '-',
        record.resultKind,
        formatValue(record.metrics.latency_ms),
        formatValue(record.metrics.throughput_ops_per_sec, 0),
        formatValue(record.metrics.success_rate_percent, 1),
      ])
    )
  )
  return 0
}
