/**
 * Analyze Command
 *
 * Summarize recent runs and alerts.
 *
 * Usage:
 *   benchmark-history analyze
 */

import { withTracker } from '../../tracker'
import type { ParsedArgs } from '../types'
import { print, printJson, resolveConfig } from '../types'
import { simpleTable } from '../utils'

export function analyzeCommand(parsed: ParsedArgs): number {
  const config = resolveConfig(parsed)
  const summary = withTracker(config, tracker => tracker.analyze())

  if (parsed.options.format === 'json') {
    printJson(summary, parsed)
    return 0
  }

  print(`Recent runs: ${summary.runs.length}`)
  if (summary.runs.length > 0) {
    print(
      simpleTable(
        ['Run', 'Timestamp', 'Kind', 'Frameworks', 'Successful'],
        summary.runs.map(run => [run.runId, run.timestamp, run.runKind, run.totalFrameworks, run.successfulFrameworks])
      )
    )
  }

  const { critical, warning, info } = summary.alertCounts
  print('')
  print(`Recent alerts: ${summary.alerts.length} (critical: ${critical}, warning: ${warning}, info: ${info})`)
  for (const alert of summary.alerts) {
    print(`  [${alert.severity}] ${alert.message}`)
  }
  return 0
}
