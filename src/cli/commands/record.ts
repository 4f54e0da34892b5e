/**
 * Record Command
 *
 * Record a benchmark results file and report regressions against the
 * previous comparable run.
 *
 * Usage:
 *   benchmark-history record <file>
 */

import { withTracker } from '../../tracker'
import type { ParsedArgs } from '../types'
import { print, printError, printJson, printWarning, resolveConfig } from '../types'
import { formatChange } from '../utils'

export function recordCommand(parsed: ParsedArgs): number {
  const file = parsed.args[0]
  if (!file) {
    printError('Missing results file')
    print('Usage: benchmark-history record <file>')
    return 1
  }

  const config = resolveConfig(parsed)
  const result = withTracker(config, tracker => tracker.recordFile(file))

  if (result.alertError) {
    printWarning(`${result.alertError.message}. Run #${result.runId} is recorded.`)
  }

  if (parsed.options.format === 'json') {
    printJson(
      {
        runId: result.runId,
        run: result.run,
        records: result.records,
        alerts: result.alerts,
        alertError: result.alertError?.toJSON() ?? null,
      },
      parsed
    )
    return 0
  }

  const { run } = result
  print(
    `Recorded run #${result.runId} (${run.runKind}): ` +
      `${run.successfulFrameworks}/${run.totalFrameworks} frameworks successful`
  )
  if (result.alerts.length === 0 && !result.alertError) {
    print('No regressions detected')
  }
  for (const alert of result.alerts) {
    print(`  [${alert.severity}] ${alert.message} (${formatChange(alert.changePercent)})`)
  }
  return 0
}
