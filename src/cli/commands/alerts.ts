/**
 * Alerts Command
 *
 * Usage:
 *   benchmark-history alerts [--severity critical|warning|info] [--framework <name>] [--limit <n>]
 */

import { withTracker } from '../../tracker'
import type { ParsedArgs } from '../types'
import { print, printJson, resolveConfig } from '../types'
import { formatChange, simpleTable } from '../utils'

export function alertsCommand(parsed: ParsedArgs): number {
  const config = resolveConfig(parsed)
  const alerts = withTracker(config, tracker =>
    tracker.alerts({
      severity: parsed.options.severity,
      framework: parsed.options.framework,
      limit: parsed.options.limit,
    })
  )

  if (parsed.options.format === 'json') {
    printJson(alerts, parsed)
    return 0
  }

  if (alerts.length === 0) {
    print('No alerts')
    return 0
  }

  print(
    simpleTable(
      ['Timestamp', 'Severity', 'Type', 'Framework', 'Metric', 'Change', 'Message'],
      alerts.map(alert => [
        alert.timestamp,
        alert.severity,
        alert.alertType,
        alert.framework,
        alert.metric,
        formatChange(alert.changePercent),
        alert.message,
      ])
    )
  )
  return 0
}
