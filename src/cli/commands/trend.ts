/**
 * Trend Command
 *
 * Usage:
 *   benchmark-history trend <framework> [--metric <name>] [--days <n>] [--kind microbenchmark|integration]
 */

import { isErr } from '../../types/result'
import { withTracker } from '../../tracker'
import type { ParsedArgs } from '../types'
import { print, printError, printJson, resolveConfig } from '../types'
import { formatChange, formatValue } from '../utils'

export function trendCommand(parsed: ParsedArgs): number {
  const framework = parsed.args[0] ?? parsed.options.framework
  if (!framework) {
    printError('Missing framework')
    print('Usage: benchmark-history trend <framework> [--metric <name>] [--days <n>]')
    return 1
  }

  const config = resolveConfig(parsed)
  const result = withTracker(config, tracker =>
    tracker.trend(framework, parsed.options.metric, { days: parsed.options.days, resultKind: parsed.options.kind })
  )

  if (isErr(result)) {
    printError(result.error.message)
    return 1
  }

  const report = result.value
  if (parsed.options.format === 'json') {
    printJson(report, parsed)
    return 0
  }

  print(`Trend for ${report.framework} ${report.metric}, ${report.resultKind} (last ${report.windowDays} days)`)
  print(`  Data points: ${report.count}`)
  print(`  Mean:        ${formatValue(report.mean)}`)
  print(`  Min:         ${formatValue(report.min)}`)
  print(`  Max:         ${formatValue(report.max)}`)
  print(`  Std dev:     ${formatValue(report.stdDev)}`)
  print(`  Latest:      ${formatValue(report.latest)}`)
  if (report.direction === null || report.trendChangePercent === null) {
    print('  Trend:       not enough data')
  } else {
    print(`  Trend:       ${report.direction} (${formatChange(report.trendChangePercent)})`)
  }
  return 0
}
