/**
 * Stats Command
 *
 * Show history store statistics.
 *
 * Usage:
 *   benchmark-history stats
 */

import { withTracker } from '../../tracker'
import type { ParsedArgs } from '../types'
import { print, printJson, resolveConfig } from '../types'
import { formatBytes } from '../utils'

export function statsCommand(parsed: ParsedArgs): number {
  const config = resolveConfig(parsed)
  const stats = withTracker(config, tracker => tracker.stats())

  if (parsed.options.format === 'json') {
    printJson(stats, parsed)
    return 0
  }

  print(`Database: ${stats.location}`)
  print(`Size:     ${formatBytes(stats.sizeBytes)}`)
  print(`Runs:     ${stats.runs}`)
  print(`Results:  ${stats.metrics}`)
  print(`Alerts:   ${stats.alerts}`)
  return 0
}
