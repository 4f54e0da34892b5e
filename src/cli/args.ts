/**
 * CLI Argument Parser
 *
 * Pure functions for parsing command line arguments.
 * Value validation that needs no I/O happens here, so commands receive
 * typed options.
 */

import { ValidationError } from '../errors'
import type { AlertSeverity, MetricName, ResultKind } from '../types/benchmark'
import { ALERT_SEVERITIES, METRIC_NAMES, RESULT_KINDS, isAlertSeverity, isMetricName, isResultKind } from '../types/benchmark'

// =============================================================================
// Types
// =============================================================================

/**
 * Output format options
 */
export type OutputFormatType = 'table' | 'json'

/**
 * Valid format strings for CLI output
 */
export const VALID_FORMATS: readonly OutputFormatType[] = ['table', 'json']

/**
 * Parsed CLI arguments
 */
export interface ParsedArgs {
  command: string
  args: string[]
  options: {
    help: boolean
    version: boolean
    verbose: boolean
    format: OutputFormatType
    pretty: boolean
    /** SQLite database file, overriding config and environment */
    db?: string | undefined
    /** Explicit YAML config file */
    config?: string | undefined
    framework?: string | undefined
    severity?: AlertSeverity | undefined
    metric: MetricName
    days?: number | undefined
    limit?: number | undefined
    kind?: ResultKind | undefined
  }
}

// =============================================================================
// Parser
// =============================================================================

function isOutputFormat(value: string): value is OutputFormatType {
  return value === 'table' || value === 'json'
}

function requireValue(argv: string[], index: number, flag: string): string {
  const value = argv[index]
  if (value === undefined || value === '') {
    throw new ValidationError(`Missing value for ${flag}`, { field: flag })
  }
  return value
}

function parsePositiveInt(value: string, flag: string): number {
  const parsed = Number(value)
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new ValidationError(`Invalid ${flag}: ${value}`, { field: flag, value })
  }
  return parsed
}

/**
 * Parse command line arguments
 */
export function parseArgs(argv: string[]): ParsedArgs {
  const result: ParsedArgs = {
    command: '',
    args: [],
    options: {
      help: false,
      version: false,
      verbose: false,
      format: 'table',
      pretty: false,
      metric: 'latency_ms',
    },
  }

  let i = 0
  while (i < argv.length) {
    const arg = argv[i]

    if (!arg) {
      i++
      continue
    }

    // Handle flags
    if (arg.startsWith('-')) {
      switch (arg) {
        case '-h':
        case '--help':
          result.options.help = true
          break
        case '-v':
        case '--version':
          result.options.version = true
          break
        case '--verbose':
          result.options.verbose = true
          break
        case '-f':
        case '--format': {
          const format = requireValue(argv, ++i, arg)
          if (!isOutputFormat(format)) {
            throw new ValidationError(`Invalid format: ${format}. Valid formats: ${VALID_FORMATS.join(', ')}`, {
              field: 'format',
              value: format,
            })
          }
          result.options.format = format
          break
        }
        case '-p':
        case '--pretty':
          result.options.pretty = true
          break
        case '--db':
          result.options.db = requireValue(argv, ++i, arg)
          break
        case '-c':
        case '--config':
          result.options.config = requireValue(argv, ++i, arg)
          break
        case '--framework':
          result.options.framework = requireValue(argv, ++i, arg)
          break
        case '--severity': {
          const severity = requireValue(argv, ++i, arg)
          if (!isAlertSeverity(severity)) {
            throw new ValidationError(
              `Invalid severity: ${severity}. Valid severities: ${ALERT_SEVERITIES.join(', ')}`,
              { field: 'severity', value: severity }
            )
          }
          result.options.severity = severity
          break
        }
        case '-m':
        case '--metric': {
          const metric = requireValue(argv, ++i, arg)
          if (!isMetricName(metric)) {
            throw new ValidationError(`Invalid metric: ${metric}. Valid metrics: ${METRIC_NAMES.join(', ')}`, {
              field: 'metric',
              value: metric,
            })
          }
          result.options.metric = metric
          break
        }
        case '--kind': {
          const kind = requireValue(argv, ++i, arg)
          if (!isResultKind(kind)) {
            throw new ValidationError(`Invalid kind: ${kind}. Valid kinds: ${RESULT_KINDS.join(', ')}`, {
              field: 'kind',
              value: kind,
            })
          }
          result.options.kind = kind
          break
        }
        case '--days':
          result.options.days = parsePositiveInt(requireValue(argv, ++i, arg), 'days')
          break
        case '-l':
        case '--limit':
          result.options.limit = parsePositiveInt(requireValue(argv, ++i, arg), 'limit')
          break
        default:
          throw new ValidationError(`Unknown option: ${arg}`, { field: 'option', value: arg })
      }
    } else if (!result.command) {
      // First non-option is the command
      result.command = arg
    } else {
      // Rest are command arguments
      result.args.push(arg)
    }
    i++
  }

  return result
}
