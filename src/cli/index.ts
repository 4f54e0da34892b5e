#!/usr/bin/env node
/**
 * benchmark-history CLI
 *
 * Records benchmark result files, detects regressions against the previous
 * comparable run, and queries the history.
 *
 * Commands:
 *   record <file>       Record a results file and detect regressions
 *   show                Show recent runs or one framework's history
 *   alerts              Show recent alerts
 *   trend <framework>   Analyze a framework's trend
 *   stats               Show database statistics
 *   analyze             Summarize recent runs and alerts
 */

import { config as loadDotenv } from 'dotenv'
import { isBenchmarkHistoryError } from '../errors'
import { consoleLogger, setLogger } from '../utils/logger'
import { alertsCommand } from './commands/alerts'
import { analyzeCommand } from './commands/analyze'
import { recordCommand } from './commands/record'
import { showCommand } from './commands/show'
import { statsCommand } from './commands/stats'
import { trendCommand } from './commands/trend'
import { parseArgs, print, printError } from './types'

export type { ParsedArgs } from './types'

// =============================================================================
// Constants
// =============================================================================

const VERSION = '0.1.0'

const HELP_TEXT = `
benchmark-history v${VERSION}

Tracks serialization benchmark results over time and flags regressions.

USAGE:
  benchmark-history <command> [options]

COMMANDS:
  record <file>                 Record a results file and detect regressions
  show                          Show recent runs (or one framework's history)
  alerts                        Show recent regression alerts
  trend <framework>             Analyze a framework's trend
  stats                         Show database statistics
  analyze                       Summarize recent runs and alerts

OPTIONS:
  -h, --help                    Show this help message
  -v, --version                 Show version number
  --verbose                     Log progress to the console
  -f, --format <format>         Output format: table, json (default: table)
  -p, --pretty                  Pretty print JSON output
  --db <path>                   SQLite database (default: benchmark_history.db)
  -c, --config <path>           Config file (default: ./benchmark-history.yml)
  --framework <name>            Filter by framework (show, alerts)
  --severity <level>            Filter alerts: critical, warning, info
  -m, --metric <name>           Trend metric (default: latency_ms)
  --days <n>                    Trend window in days (default: 30)
  --kind <kind>                 Trend result kind: microbenchmark, integration
  -l, --limit <n>               Limit number of results

ENVIRONMENT:
  BENCHMARK_HISTORY_DB          Database path, read from the environment or .env

EXAMPLES:
  # Record a results file
  benchmark-history record results/benchmark_results.json

  # Show the last 5 runs containing Jackson
  benchmark-history show --framework Jackson --limit 5

  # Show critical alerts only
  benchmark-history alerts --severity critical

  # Throughput trend for Protobuf over the last 14 days
  benchmark-history trend Protobuf --metric throughput_ops_per_sec --days 14
`

// =============================================================================
// Main Entry Point
// =============================================================================

/**
 * Main CLI entry point
 */
export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  loadDotenv()

  try {
    const parsed = parseArgs(argv)

    if (parsed.options.verbose) {
      setLogger(consoleLogger)
    }

    // Handle help
    if (parsed.options.help) {
      print(HELP_TEXT)
      return 0
    }

    // Handle version
    if (parsed.options.version) {
      print(`benchmark-history v${VERSION}`)
      return 0
    }

    // No command provided
    if (!parsed.command) {
      print(HELP_TEXT)
      return 0
    }

    // Execute command
    switch (parsed.command) {
      case 'record':
        return recordCommand(parsed)
      case 'show':
        return showCommand(parsed)
      case 'alerts':
        return alertsCommand(parsed)
      case 'trend':
        return trendCommand(parsed)
      case 'stats':
        return statsCommand(parsed)
      case 'analyze':
        return analyzeCommand(parsed)
      case 'help':
        print(HELP_TEXT)
        return 0
      default:
        printError(`Unknown command: ${parsed.command}`)
        print('\nRun "benchmark-history --help" for usage.')
        return 1
    }
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    printError(isBenchmarkHistoryError(error) ? `${message} [${error.code}]` : message)
    return 1
  }
}

// Run CLI if this is the main module
if (process.argv[1]?.endsWith('/cli/index.js') || process.argv[1]?.endsWith('/cli/index.ts')) {
  main().then(
    code => process.exit(code),
    (error: unknown) => {
      printError(error instanceof Error ? error.message : String(error))
      process.exit(1)
    }
  )
}
