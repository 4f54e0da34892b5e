/**
 * Configuration Loader
 *
 * Resolution order, later wins:
 *   1. built-in defaults
 *   2. benchmark-history.yml in the working directory (or an explicit file)
 *   3. BENCHMARK_HISTORY_DB from the environment
 *   4. overrides passed by the caller (CLI flags)
 *
 * Example benchmark-history.yml:
 *
 *   database:
 *     path: results/benchmark_history.db
 *   thresholds:
 *     regression: 10
 *     critical: 25
 *     trendStable: 5
 *   defaults:
 *     showLimit: 10
 *     alertLimit: 20
 *     trendDays: 30
 */

import { existsSync, readFileSync } from 'node:fs'
import { join } from 'node:path'
import * as yaml from 'yaml'
import {
  CRITICAL_THRESHOLD_PCT,
  DEFAULT_ALERT_LIMIT,
  DEFAULT_DATABASE_PATH,
  DEFAULT_SHOW_LIMIT,
  DEFAULT_TREND_DAYS,
  REGRESSION_THRESHOLD_PCT,
  TREND_STABLE_THRESHOLD_PCT,
} from '../constants'
import { ConfigurationError, toError } from '../errors'
import { isNumber, isRecord, isString } from '../utils/json-validation'

// =============================================================================
// Types
// =============================================================================

export interface BenchmarkHistoryConfig {
  database: {
    path: string
  }
  thresholds: {
    regression: number
    critical: number
    trendStable: number
  }
  defaults: {
    showLimit: number
    alertLimit: number
    trendDays: number
  }
}

export interface ConfigOverrides {
  database?: Partial<BenchmarkHistoryConfig['database']> | undefined
  thresholds?: Partial<BenchmarkHistoryConfig['thresholds']> | undefined
  defaults?: Partial<BenchmarkHistoryConfig['defaults']> | undefined
}

export interface LoadConfigOptions {
  /** Directory searched for benchmark-history.yml (default: cwd) */
  directory?: string | undefined
  /** Explicit config file; must exist */
  configPath?: string | undefined
  env?: NodeJS.ProcessEnv | undefined
  overrides?: ConfigOverrides | undefined
}

export const CONFIG_FILE_NAME = 'benchmark-history.yml'

export const DATABASE_ENV_VAR = 'BENCHMARK_HISTORY_DB'

// =============================================================================
// Defaults
// =============================================================================

export function getDefaultConfig(): BenchmarkHistoryConfig {
  return {
    database: { path: DEFAULT_DATABASE_PATH },
    thresholds: {
      regression: REGRESSION_THRESHOLD_PCT,
      critical: CRITICAL_THRESHOLD_PCT,
      trendStable: TREND_STABLE_THRESHOLD_PCT,
    },
    defaults: {
      showLimit: DEFAULT_SHOW_LIMIT,
      alertLimit: DEFAULT_ALERT_LIMIT,
      trendDays: DEFAULT_TREND_DAYS,
    },
  }
}

// =============================================================================
// YAML Parsing
// =============================================================================

function readSection(parsed: Record<string, unknown>, section: string): Record<string, unknown> {
  const value = parsed[section]
  if (value === undefined || value === null) return {}
  if (!isRecord(value)) {
    throw new ConfigurationError(`Config section "${section}" must be a mapping`, section)
  }
  return value
}

function readNumber(section: Record<string, unknown>, path: string, key: string): number | undefined {
  const value = section[key]
  if (value === undefined || value === null) return undefined
  if (!isNumber(value)) {
    throw new ConfigurationError(`Config value ${path}.${key} must be a number`, `${path}.${key}`)
  }
  return value
}

function readString(section: Record<string, unknown>, path: string, key: string): string | undefined {
  const value = section[key]
  if (value === undefined || value === null) return undefined
  if (!isString(value)) {
    throw new ConfigurationError(`Config value ${path}.${key} must be a string`, `${path}.${key}`)
  }
  return value
}

/**
 * Parse a YAML config document into overrides
 */
export function parseConfigOverrides(yamlStr: string): ConfigOverrides {
  if (!yamlStr.trim()) return {}

  let parsed: unknown
  try {
    parsed = yaml.parse(yamlStr)
  } catch (error) {
    const cause = toError(error)
    throw new ConfigurationError(`YAML parse error: ${cause.message}`, undefined, cause)
  }
  if (parsed === null || parsed === undefined) return {}
  if (!isRecord(parsed)) {
    throw new ConfigurationError('Config document must be a mapping')
  }

  const database = readSection(parsed, 'database')
  const thresholds = readSection(parsed, 'thresholds')
  const defaults = readSection(parsed, 'defaults')

  return {
    database: { path: readString(database, 'database', 'path') },
    thresholds: {
      regression: readNumber(thresholds, 'thresholds', 'regression'),
      critical: readNumber(thresholds, 'thresholds', 'critical'),
      trendStable: readNumber(thresholds, 'thresholds', 'trendStable'),
    },
    defaults: {
      showLimit: readNumber(defaults, 'defaults', 'showLimit'),
      alertLimit: readNumber(defaults, 'defaults', 'alertLimit'),
      trendDays: readNumber(defaults, 'defaults', 'trendDays'),
    },
  }
}

// =============================================================================
// Merging and Validation
// =============================================================================

/**
 * Overlay overrides on a config; undefined values leave the base untouched
 */
export function mergeConfig(base: BenchmarkHistoryConfig, overrides: ConfigOverrides): BenchmarkHistoryConfig {
  return {
    database: {
      path: overrides.database?.path ?? base.database.path,
    },
    thresholds: {
      regression: overrides.thresholds?.regression ?? base.thresholds.regression,
      critical: overrides.thresholds?.critical ?? base.thresholds.critical,
      trendStable: overrides.thresholds?.trendStable ?? base.thresholds.trendStable,
    },
    defaults: {
      showLimit: overrides.defaults?.showLimit ?? base.defaults.showLimit,
      alertLimit: overrides.defaults?.alertLimit ?? base.defaults.alertLimit,
      trendDays: overrides.defaults?.trendDays ?? base.defaults.trendDays,
    },
  }
}

function assertPositiveInteger(value: number, key: string): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigurationError(`${key} must be a positive integer, got ${value}`, key)
  }
}

/**
 * @throws ConfigurationError on the first invalid value
 */
export function validateConfig(config: BenchmarkHistoryConfig): void {
  if (config.database.path.trim() === '') {
    throw new ConfigurationError('database.path must not be empty', 'database.path')
  }

  const { regression, critical, trendStable } = config.thresholds
  if (!(regression > 0)) {
    throw new ConfigurationError(`thresholds.regression must be positive, got ${regression}`, 'thresholds.regression')
  }
  if (!(critical >= regression)) {
    throw new ConfigurationError(
      `thresholds.critical (${critical}) must not be below thresholds.regression (${regression})`,
      'thresholds.critical'
    )
  }
  if (!(trendStable >= 0)) {
    throw new ConfigurationError(`thresholds.trendStable must not be negative, got ${trendStable}`, 'thresholds.trendStable')
  }

  assertPositiveInteger(config.defaults.showLimit, 'defaults.showLimit')
  assertPositiveInteger(config.defaults.alertLimit, 'defaults.alertLimit')
  assertPositiveInteger(config.defaults.trendDays, 'defaults.trendDays')
}

// =============================================================================
// Loading
// =============================================================================

function readConfigFile(path: string): string {
  try {
    return readFileSync(path, 'utf-8')
  } catch (error) {
    const cause = toError(error)
    throw new ConfigurationError(`Cannot read config file ${path}: ${cause.message}`, undefined, cause)
  }
}

/**
 * Resolve the effective configuration
 *
 * @example
 * ```typescript
 * const config = loadConfig({ overrides: { database: { path: 'ci.db' } } })
 * ```
 */
export function loadConfig(options: LoadConfigOptions = {}): BenchmarkHistoryConfig {
  let config = getDefaultConfig()

  const configPath = options.configPath ?? join(options.directory ?? process.cwd(), CONFIG_FILE_NAME)
  if (options.configPath !== undefined || existsSync(configPath)) {
    config = mergeConfig(config, parseConfigOverrides(readConfigFile(configPath)))
  }

  const env = options.env ?? process.env
  const envPath = env[DATABASE_ENV_VAR]
  if (envPath) {
    config = mergeConfig(config, { database: { path: envPath } })
  }

  if (options.overrides) {
    config = mergeConfig(config, options.overrides)
  }

  validateConfig(config)
  return config
}
