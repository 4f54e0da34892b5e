/**
 * Configuration
 *
 * @module config
 */

export {
  CONFIG_FILE_NAME,
  DATABASE_ENV_VAR,
  getDefaultConfig,
  loadConfig,
  mergeConfig,
  parseConfigOverrides,
  validateConfig,
  type BenchmarkHistoryConfig,
  type ConfigOverrides,
  type LoadConfigOptions,
} from './loader'
