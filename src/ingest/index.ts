/**
 * Result Ingestion
 *
 * @module ingest
 */

export {
  canonicalFrameworkName,
  classifyDocument,
  type CombinedDocument,
  type IntegrationDocument,
  type IntegrationEntry,
  type MicrobenchmarkDocument,
  type MicrobenchmarkEntry,
  type OperationMap,
  type ResultDocument,
  type UnknownDocument,
} from './shapes'

export {
  convertScore,
  normalize,
  normalizeDocument,
  parseResultDocument,
  pickOperation,
  type NormalizedRun,
  type NormalizeOptions,
} from './normalize'
