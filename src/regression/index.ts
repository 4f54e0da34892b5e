export {
  DEFAULT_THRESHOLDS,
  DETECTED_METRICS,
  classifyChange,
  detectRegressions,
  formatAlertMessage,
  percentChange,
  type ChangeClassification,
  type DetectOptions,
  type RegressionThresholds,
} from './detector'
