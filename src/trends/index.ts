export {
  analyzeTrend,
  calculateHalfSplitTrend,
  calculateStats,
  type HalfSplitTrend,
  type SeriesStats,
  type TrendDataPoint,
  type TrendDirection,
  type TrendOptions,
  type TrendReport,
} from './analyzer'
