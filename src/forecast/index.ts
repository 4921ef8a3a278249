/**
 * Spending forecast: a least-squares trend over monthly totals,
 * projected twelve months ahead with the implied savings.
 */

export {
  forecast,
  monthlyTotals,
  predictSavings,
  FORECAST_HORIZON,
  MIN_HISTORY_MONTHS,
} from './forecast-engine.js'
export { fitLinearTrend, predict, type TrendPoint } from './linear-trend.js'

export type {
  MonthlyTotal,
  LinearTrend,
  ForecastPoint,
  SpendingForecast,
  InsufficientDataError,
  ForecastResult,
} from './types.js'
