/**
 * Types for the spending forecast.
 *
 * The forecast fits a straight line through total spending per month and
 * extends it twelve months past the last observed month.
 */

/**
 * Total spending for one calendar month of history.
 *
 * @example
 * const march: MonthlyTotal = { year: 2024, month: 3, monthIndex: 3, totalAmount: 140 }
 */
export interface MonthlyTotal {
  year: number
  month: number
  /** Months since the first observed month, which is 1; gaps stay gaps */
  monthIndex: number
  totalAmount: number
}

/**
 * Fitted line: amount ≈ slope · monthIndex + intercept
 */
export interface LinearTrend {
  slope: number
  intercept: number
}

/**
 * One projected month.
 *
 * @example
 * const point: ForecastPoint = {
 *   monthIndex: 4,
 *   year: 2024,
 *   month: 4,
 *   predictedSpending: 160,
 *   predictedSavings: 32,
 * }
 */
export interface ForecastPoint {
  monthIndex: number
  /** Calendar month the index lands on */
  year: number
  month: number
  /** Not clamped: a steep downward trend can go negative */
  predictedSpending: number
  predictedSavings: number
}

export interface SpendingForecast {
  history: MonthlyTotal[]
  trend: LinearTrend
  points: ForecastPoint[]
  yearlyTotals: {
    spending: number
    savings: number
  }
  /** Salary used for the savings figures, or null when the 20% rule applied */
  salary: number | null
}

/**
 * Not enough months of history to fit a trend.
 */
export interface InsufficientDataError {
  type: 'insufficient_data'
  message: string
  monthsAvailable: number
  monthsRequired: number
}

export type ForecastResult =
  | { success: true; forecast: SpendingForecast }
  | { success: false; error: InsufficientDataError }
