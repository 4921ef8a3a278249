import type { TransactionSet } from '../ingest/ingest-types.js'
import type {
  MonthlyTotal,
  ForecastPoint,
  ForecastResult,
  InsufficientDataError,
} from './types.js'
import { fitLinearTrend, predict } from './linear-trend.js'
import { monthOrdinal, fromMonthOrdinal } from '../shared/calendar.js'
import { suggestSavings } from '../shared/savings.js'

/** Months projected past the last observed month. */
export const FORECAST_HORIZON = 12

/** Distinct months of history needed to fit a trend. */
export const MIN_HISTORY_MONTHS = 2

/**
 * Totals spending per calendar month over the whole history, oldest first.
 * Each month is indexed by its calendar distance from the first month (index 1),
 * so a month with no spending leaves a gap in the index.
 *
 * @example
 * monthlyTotals(transactions)
 * // => [{ year: 2023, month: 11, monthIndex: 1, ... }, { year: 2024, month: 2, monthIndex: 4, ... }]
 */
export const monthlyTotals = (transactions: TransactionSet): MonthlyTotal[] => {
  const totals = new Map<number, number>()
  for (const tx of transactions) {
    const ordinal = monthOrdinal(tx.year, tx.month)
    totals.set(ordinal, (totals.get(ordinal) ?? 0) + tx.amount)
  }

  const ordinals = [...totals.keys()].sort((a, b) => a - b)
  if (ordinals.length === 0) return []

  const first = ordinals[0]
  return ordinals.map((ordinal) => ({
    ...fromMonthOrdinal(ordinal),
    monthIndex: ordinal - first + 1,
    totalAmount: totals.get(ordinal) ?? 0,
  }))
}

/**
 * Savings implied by a month's predicted spending.
 * With a salary, whatever is left over (never below 0); without one, 20% of spending.
 *
 * @example
 * predictSavings(3500, 3000) // => 0
 * predictSavings(1000, 0)    // => 200
 */
export const predictSavings = (predictedSpending: number, salary: number | null): number => {
  if (salary !== null && salary > 0) {
    return Math.max(salary - predictedSpending, 0)
  }
  return suggestSavings(predictedSpending)
}

const insufficientData = (monthsAvailable: number): InsufficientDataError => ({
  type: 'insufficient_data',
  message: `At least ${MIN_HISTORY_MONTHS} months of spending history are needed for a forecast (found ${monthsAvailable}).`,
  monthsAvailable,
  monthsRequired: MIN_HISTORY_MONTHS,
})

/**
 * Projects the next twelve months of spending and savings from a linear
 * trend over the full history. Deterministic for the same input.
 *
 * @example
 * const result = forecast(transactions, 3000)
 * if (result.success) {
 *   console.log(result.forecast.yearlyTotals.savings)
 * }
 */
export const forecast = (
  transactions: TransactionSet,
  salary: number | null = null
): ForecastResult => {
  const history = monthlyTotals(transactions)
  if (history.length < MIN_HISTORY_MONTHS) {
    return { success: false, error: insufficientData(history.length) }
  }

  const trend = fitLinearTrend(history.map((m) => ({ x: m.monthIndex, y: m.totalAmount })))

  const last = history[history.length - 1]
  const lastOrdinal = monthOrdinal(last.year, last.month)
  const effectiveSalary = salary !== null && salary > 0 ? salary : null

  const points: ForecastPoint[] = []
  for (let step = 1; step <= FORECAST_HORIZON; step += 1) {
    const monthIndex = last.monthIndex + step
    const predictedSpending = predict(trend, monthIndex)
    points.push({
      monthIndex,
      ...fromMonthOrdinal(lastOrdinal + step),
      predictedSpending,
      predictedSavings: predictSavings(predictedSpending, effectiveSalary),
    })
  }

  return {
    success: true,
    forecast: {
      history,
      trend,
      points,
      yearlyTotals: {
        spending: points.reduce((sum, p) => sum + p.predictedSpending, 0),
        savings: points.reduce((sum, p) => sum + p.predictedSavings, 0),
      },
      salary: effectiveSalary,
    },
  }
}
