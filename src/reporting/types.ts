/**
 * Types for period-based spending summaries.
 *
 * Summaries are derived on demand from a transaction set and a scope;
 * nothing here is stored. Amounts are in the statement's own currency units.
 */

import type { MonthName } from '../shared/calendar.js'

// Re-export ingest types we depend on
export type { Transaction, TransactionSet } from '../ingest/ingest-types.js'

/**
 * The period a summary covers.
 *
 * @example
 * const january: Scope = { kind: 'monthly', year: 2024, month: 1 }
 * const wholeYear: Scope = { kind: 'yearly', year: 2024 }
 */
export type Scope =
  | { kind: 'monthly'; year: number; month: number }
  | { kind: 'yearly'; year: number }

export type ScopeKind = Scope['kind']

/**
 * Spending for one category within a scope.
 *
 * @example
 * const groceries: CategorySummary = {
 *   category: 'Groceries',
 *   totalAmount: 50,
 *   percentOfTotal: 62.5,
 *   transactionCount: 1,
 * }
 */
export interface CategorySummary {
  category: string
  totalAmount: number
  /** Share of the scope's total spending, 0-100, unrounded */
  percentOfTotal: number
  transactionCount: number
}

/**
 * One point of the scope's time series.
 * Monthly scopes are keyed by week of month, yearly scopes by month number.
 *
 * @example
 * const week: SeriesPoint = { key: 1, label: 'Week 1', amount: 50 }
 * const month: SeriesPoint = { key: 3, label: 'March', amount: 410.5 }
 */
export interface SeriesPoint {
  key: number
  label: string
  amount: number
}

/**
 * Everything computed for one scope.
 */
export interface PeriodSummary {
  scope: Scope
  totalSpent: number
  /** 20% of total spending */
  suggestedSavings: number
  transactionCount: number
  /** Sorted by total descending, then category name ascending */
  categorySummaries: CategorySummary[]
  /** Weeks (monthly scope) or months (yearly scope) with spending, in calendar order */
  series: SeriesPoint[]
}

export interface MonthOption {
  month: number
  name: MonthName
}

/**
 * Years and months present in a transaction set, for period pickers.
 */
export interface AvailablePeriods {
  /** Distinct years, most recent first */
  years: number[]
  /** Months of each year in the order they first occur in the data */
  monthsByYear: Record<number, MonthOption[]>
  /** Latest month of the most recent year (null when there is no data) */
  defaultSelection: { year: number; month: number } | null
}

/**
 * A transaction as listed in the filtered statement view.
 */
export interface StatementRow {
  date: string
  category: string
  amount: number
}

/**
 * Helper type for building category totals.
 * Used internally by the aggregator.
 */
export type CategoryAccumulator = Map<string, { totalAmount: number; transactionCount: number }>
