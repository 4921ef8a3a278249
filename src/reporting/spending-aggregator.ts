import type {
  Scope,
  Transaction,
  TransactionSet,
  CategorySummary,
  CategoryAccumulator,
  SeriesPoint,
  PeriodSummary,
  AvailablePeriods,
  MonthOption,
  StatementRow,
} from './types.js'
import { monthName } from '../shared/calendar.js'
import { suggestSavings } from '../shared/savings.js'

/**
 * Checks if a transaction falls within a scope's period key.
 */
export const isInScope = (tx: Transaction, scope: Scope): boolean =>
  tx.year === scope.year && (scope.kind === 'yearly' || tx.month === scope.month)

/**
 * Filters transactions to those matching a scope.
 */
export const filterTransactionsByScope = (
  transactions: TransactionSet,
  scope: Scope
): Transaction[] => transactions.filter((tx) => isInScope(tx, scope))

/**
 * Human-readable name of a scope.
 *
 * @example
 * scopeLabel({ kind: 'monthly', year: 2024, month: 1 }) // => 'January 2024'
 * scopeLabel({ kind: 'yearly', year: 2024 })            // => '2024'
 */
export const scopeLabel = (scope: Scope): string =>
  scope.kind === 'monthly' ? `${monthName(scope.month)} ${scope.year}` : String(scope.year)

const sumAmounts = (transactions: readonly Transaction[]): number =>
  transactions.reduce((sum, tx) => sum + tx.amount, 0)

/**
 * Ranking order for categories: highest total first, then name ascending,
 * so equal totals always come out in the same order.
 */
export const compareCategorySummaries = (a: CategorySummary, b: CategorySummary): number => {
  if (a.totalAmount !== b.totalAmount) return b.totalAmount - a.totalAmount
  if (a.category < b.category) return -1
  if (a.category > b.category) return 1
  return 0
}

/**
 * Aggregates transactions by category, ranked by spending.
 * Percentages are relative to the sum of the given transactions.
 */
export const aggregateByCategory = (transactions: readonly Transaction[]): CategorySummary[] => {
  const accumulator: CategoryAccumulator = new Map()

  for (const tx of transactions) {
    const entry = accumulator.get(tx.category) ?? { totalAmount: 0, transactionCount: 0 }
    entry.totalAmount += tx.amount
    entry.transactionCount += 1
    accumulator.set(tx.category, entry)
  }

  const totalSpent = sumAmounts(transactions)

  return [...accumulator.entries()]
    .map(([category, data]) => ({
      category,
      totalAmount: data.totalAmount,
      percentOfTotal: totalSpent > 0 ? (data.totalAmount / totalSpent) * 100 : 0,
      transactionCount: data.transactionCount,
    }))
    .sort(compareCategorySummaries)
}

/**
 * Sums spending per bucket and returns the buckets in ascending key order.
 * Buckets without transactions are left out.
 */
const groupSeries = (
  transactions: readonly Transaction[],
  keyOf: (tx: Transaction) => number,
  labelOf: (key: number) => string
): SeriesPoint[] => {
  const totals = new Map<number, number>()
  for (const tx of transactions) {
    const key = keyOf(tx)
    totals.set(key, (totals.get(key) ?? 0) + tx.amount)
  }

  return [...totals.entries()]
    .sort(([a], [b]) => a - b)
    .map(([key, amount]) => ({ key, label: labelOf(key), amount }))
}

/**
 * Spending over time within a scope: by week of month for a monthly scope,
 * by calendar month for a yearly scope.
 */
export const buildSeries = (transactions: readonly Transaction[], scope: Scope): SeriesPoint[] =>
  scope.kind === 'monthly'
    ? groupSeries(transactions, (tx) => tx.weekOfMonth, (week) => `Week ${week}`)
    : groupSeries(transactions, (tx) => tx.month, monthName)

/**
 * Main aggregation function. Summarizes spending for one scope.
 * An empty scope is a valid result with zero totals.
 * Pure function with no side effects.
 *
 * @example
 * const summary = aggregate(transactions, { kind: 'monthly', year: 2024, month: 1 })
 * summary.categorySummaries[0]?.category // top category
 */
export const aggregate = (transactions: TransactionSet, scope: Scope): PeriodSummary => {
  const inScope = filterTransactionsByScope(transactions, scope)
  const totalSpent = sumAmounts(inScope)

  return {
    scope,
    totalSpent,
    suggestedSavings: suggestSavings(totalSpent),
    transactionCount: inScope.length,
    categorySummaries: aggregateByCategory(inScope),
    series: buildSeries(inScope, scope),
  }
}

/**
 * Lists the years and months present in the data, plus the default
 * selection: the latest month of the most recent year.
 */
export const availablePeriods = (transactions: TransactionSet): AvailablePeriods => {
  const monthsByYear: Record<number, MonthOption[]> = {}
  const seen = new Set<string>()

  for (const tx of transactions) {
    const key = `${tx.year}-${tx.month}`
    if (seen.has(key)) continue
    seen.add(key)

    if (!monthsByYear[tx.year]) {
      monthsByYear[tx.year] = []
    }
    monthsByYear[tx.year].push({ month: tx.month, name: tx.monthName })
  }

  const years = Object.keys(monthsByYear)
    .map(Number)
    .sort((a, b) => b - a)

  if (years.length === 0) {
    return { years, monthsByYear, defaultSelection: null }
  }

  const latestYear = years[0]
  const latestMonth = Math.max(...monthsByYear[latestYear].map((option) => option.month))

  return {
    years,
    monthsByYear,
    defaultSelection: { year: latestYear, month: latestMonth },
  }
}

/**
 * Transactions of a scope as statement rows, oldest first.
 * Rows with the same date keep their original order.
 */
export const statementRows = (transactions: TransactionSet, scope: Scope): StatementRow[] =>
  filterTransactionsByScope(transactions, scope)
    .map((tx) => ({ date: tx.date, category: tx.category, amount: tx.amount }))
    .sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0))
