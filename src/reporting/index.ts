/**
 * Period spending summaries.
 *
 * Groups a transaction set by month, year, week of month and category.
 * Supports both CLI output (JSON/text) and any other caller of the core.
 */

// Aggregator
export {
  aggregate,
  availablePeriods,
  statementRows,
  scopeLabel,
  isInScope,
  filterTransactionsByScope,
  aggregateByCategory,
  buildSeries,
  compareCategorySummaries,
} from './spending-aggregator.js'

// Types
export type {
  Scope,
  ScopeKind,
  CategorySummary,
  SeriesPoint,
  PeriodSummary,
  MonthOption,
  AvailablePeriods,
  StatementRow,
  CategoryAccumulator,
} from './types.js'
