import type { AnalyzeOptions } from '../args.js'
import type { AppConfig, DisplayConfig } from '../../config/config-types.js'
import { createFormatter, type OutputFormatter, formatMoney, formatPercent, formatTable } from '../output.js'
import { resolveScope } from '../scope.js'
import { loadStatement } from './load-statement.js'
import {
  aggregate,
  availablePeriods,
  scopeLabel,
  statementRows,
  type PeriodSummary,
  type CategorySummary,
  type SeriesPoint,
  type StatementRow,
  type Scope,
} from '../../reporting/index.js'

export interface AnalyzeResult {
  success: true
  file: string
  period: string
  scope: Scope
  totalSpent: number
  categories: CategorySummary[]
  /** Spending by week (monthly scope) or by month (yearly scope) */
  series: SeriesPoint[]
  transactions: StatementRow[]
  formatted?: string
}

const DIVIDER = '─'.repeat(60)

/**
 * Generates the formatted analysis for terminal display.
 */
export const formatAnalysisText = (
  summary: PeriodSummary,
  rows: StatementRow[],
  display: DisplayConfig
): string => {
  const money = (amount: number) => formatMoney(amount, display)
  const lines: string[] = []
  const noData = '  No spending data for this period.'

  lines.push('')
  lines.push(`  Data Analysis: ${scopeLabel(summary.scope)}`)
  lines.push('')
  lines.push(DIVIDER)
  lines.push('')
  lines.push('  CATEGORY SPENDING')
  lines.push('')
  if (summary.categorySummaries.length === 0) {
    lines.push(noData)
  } else {
    lines.push(
      formatTable(
        ['Category', 'Spent', 'Share', 'Txns'],
        summary.categorySummaries
          .slice(0, display.maxCategories)
          .map((c) => [
            c.category.slice(0, 24),
            money(c.totalAmount),
            formatPercent(c.percentOfTotal),
            String(c.transactionCount),
          ])
      )
    )
  }

  lines.push('')
  lines.push(DIVIDER)
  lines.push('')
  lines.push(summary.scope.kind === 'monthly' ? '  WEEKLY SPENDING' : '  MONTHLY SPENDING')
  lines.push('')
  if (summary.series.length === 0) {
    lines.push(noData)
  } else {
    lines.push(
      formatTable(
        [summary.scope.kind === 'monthly' ? 'Week' : 'Month', 'Spent'],
        summary.series.map((point) => [point.label, money(point.amount)])
      )
    )
  }

  lines.push('')
  lines.push(DIVIDER)
  lines.push('')
  lines.push('  BANK STATEMENT')
  lines.push('')
  if (rows.length === 0) {
    lines.push('  No transactions found for the selected period.')
  } else {
    lines.push(
      formatTable(
        ['Date', 'Category', 'Amount'],
        rows.map((row) => [row.date, row.category.slice(0, 24), money(row.amount)])
      )
    )
  }
  lines.push('')

  return lines.join('\n')
}

/**
 * Analyze CLI command implementation.
 *
 * @example
 * spendwise analyze statement.csv --year 2024 --yearly --format text
 */
export const analyzeCommand = async (
  file: string,
  options: AnalyzeOptions,
  config: AppConfig
): Promise<void> => {
  const formatter: OutputFormatter = createFormatter(options.format, options.quiet)
  const transactions = await loadStatement(file, formatter)

  const scope = resolveScope(availablePeriods(transactions), options)
  const summary = aggregate(transactions, scope)
  const rows = statementRows(transactions, scope)

  const result: AnalyzeResult = {
    success: true,
    file,
    period: scopeLabel(scope),
    scope,
    totalSpent: summary.totalSpent,
    categories: summary.categorySummaries,
    series: summary.series,
    transactions: rows,
  }

  if (options.format === 'text') {
    result.formatted = formatAnalysisText(summary, rows, config.display)
  }

  formatter.success(result)
}
