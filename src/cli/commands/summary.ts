import type { SummaryOptions } from '../args.js'
import type { AppConfig, DisplayConfig } from '../../config/config-types.js'
import { createFormatter, type OutputFormatter, formatMoney, formatPercent, formatTable } from '../output.js'
import { resolveScope } from '../scope.js'
import { loadStatement } from './load-statement.js'
import {
  aggregate,
  availablePeriods,
  scopeLabel,
  type PeriodSummary,
  type CategorySummary,
  type Scope,
} from '../../reporting/index.js'
import { generateTip } from '../../tips/index.js'

export interface SummaryResult {
  success: true
  file: string
  period: string
  scope: Scope
  totalSpent: number
  suggestedSavings: number
  transactionCount: number
  categories: CategorySummary[]
  tip: string
  /** Pre-formatted text output (only for text format) */
  formatted?: string
}

const DIVIDER = '─'.repeat(60)

/**
 * Generates the formatted summary for terminal display.
 */
export const formatSummaryText = (
  summary: PeriodSummary,
  tip: string,
  display: DisplayConfig
): string => {
  const money = (amount: number) => formatMoney(amount, display)
  const heading = summary.scope.kind === 'monthly' ? 'Monthly Summary' : 'Yearly Summary'
  const lines: string[] = []

  lines.push('')
  lines.push(`  ${heading}: ${scopeLabel(summary.scope)}`)
  lines.push('')
  lines.push(DIVIDER)
  lines.push('')
  lines.push(`  Total Spent:        ${money(summary.totalSpent)}`)
  lines.push(`  Suggested Savings:  ${money(summary.suggestedSavings)} (20%)`)
  lines.push(`  Transactions:       ${summary.transactionCount}`)
  lines.push('')
  lines.push(DIVIDER)
  lines.push('')
  lines.push('  SPENDING BY CATEGORY')
  lines.push('')

  if (summary.categorySummaries.length === 0) {
    lines.push('  No spending data for this period.')
  } else {
    const shown = summary.categorySummaries.slice(0, display.maxCategories)
    lines.push(
      formatTable(
        ['Category', 'Spent', 'Share'],
        shown.map((c) => [c.category.slice(0, 24), money(c.totalAmount), formatPercent(c.percentOfTotal)])
      )
    )
    const hidden = summary.categorySummaries.length - shown.length
    if (hidden > 0) {
      lines.push('')
      lines.push(`  ... and ${hidden} more categories`)
    }
  }

  lines.push('')
  lines.push(DIVIDER)
  lines.push('')
  lines.push('  SAVING TIP')
  lines.push('')
  lines.push(`  ${tip}`)
  lines.push('')

  return lines.join('\n')
}

/**
 * Summary CLI command implementation.
 *
 * @example
 * spendwise summary statement.csv --year 2024 --month 1 --format text
 */
export const summaryCommand = async (
  file: string,
  options: SummaryOptions,
  config: AppConfig
): Promise<void> => {
  const formatter: OutputFormatter = createFormatter(options.format, options.quiet)
  const transactions = await loadStatement(file, formatter)

  const scope = resolveScope(availablePeriods(transactions), options)
  const summary = aggregate(transactions, scope)
  const tip = generateTip(summary)

  const result: SummaryResult = {
    success: true,
    file,
    period: scopeLabel(scope),
    scope,
    totalSpent: summary.totalSpent,
    suggestedSavings: summary.suggestedSavings,
    transactionCount: summary.transactionCount,
    categories: summary.categorySummaries,
    tip,
  }

  if (options.format === 'text') {
    result.formatted = formatSummaryText(summary, tip, config.display)
  }

  formatter.success(result)
}
