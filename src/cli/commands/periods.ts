import type { PeriodsOptions } from '../args.js'
import { createFormatter, type OutputFormatter } from '../output.js'
import { loadStatement } from './load-statement.js'
import { availablePeriods, type AvailablePeriods } from '../../reporting/index.js'
import { monthName } from '../../shared/calendar.js'

export interface PeriodsResult extends AvailablePeriods {
  success: true
  file: string
  formatted?: string
}

/**
 * Lists each year with its months, most recent year first.
 */
export const formatPeriodsText = (periods: AvailablePeriods): string => {
  if (periods.years.length === 0) {
    return 'No periods found: the statement has no spending transactions.'
  }

  const lines = periods.years.map(
    (year) => `${year}: ${periods.monthsByYear[year].map((option) => option.name).join(', ')}`
  )

  if (periods.defaultSelection) {
    const { year, month } = periods.defaultSelection
    lines.push('')
    lines.push(`Default: ${monthName(month)} ${year}`)
  }

  return lines.join('\n')
}

/**
 * Periods CLI command implementation.
 *
 * @example
 * spendwise periods statement.csv --format text
 */
export const periodsCommand = async (file: string, options: PeriodsOptions): Promise<void> => {
  const formatter: OutputFormatter = createFormatter(options.format, options.quiet)
  const transactions = await loadStatement(file, formatter)
  const periods = availablePeriods(transactions)

  const result: PeriodsResult = { success: true, file, ...periods }

  if (options.format === 'text') {
    result.formatted = formatPeriodsText(periods)
  }

  formatter.success(result)
}
