import type { ForecastOptions } from '../args.js'
import type { AppConfig, DisplayConfig } from '../../config/config-types.js'
import { createFormatter, type OutputFormatter, formatMoney, formatTable } from '../output.js'
import { loadStatement } from './load-statement.js'
import { forecast, type SpendingForecast } from '../../forecast/index.js'
import { MONTH_NAMES } from '../../shared/calendar.js'

export interface ForecastCommandResult {
  success: true
  file: string
  forecast: SpendingForecast
  formatted?: string
}

const DIVIDER = '─'.repeat(60)

const shortMonth = (year: number, month: number): string =>
  `${MONTH_NAMES[month - 1].slice(0, 3)} ${year}`

/**
 * Generates the formatted forecast for terminal display.
 */
export const formatForecastText = (result: SpendingForecast, display: DisplayConfig): string => {
  const money = (amount: number) => formatMoney(amount, display)
  const lines: string[] = []
  const direction = result.trend.slope >= 0 ? '+' : ''

  lines.push('')
  lines.push('  12-Month Spending Forecast')
  lines.push('')
  lines.push(DIVIDER)
  lines.push('')
  lines.push(`  Trend:            ${direction}${money(result.trend.slope)} per month`)
  lines.push(
    result.salary !== null
      ? `  Monthly Salary:   ${money(result.salary)}`
      : '  Monthly Salary:   not set (savings estimated at 20% of spending)'
  )
  lines.push(`  History:          ${result.history.length} month(s)`)
  lines.push('')
  lines.push(DIVIDER)
  lines.push('')
  lines.push('  PROJECTION')
  lines.push('')
  lines.push(
    formatTable(
      ['Month', 'Index', 'Spending', 'Savings'],
      result.points.map((point) => [
        shortMonth(point.year, point.month),
        String(point.monthIndex),
        money(point.predictedSpending),
        money(point.predictedSavings),
      ])
    )
  )
  lines.push('')
  lines.push(`  Yearly Spending:  ${money(result.yearlyTotals.spending)}`)
  lines.push(`  Yearly Savings:   ${money(result.yearlyTotals.savings)}`)
  lines.push('')

  return lines.join('\n')
}

/**
 * Forecast CLI command implementation.
 * The salary comes from --salary, then SPENDWISE_SALARY, then the config file.
 *
 * @example
 * spendwise forecast statement.csv --salary 3000 --format text
 */
export const forecastCommand = async (
  file: string,
  options: ForecastOptions,
  config: AppConfig
): Promise<void> => {
  const formatter: OutputFormatter = createFormatter(options.format, options.quiet)
  const transactions = await loadStatement(file, formatter)

  const salary = options.salary ?? config.budget.monthlySalary ?? null
  formatter.progress('Fitting spending trend...')

  const outcome = forecast(transactions, salary)
  if (!outcome.success) {
    formatter.error(outcome.error.message, outcome.error)
  }

  const result: ForecastCommandResult = {
    success: true,
    file,
    forecast: outcome.forecast,
  }

  if (options.format === 'text') {
    result.formatted = formatForecastText(outcome.forecast, config.display)
  }

  formatter.success(result)
}
