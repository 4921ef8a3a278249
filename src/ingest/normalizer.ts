import type {
  RawStatement,
  Transaction,
  TransactionSet,
  FormatError,
  EmptyResultWarning,
  NormalizeResult,
  NormalizeStats,
} from './ingest-types.js'
import { readCsvTable, toRecord } from './csv-reader.js'
import {
  missingColumns,
  statementRowSchema,
  RESERVED_CATEGORIES,
  type ParsedStatementRow,
} from './statement-schema.js'
import { monthName, weekOfMonth, type CalendarDate } from '../shared/calendar.js'

export const SUPPORTED_FORMATS = ['csv'] as const

const formatError = (message: string, missing: string[] = []): NormalizeResult => ({
  success: false,
  error: { type: 'format_error', message, missingColumns: missing } satisfies FormatError,
})

const normalizeFormat = (format: string): string =>
  format.trim().replace(/^\./, '').toLowerCase()

const isSupportedFormat = (format: string): boolean =>
  SUPPORTED_FORMATS.some((supported) => supported === format)

/**
 * Builds a transaction from a validated date, deriving every calendar field.
 */
export const createTransaction = (
  date: CalendarDate,
  amount: number,
  category: string
): Transaction =>
  Object.freeze({
    date: date.iso,
    amount,
    category,
    year: date.year,
    month: date.month,
    monthName: monthName(date.month),
    day: date.day,
    weekOfMonth: weekOfMonth(date.day),
  })

/**
 * Spending rows only: positive amounts outside the reserved categories.
 */
export const isSpending = (row: ParsedStatementRow): boolean =>
  row.Amount > 0 && !RESERVED_CATEGORIES.has(row.Category)

const emptyResultWarning = (stats: NormalizeStats): EmptyResultWarning => ({
  type: 'empty_result',
  message:
    `No spending transactions found: ${stats.rowsRead} row(s) read, ` +
    `${stats.rejectedRows} unparsable, ${stats.excludedRows} income, savings or non-positive.`,
  rowsRead: stats.rowsRead,
})

/**
 * Parses a raw bank statement into the set of spending transactions.
 * Rows with an unparsable date or amount are dropped and counted, never fatal.
 * Pure function with no side effects.
 *
 * @example
 * const result = normalize({ format: 'csv', content })
 * if (result.success) {
 *   console.log(result.transactions.length, result.stats.rejectedRows)
 * }
 */
export const normalize = (statement: RawStatement): NormalizeResult => {
  const format = normalizeFormat(statement.format)
  if (!isSupportedFormat(format)) {
    return formatError(
      `Unsupported format: "${statement.format}". Only ${SUPPORTED_FORMATS.join(', ').toUpperCase()} statements are supported.`
    )
  }

  const table = readCsvTable(statement.content)
  if (!table) {
    return formatError('Statement is empty: no header row found.')
  }

  const missing = missingColumns(table.header)
  if (missing.length > 0) {
    return formatError(`Missing required column(s): ${missing.join(', ')}`, missing)
  }

  const transactions: Transaction[] = []
  let rejectedRows = 0
  let excludedRows = 0

  for (const row of table.rows) {
    const parsed = statementRowSchema.safeParse(toRecord(table.header, row))
    if (!parsed.success) {
      rejectedRows += 1
      continue
    }
    if (!isSpending(parsed.data)) {
      excludedRows += 1
      continue
    }
    transactions.push(createTransaction(parsed.data.Date, parsed.data.Amount, parsed.data.Category))
  }

  const stats: NormalizeStats = {
    rowsRead: table.rows.length,
    rejectedRows,
    excludedRows,
    retainedRows: transactions.length,
  }
  const transactionSet: TransactionSet = Object.freeze(transactions)

  return {
    success: true,
    transactions: transactionSet,
    stats,
    warning: transactionSet.length === 0 ? emptyResultWarning(stats) : null,
  }
}
