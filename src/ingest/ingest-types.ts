/**
 * Types for bank-statement ingestion.
 *
 * A statement goes in as raw text plus its declared format and comes out
 * as a frozen set of spending transactions, or a format error.
 */

import type { MonthName } from '../shared/calendar.js'

/**
 * Raw statement as handed over by the caller.
 *
 * @example
 * const statement: RawStatement = {
 *   format: 'csv',
 *   content: 'Date,Amount,Category\n2024-01-05,50,Groceries\n',
 * }
 */
export interface RawStatement {
  /** Declared file type, usually the file extension (case-insensitive) */
  format: string
  content: string
}

/**
 * A single normalized spending record.
 * Every derived field is computed from `date` and never set on its own.
 */
export interface Transaction {
  /** Calendar date in YYYY-MM-DD format */
  readonly date: string
  /** Amount spent, always > 0 */
  readonly amount: number
  readonly category: string
  readonly year: number
  /** Month number, 1-12 */
  readonly month: number
  readonly monthName: MonthName
  readonly day: number
  /** floor((day - 1) / 7) + 1, range 1-5 */
  readonly weekOfMonth: number
}

/**
 * All transactions of one statement. Replaced as a whole, never mutated.
 */
export type TransactionSet = readonly Transaction[]

/**
 * Unsupported format, unreadable table or missing required columns.
 * Nothing is processed when this is returned.
 */
export interface FormatError {
  type: 'format_error'
  message: string
  /** Required columns absent from the header row (empty for other causes) */
  missingColumns: string[]
}

/**
 * The statement was read but no spending transaction survived.
 */
export interface EmptyResultWarning {
  type: 'empty_result'
  message: string
  rowsRead: number
}

/**
 * Row counts from a normalization run.
 * `rejectedRows` had an unparsable date or amount; `excludedRows` were
 * income, savings or non-positive amounts.
 */
export interface NormalizeStats {
  rowsRead: number
  rejectedRows: number
  excludedRows: number
  retainedRows: number
}

export interface NormalizeSuccess {
  success: true
  transactions: TransactionSet
  stats: NormalizeStats
  warning: EmptyResultWarning | null
}

export interface NormalizeFailure {
  success: false
  error: FormatError
}

export type NormalizeResult = NormalizeSuccess | NormalizeFailure
