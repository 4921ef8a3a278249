/**
 * Statement ingestion: turns a raw bank-statement export into a frozen set
 * of categorized spending transactions.
 */

export { normalize, createTransaction, isSpending, SUPPORTED_FORMATS } from './normalizer.js'
export { readStatementFile } from './statement-file.js'
export {
  REQUIRED_COLUMNS,
  RESERVED_CATEGORIES,
  UNCATEGORIZED,
  parseAmount,
} from './statement-schema.js'

export type {
  RawStatement,
  Transaction,
  TransactionSet,
  FormatError,
  EmptyResultWarning,
  NormalizeStats,
  NormalizeSuccess,
  NormalizeFailure,
  NormalizeResult,
} from './ingest-types.js'
