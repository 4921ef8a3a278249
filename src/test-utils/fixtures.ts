import type { Transaction, TransactionSet, RawStatement } from '../ingest/ingest-types.js'
import { createTransaction } from '../ingest/normalizer.js'
import { parseCalendarDate } from '../shared/calendar.js'
import { appConfigSchema, type AppConfig } from '../config/config-types.js'

interface MockTransactionInput {
  date: string
  amount: number
  category: string
}

/**
 * Creates a Transaction with sensible defaults; derived fields come from the date
 */
export const createMockTransaction = (
  overrides: Partial<MockTransactionInput> = {}
): Transaction => {
  const input: MockTransactionInput = {
    date: '2024-01-15',
    amount: 10,
    category: 'Groceries',
    ...overrides,
  }
  const date = parseCalendarDate(input.date)
  if (!date) {
    throw new Error(`Invalid fixture date: ${input.date}`)
  }
  return createTransaction(date, input.amount, input.category)
}

/**
 * Creates a frozen TransactionSet from [date, amount, category] tuples
 */
export const createMockTransactionSet = (
  rows: Array<[date: string, amount: number, category: string]>
): TransactionSet =>
  Object.freeze(rows.map(([date, amount, category]) => createMockTransaction({ date, amount, category })))

/**
 * Creates a CSV RawStatement from a header and rows
 */
export const createMockStatement = (
  rows: string[][],
  header: string[] = ['Date', 'Amount', 'Category']
): RawStatement => ({
  format: 'csv',
  content: [header, ...rows].map((row) => row.join(',')).join('\n') + '\n',
})

/**
 * Creates an AppConfig with schema defaults
 */
export const createMockConfig = (overrides: Partial<AppConfig> = {}): AppConfig => ({
  ...appConfigSchema.parse({}),
  ...overrides,
})
