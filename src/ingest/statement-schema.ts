import { z } from 'zod'
import { parseCalendarDate } from '../shared/calendar.js'

/** Columns every statement must carry, matched after trimming. */
export const REQUIRED_COLUMNS = ['Date', 'Amount', 'Category'] as const

export type RequiredColumn = (typeof REQUIRED_COLUMNS)[number]

/** Categories that are never counted as spending. */
export const RESERVED_CATEGORIES: ReadonlySet<string> = new Set(['Savings', 'Income'])

/** Label given to rows whose category cell is blank. */
export const UNCATEGORIZED = 'Uncategorized'

const AMOUNT_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/

/**
 * Parses a signed decimal amount. Blank or non-numeric input returns null.
 *
 * @example
 * parseAmount('-12.50') // => -12.5
 * parseAmount('12,50')  // => null
 */
export const parseAmount = (raw: string): number | null => {
  const value = raw.trim()
  if (!AMOUNT_PATTERN.test(value)) return null
  const amount = Number(value)
  return Number.isFinite(amount) ? amount : null
}

export const missingColumns = (header: string[]): RequiredColumn[] =>
  REQUIRED_COLUMNS.filter((column) => !header.includes(column))

/**
 * Schema for one statement row, keyed by trimmed header name.
 * Extra columns are stripped.
 */
export const statementRowSchema = z.object({
  Date: z.string().transform((value, ctx) => {
    const date = parseCalendarDate(value)
    if (!date) {
      ctx.addIssue({ code: 'custom', message: `Unparsable date: "${value}"` })
      return z.NEVER
    }
    return date
  }),
  Amount: z.string().transform((value, ctx) => {
    const amount = parseAmount(value)
    if (amount === null) {
      ctx.addIssue({ code: 'custom', message: `Unparsable amount: "${value}"` })
      return z.NEVER
    }
    return amount
  }),
  Category: z.string().transform((value) => value.trim() || UNCATEGORIZED),
})

export type ParsedStatementRow = z.infer<typeof statementRowSchema>
