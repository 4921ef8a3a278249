import { describe, it, expect } from 'vitest'
import { parseAmount, missingColumns, statementRowSchema } from '../statement-schema.js'

describe('parseAmount', () => {
  it('parses signed decimals', () => {
    expect(parseAmount('50')).toBe(50)
    expect(parseAmount('-12.50')).toBe(-12.5)
    expect(parseAmount('+3')).toBe(3)
    expect(parseAmount('.5')).toBe(0.5)
    expect(parseAmount(' 7.25 ')).toBe(7.25)
  })

  it('parses exponent notation', () => {
    expect(parseAmount('1e3')).toBe(1000)
  })

  it('rejects blank and non-numeric values', () => {
    expect(parseAmount('')).toBeNull()
    expect(parseAmount('   ')).toBeNull()
    expect(parseAmount('abc')).toBeNull()
    expect(parseAmount('$12.00')).toBeNull()
    expect(parseAmount('1,200')).toBeNull()
    expect(parseAmount('0x10')).toBeNull()
    expect(parseAmount('Infinity')).toBeNull()
  })
})

describe('missingColumns', () => {
  it('lists required columns not in the header', () => {
    expect(missingColumns(['Amount', 'Memo'])).toEqual(['Date', 'Category'])
  })

  it('returns an empty list when all are present', () => {
    expect(missingColumns(['Category', 'Date', 'Amount', 'Memo'])).toEqual([])
  })
})

describe('statementRowSchema', () => {
  it('produces a typed row and strips extra columns', () => {
    const result = statementRowSchema.safeParse({
      Date: '2024-01-05',
      Amount: '-20',
      Category: ' Income ',
      Memo: 'payday',
    })

    expect(result.success).toBe(true)
    if (result.success) {
      expect(result.data).toEqual({
        Date: { iso: '2024-01-05', year: 2024, month: 1, day: 5 },
        Amount: -20,
        Category: 'Income',
      })
    }
  })

  it('fails on an unparsable date', () => {
    const result = statementRowSchema.safeParse({ Date: 'soon', Amount: '1', Category: 'x' })

    expect(result.success).toBe(false)
    if (!result.success) {
      expect(result.error.issues[0].message).toBe('Unparsable date: "soon"')
    }
  })

  it('fails on an unparsable amount', () => {
    const result = statementRowSchema.safeParse({ Date: '2024-01-05', Amount: 'ten', Category: 'x' })

    expect(result.success).toBe(false)
    if (!result.success) {
      expect(result.error.issues[0].message).toBe('Unparsable amount: "ten"')
    }
  })
})
