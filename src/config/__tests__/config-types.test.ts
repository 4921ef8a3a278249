import { describe, it, expect } from 'vitest'
import { appConfigSchema, displayConfigSchema, budgetConfigSchema, CURRENCIES } from '../config-types.js'

describe('budgetConfigSchema', () => {
  it('accepts a missing salary', () => {
    const result = budgetConfigSchema.safeParse({})

    expect(result.success).toBe(true)
    if (result.success) {
      expect(result.data.monthlySalary).toBeUndefined()
    }
  })

  it('accepts zero and positive salaries', () => {
    expect(budgetConfigSchema.safeParse({ monthlySalary: 0 }).success).toBe(true)
    expect(budgetConfigSchema.safeParse({ monthlySalary: 3000 }).success).toBe(true)
  })

  it('rejects a negative salary', () => {
    expect(budgetConfigSchema.safeParse({ monthlySalary: -1 }).success).toBe(false)
  })

  it('rejects a non-finite salary', () => {
    expect(budgetConfigSchema.safeParse({ monthlySalary: Infinity }).success).toBe(false)
    expect(budgetConfigSchema.safeParse({ monthlySalary: Number.NaN }).success).toBe(false)
  })

  it('rejects a salary given as text', () => {
    expect(budgetConfigSchema.safeParse({ monthlySalary: '3000' }).success).toBe(false)
  })
})

describe('displayConfigSchema', () => {
  it('applies defaults', () => {
    expect(displayConfigSchema.parse({})).toEqual({
      currency: 'USD',
      locale: 'en-US',
      maxCategories: 15,
    })
  })

  it('rejects a currency that is not a 3-letter code', () => {
    expect(displayConfigSchema.safeParse({ currency: 'usd' }).success).toBe(false)
    expect(displayConfigSchema.safeParse({ currency: 'EURO' }).success).toBe(false)
  })

  it('accepts locales the runtime can format with', () => {
    expect(displayConfigSchema.safeParse({ locale: 'de-DE' }).success).toBe(true)
    expect(displayConfigSchema.safeParse({ locale: 'fr' }).success).toBe(true)
  })

  it('rejects malformed locale tags', () => {
    expect(displayConfigSchema.safeParse({ locale: 'en_US' }).success).toBe(false)
    expect(displayConfigSchema.safeParse({ locale: 'not a locale' }).success).toBe(false)
  })

  it('rejects maxCategories out of range', () => {
    expect(displayConfigSchema.safeParse({ maxCategories: 0 }).success).toBe(false)
    expect(displayConfigSchema.safeParse({ maxCategories: 51 }).success).toBe(false)
    expect(displayConfigSchema.safeParse({ maxCategories: 2.5 }).success).toBe(false)
  })
})

describe('appConfigSchema', () => {
  it('builds a complete config from an empty object', () => {
    expect(appConfigSchema.parse({})).toEqual({
      budget: {},
      display: { currency: 'USD', locale: 'en-US', maxCategories: 15 },
    })
  })

  it('keeps custom values within range', () => {
    const result = appConfigSchema.safeParse({
      budget: { monthlySalary: 4200.5 },
      display: { currency: 'EUR', locale: 'de-DE', maxCategories: 5 },
    })

    expect(result.success).toBe(true)
    if (result.success) {
      expect(result.data.budget.monthlySalary).toBe(4200.5)
      expect(result.data.display.locale).toBe('de-DE')
    }
  })
})

describe('CURRENCIES', () => {
  it('offers valid currency codes', () => {
    for (const currency of CURRENCIES) {
      expect(displayConfigSchema.shape.currency.safeParse(currency.value).success).toBe(true)
    }
  })

  it('lists USD first', () => {
    expect(CURRENCIES[0].value).toBe('USD')
  })
})
