import { describe, it, expect } from 'vitest'
import {
  parseCalendarDate,
  weekOfMonth,
  monthName,
  monthOrdinal,
  fromMonthOrdinal,
} from '../calendar.js'

describe('parseCalendarDate', () => {
  it('parses ISO dates', () => {
    expect(parseCalendarDate('2024-01-05')).toEqual({
      iso: '2024-01-05',
      year: 2024,
      month: 1,
      day: 5,
    })
  })

  it('accepts slashes and single-digit parts', () => {
    expect(parseCalendarDate('2024/3/7')?.iso).toBe('2024-03-07')
  })

  it('ignores a trailing time part', () => {
    expect(parseCalendarDate('2024-01-05T23:59:59Z')?.iso).toBe('2024-01-05')
    expect(parseCalendarDate('2024-01-05 08:30')?.iso).toBe('2024-01-05')
  })

  it('trims surrounding whitespace', () => {
    expect(parseCalendarDate('  2024-12-31 ')?.iso).toBe('2024-12-31')
  })

  it('rejects dates that do not exist', () => {
    expect(parseCalendarDate('2023-02-29')).toBeNull()
    expect(parseCalendarDate('2024-13-01')).toBeNull()
    expect(parseCalendarDate('2024-04-31')).toBeNull()
    expect(parseCalendarDate('2024-01-00')).toBeNull()
  })

  it('accepts leap days', () => {
    expect(parseCalendarDate('2024-02-29')?.day).toBe(29)
  })

  it('rejects locale-dependent and malformed input', () => {
    expect(parseCalendarDate('01/05/2024')).toBeNull()
    expect(parseCalendarDate('not-a-date')).toBeNull()
    expect(parseCalendarDate('')).toBeNull()
  })
})

describe('weekOfMonth', () => {
  it('maps days 1-7 to week 1', () => {
    expect([1, 2, 3, 4, 5, 6, 7].map(weekOfMonth)).toEqual([1, 1, 1, 1, 1, 1, 1])
  })

  it('starts a new week every 7 days', () => {
    expect(weekOfMonth(8)).toBe(2)
    expect(weekOfMonth(14)).toBe(2)
    expect(weekOfMonth(15)).toBe(3)
    expect(weekOfMonth(22)).toBe(4)
    expect(weekOfMonth(28)).toBe(4)
  })

  it('maps days 29-31 to week 5', () => {
    expect([29, 30, 31].map(weekOfMonth)).toEqual([5, 5, 5])
  })
})

describe('monthName', () => {
  it('returns full English month names', () => {
    expect(monthName(1)).toBe('January')
    expect(monthName(12)).toBe('December')
  })

  it('throws outside 1-12', () => {
    expect(() => monthName(0)).toThrow(RangeError)
    expect(() => monthName(13)).toThrow(RangeError)
  })
})

describe('monthOrdinal', () => {
  it('counts calendar distance across year boundaries', () => {
    expect(monthOrdinal(2024, 1) - monthOrdinal(2023, 12)).toBe(1)
    expect(monthOrdinal(2024, 3) - monthOrdinal(2023, 11)).toBe(4)
  })

  it('round-trips through fromMonthOrdinal', () => {
    expect(fromMonthOrdinal(monthOrdinal(2023, 12))).toEqual({ year: 2023, month: 12 })
    expect(fromMonthOrdinal(monthOrdinal(2024, 1))).toEqual({ year: 2024, month: 1 })
  })
})
