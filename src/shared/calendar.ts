export const MONTH_NAMES = [
  'January',
  'February',
  'March',
  'April',
  'May',
  'June',
  'July',
  'August',
  'September',
  'October',
  'November',
  'December',
] as const

export type MonthName = (typeof MONTH_NAMES)[number]

/**
 * A validated calendar date, split into its parts.
 * `iso` is always `YYYY-MM-DD`.
 */
export interface CalendarDate {
  iso: string
  year: number
  month: number
  day: number
}

/**
 * Full English name for a month number (1-12).
 */
export const monthName = (month: number): MonthName => {
  const name = MONTH_NAMES[month - 1]
  if (name === undefined) {
    throw new RangeError(`Month out of range: ${month}`)
  }
  return name
}

/**
 * Week within the month: days 1-7 are week 1, days 29-31 are week 5.
 */
export const weekOfMonth = (day: number): number => Math.floor((day - 1) / 7) + 1

const daysInMonth = (year: number, month: number): number =>
  new Date(Date.UTC(year, month, 0)).getUTCDate()

const formatIsoDate = (year: number, month: number, day: number): string =>
  `${String(year).padStart(4, '0')}-${String(month).padStart(2, '0')}-${String(day).padStart(2, '0')}`

// Year-first only: 2024-01-05, 2024/01/05, 2024-01-05T10:00:00Z, 2024-01-05 10:00
const DATE_PATTERN = /^(\d{4})[-/](\d{1,2})[-/](\d{1,2})(?:[T ]\S.*)?$/

/**
 * Parses a statement date. Only year-first forms are accepted so that the
 * result never depends on the machine's locale; anything else returns null.
 *
 * @example
 * parseCalendarDate('2024-01-05') // => { iso: '2024-01-05', year: 2024, month: 1, day: 5 }
 * parseCalendarDate('2023-02-29') // => null
 * parseCalendarDate('01/05/2024') // => null
 */
export const parseCalendarDate = (raw: string): CalendarDate | null => {
  const match = raw.trim().match(DATE_PATTERN)
  if (!match) return null

  const year = Number.parseInt(match[1], 10)
  const month = Number.parseInt(match[2], 10)
  const day = Number.parseInt(match[3], 10)

  if (month < 1 || month > 12) return null
  if (day < 1 || day > daysInMonth(year, month)) return null

  return { iso: formatIsoDate(year, month, day), year, month, day }
}

/**
 * Months since year 0, used to measure calendar distance between months.
 */
export const monthOrdinal = (year: number, month: number): number => year * 12 + (month - 1)

/**
 * Inverse of {@link monthOrdinal}.
 */
export const fromMonthOrdinal = (ordinal: number): { year: number; month: number } => ({
  year: Math.floor(ordinal / 12),
  month: (ordinal % 12) + 1,
})
