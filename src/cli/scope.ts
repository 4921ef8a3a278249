import type { ScopeOptions } from './args.js'
import type { AvailablePeriods, Scope } from '../reporting/types.js'

/**
 * Turns the year/month flags into a scope, filling gaps from the data:
 * no year means the most recent year, no month means that year's latest
 * month. A period absent from the data is still returned (its summary is
 * simply empty). With no data and no flags, the current month is used.
 *
 * @example
 * resolveScope(periods, { yearly: false })                 // latest month in the data
 * resolveScope(periods, { year: 2023, yearly: true })      // { kind: 'yearly', year: 2023 }
 * resolveScope(periods, { year: 2023, month: 6, yearly: false })
 */
export const resolveScope = (
  periods: AvailablePeriods,
  options: ScopeOptions,
  now: Date = new Date()
): Scope => {
  const fallback = periods.defaultSelection ?? {
    year: now.getFullYear(),
    month: now.getMonth() + 1,
  }
  const year = options.year ?? fallback.year

  if (options.yearly) {
    return { kind: 'yearly', year }
  }

  if (options.month !== undefined) {
    return { kind: 'monthly', year, month: options.month }
  }

  const monthsInYear = periods.monthsByYear[year] ?? []
  const month =
    monthsInYear.length > 0
      ? Math.max(...monthsInYear.map((option) => option.month))
      : fallback.month

  return { kind: 'monthly', year, month }
}
