import type { PeriodSummary } from '../reporting/types.js'
import {
  CATEGORY_TIPS,
  GENERIC_TIP,
  NO_DATA_TIP,
  UNCATEGORIZED_TIP,
  TOP_CATEGORY_COUNT,
} from './tip-rules.js'

/**
 * The parts of a period summary the tip is based on.
 * `categorySummaries` must already be ranked (as the aggregator returns them).
 */
export type TipInput = Pick<PeriodSummary, 'transactionCount' | 'categorySummaries'>

/**
 * Looks up the advice for a category, falling back to the generic tip.
 */
export const tipForCategory = (category: string): string =>
  Object.prototype.hasOwnProperty.call(CATEGORY_TIPS, category)
    ? CATEGORY_TIPS[category]
    : GENERIC_TIP

/**
 * Generates a saving tip from a period's top spending categories.
 * Pure function with no side effects.
 *
 * @example
 * generateTip(aggregate(transactions, scope))
 * // => 'Focus on reducing spending in your top categories: Groceries and Restaurants. Try meal planning...'
 */
export const generateTip = (summary: TipInput): string => {
  if (summary.transactionCount === 0) {
    return NO_DATA_TIP
  }

  if (summary.categorySummaries.length === 0) {
    return UNCATEGORIZED_TIP
  }

  const topCategories = summary.categorySummaries
    .slice(0, TOP_CATEGORY_COUNT)
    .map((entry) => entry.category)

  return (
    `Focus on reducing spending in your top categories: ${topCategories.join(' and ')}. ` +
    tipForCategory(topCategories[0])
  )
}
