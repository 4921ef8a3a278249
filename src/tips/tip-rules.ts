/**
 * Saving advice keyed by exact category name.
 * Add a category here to give it its own tip; everything else gets GENERIC_TIP.
 */
export const CATEGORY_TIPS: Readonly<Record<string, string>> = Object.freeze({
  Groceries:
    'Try meal planning and buying in bulk to save on your Groceries. Check for weekly flyers!',
  Restaurants:
    'Your spending on Restaurants is high. Consider cooking at home or bringing lunch to work 3-4 times a week.',
  Transport:
    'Look into carpooling or using public transportation more often to reduce your Transport costs.',
  Shopping:
    'Before making a purchase under Shopping, apply the 30-day rule: if you still want it after 30 days, buy it.',
  Entertainment:
    'Seek out free or low-cost Entertainment options like local parks, libraries, or free community events.',
  Utilities:
    'Reduce your Utilities bill by being mindful of energy use. Unplug devices and turn off lights when not in use.',
  Rent: 'Rent is a fixed cost. Look for ways to reduce flexible spending to offset this major expense.',
})

export const GENERIC_TIP = 'Always review your smallest, recurring expenses. They add up quickly!'

export const NO_DATA_TIP =
  'No spending data available for this period to generate a specific tip.'

export const UNCATEGORIZED_TIP =
  'No categorized spending found. Start by categorizing your transactions!'

/** How many top categories the tip names. */
export const TOP_CATEGORY_COUNT = 2
