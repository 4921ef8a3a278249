/** Share of spending suggested as savings when no salary is known. */
export const DEFAULT_SAVINGS_RATE = 0.2

export const suggestSavings = (spending: number): number => spending * DEFAULT_SAVINGS_RATE
