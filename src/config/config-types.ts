import { z } from 'zod'

export const budgetConfigSchema = z.object({
  /** Net monthly salary; savings forecasts use it when set and above 0 */
  monthlySalary: z.number().finite().min(0).optional(),
})

const isSupportedLocale = (value: string): boolean => {
  try {
    return Intl.NumberFormat.supportedLocalesOf(value).length > 0
  } catch {
    return false
  }
}

export const displayConfigSchema = z.object({
  currency: z
    .string()
    .regex(/^[A-Z]{3}$/, 'Currency must be a 3-letter ISO code')
    .default('USD'),
  locale: z
    .string()
    .min(2)
    .refine(isSupportedLocale, 'Locale must be a supported BCP 47 tag, such as en-US')
    .default('en-US'),
  maxCategories: z.number().int().min(1).max(50).default(15),
})

export const appConfigSchema = z.object({
  budget: budgetConfigSchema.default({}),
  display: displayConfigSchema.default({}),
})

export type BudgetConfig = z.infer<typeof budgetConfigSchema>
export type DisplayConfig = z.infer<typeof displayConfigSchema>
export type AppConfig = z.infer<typeof appConfigSchema>

export const CURRENCIES = [
  { value: 'USD', label: 'US Dollar' },
  { value: 'EUR', label: 'Euro' },
  { value: 'GBP', label: 'British Pound' },
  { value: 'CAD', label: 'Canadian Dollar' },
  { value: 'AUD', label: 'Australian Dollar' },
  { value: 'INR', label: 'Indian Rupee' },
  { value: 'JPY', label: 'Japanese Yen' },
] as const
