import * as p from '@clack/prompts'
import { CURRENCIES, appConfigSchema, type AppConfig } from './config-types.js'
import { loadConfig, saveConfig, getConfigPath } from './config-service.js'

/**
 * Validates the salary prompt: blank (no salary) or a non-negative number.
 */
export const validateSalaryInput = (value: string | undefined): string | undefined => {
  const trimmed = (value ?? '').trim()
  if (!trimmed) return undefined
  const salary = Number(trimmed)
  if (!Number.isFinite(salary)) return 'Enter a number, or leave blank to skip'
  if (salary < 0) return 'Salary cannot be negative'
  return undefined
}

/**
 * Interactive setup wizard.
 * Asks for the monthly salary and display currency, then saves the config file.
 */
export const runSetupWizard = async (path: string = getConfigPath()): Promise<AppConfig> => {
  p.intro('Welcome to SpendWise')

  const current = (await loadConfig(path)) ?? appConfigSchema.parse({})

  const salaryInput = await p.text({
    message: 'What is your net monthly salary?',
    placeholder: 'Leave blank to estimate savings as 20% of spending',
    initialValue:
      current.budget.monthlySalary !== undefined ? String(current.budget.monthlySalary) : '',
    validate: validateSalaryInput,
  })

  if (p.isCancel(salaryInput)) {
    p.cancel('Setup cancelled')
    process.exit(0)
  }

  const currency = await p.select({
    message: 'Which currency are your statements in?',
    initialValue: current.display.currency,
    options: CURRENCIES.map((c) => ({ value: c.value, label: c.label, hint: c.value })),
  })

  if (p.isCancel(currency)) {
    p.cancel('Setup cancelled')
    process.exit(0)
  }

  const salaryText = salaryInput.trim()
  const config = appConfigSchema.parse({
    budget: {
      monthlySalary: salaryText ? Number(salaryText) : undefined,
    },
    display: {
      ...current.display,
      currency,
    },
  })

  await saveConfig(config, path)
  p.outro(`Configuration saved to ${path}`)

  return config
}
