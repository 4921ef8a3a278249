import { loadConfig as loadConfigFile } from './config-service.js'
import { appConfigSchema, budgetConfigSchema, displayConfigSchema, type AppConfig } from './config-types.js'

/**
 * Environment variable names for CLI automation
 */
export const ENV_VARS = {
  SALARY: 'SPENDWISE_SALARY',
  CURRENCY: 'SPENDWISE_CURRENCY',
  LOCALE: 'SPENDWISE_LOCALE',
} as const

export type ConfigSource = 'env' | 'file' | 'mixed' | 'defaults'

export interface LoadConfigResult {
  config: AppConfig
  source: ConfigSource
  /** Env vars that were set but could not be used */
  invalid: string[]
}

const readEnv = (name: string): string | undefined => {
  const value = process.env[name]?.trim()
  return value ? value : undefined
}

/**
 * Load config from environment variables, with fallback to config file.
 * Env vars take priority over config file values; anything still unset
 * gets its schema default. Env values that fail validation are skipped
 * and reported in `invalid`.
 */
export const loadConfigWithEnv = async (path?: string): Promise<LoadConfigResult> => {
  const fileConfig = await loadConfigFile(path)
  const invalid: string[] = []

  const validated = <T>(
    name: string,
    raw: string | undefined,
    parse: (value: string) => { success: true; data: T } | { success: false }
  ): T | undefined => {
    if (raw === undefined) return undefined
    const result = parse(raw)
    if (result.success) return result.data
    invalid.push(name)
    return undefined
  }

  const envSalary = validated(ENV_VARS.SALARY, readEnv(ENV_VARS.SALARY), (value) =>
    budgetConfigSchema.shape.monthlySalary.safeParse(Number(value))
  )
  const envCurrency = validated(ENV_VARS.CURRENCY, readEnv(ENV_VARS.CURRENCY), (value) =>
    displayConfigSchema.shape.currency.safeParse(value.toUpperCase())
  )
  const envLocale = validated(ENV_VARS.LOCALE, readEnv(ENV_VARS.LOCALE), (value) =>
    displayConfigSchema.shape.locale.safeParse(value)
  )

  const config = appConfigSchema.parse({
    budget: {
      monthlySalary: envSalary ?? fileConfig?.budget.monthlySalary,
    },
    display: {
      currency: envCurrency ?? fileConfig?.display.currency,
      locale: envLocale ?? fileConfig?.display.locale,
      maxCategories: fileConfig?.display.maxCategories,
    },
  })

  const usedEnv = envSalary !== undefined || envCurrency !== undefined || envLocale !== undefined

  let source: ConfigSource
  if (usedEnv) {
    source = fileConfig ? 'mixed' : 'env'
  } else {
    source = fileConfig ? 'file' : 'defaults'
  }

  return { config, source, invalid }
}
