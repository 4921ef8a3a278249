import { Command, InvalidArgumentError, Option } from 'commander'
import { readFileSync } from 'node:fs'
import { fileURLToPath } from 'node:url'
import { dirname, join } from 'node:path'
import { MONTH_NAMES } from '../shared/calendar.js'

const getVersion = (): string => {
  try {
    const __dirname = dirname(fileURLToPath(import.meta.url))
    const pkgPath = join(__dirname, '..', '..', 'package.json')
    const pkg: unknown = JSON.parse(readFileSync(pkgPath, 'utf-8'))
    if (pkg && typeof pkg === 'object' && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version
    }
    return '0.0.0'
  } catch {
    return '0.0.0'
  }
}

export type OutputFormat = 'json' | 'text'

export interface GlobalOptions {
  format: OutputFormat
  quiet: boolean
  config?: string
}

export interface ScopeOptions {
  year?: number
  month?: number
  yearly: boolean
}

export interface SummaryOptions extends GlobalOptions, ScopeOptions {}

export interface AnalyzeOptions extends GlobalOptions, ScopeOptions {}

export type PeriodsOptions = GlobalOptions

export interface ForecastOptions extends GlobalOptions {
  salary?: number
}

export type SetupOptions = GlobalOptions

export type CommandAction =
  | { command: 'summary'; file: string; options: SummaryOptions }
  | { command: 'analyze'; file: string; options: AnalyzeOptions }
  | { command: 'periods'; file: string; options: PeriodsOptions }
  | { command: 'forecast'; file: string; options: ForecastOptions }
  | { command: 'setup'; options: SetupOptions }

export const parseFormatOption = (value: string): OutputFormat => {
  if (value === 'json' || value === 'text') return value
  throw new InvalidArgumentError('Expected "json" or "text".')
}

export const parseYearOption = (value: string): number => {
  if (!/^\d{4}$/.test(value.trim())) {
    throw new InvalidArgumentError('Expected a four-digit year.')
  }
  return Number.parseInt(value, 10)
}

/**
 * Accepts 1-12, a full month name or its three-letter abbreviation.
 *
 * @example
 * parseMonthOption('3')    // => 3
 * parseMonthOption('mar')  // => 3
 * parseMonthOption('June') // => 6
 */
export const parseMonthOption = (value: string): number => {
  const trimmed = value.trim()
  if (/^\d{1,2}$/.test(trimmed)) {
    const month = Number.parseInt(trimmed, 10)
    if (month >= 1 && month <= 12) return month
  }

  const lower = trimmed.toLowerCase()
  const index = MONTH_NAMES.findIndex(
    (name) => name.toLowerCase() === lower || (lower.length === 3 && name.toLowerCase().startsWith(lower))
  )
  if (index >= 0) return index + 1

  throw new InvalidArgumentError('Expected a month number (1-12) or name.')
}

export const parseSalaryOption = (value: string): number => {
  const salary = Number(value.trim())
  if (!value.trim() || !Number.isFinite(salary) || salary < 0) {
    throw new InvalidArgumentError('Expected a non-negative number.')
  }
  return salary
}

interface RawGlobalOptions {
  format: OutputFormat
  quiet: boolean
  config?: string
}

interface RawScopeOptions extends RawGlobalOptions {
  year?: number
  month?: number
  yearly: boolean
}

/**
 * Parse CLI arguments and return the command to execute
 * Returns null if --help or --version was displayed
 */
export const parseArgs = (argv: string[]): CommandAction | null => {
  let result: CommandAction | null = null

  const program = new Command()
    .name('spendwise')
    .description('Bank-statement spending summaries, saving tips and forecasts')
    .version(getVersion())

  // Throw instead of calling process.exit; subcommands inherit this when created
  program.exitOverride()

  // Global options available to all subcommands
  const addGlobalOptions = (cmd: Command) => {
    return cmd
      .option('-f, --format <format>', 'Output format: json or text', parseFormatOption, 'json')
      .option('-q, --quiet', 'Suppress progress messages', false)
      .option('--config <path>', 'Path to config file')
  }

  const addScopeOptions = (cmd: Command) => {
    return cmd
      .option('-y, --year <year>', 'Year to summarize (default: most recent in the statement)', parseYearOption)
      .option('-m, --month <month>', 'Month number or name (default: latest month of the year)', parseMonthOption)
      .addOption(
        new Option('--yearly', 'Summarize the whole year instead of one month')
          .default(false)
          .conflicts('month')
      )
  }

  const globalOf = (options: RawGlobalOptions): GlobalOptions => ({
    format: options.format,
    quiet: options.quiet,
    config: options.config,
  })

  const scopeOf = (options: RawScopeOptions): ScopeOptions => ({
    year: options.year,
    month: options.month,
    yearly: options.yearly,
  })

  // Summary command
  addGlobalOptions(
    addScopeOptions(
      program
        .command('summary')
        .description('Total spent, suggested savings and a saving tip for a month or year')
        .argument('<file>', 'Bank statement (CSV)')
    )
  ).action((file: string, options: RawScopeOptions) => {
    result = { command: 'summary', file, options: { ...globalOf(options), ...scopeOf(options) } }
  })

  // Analyze command
  addGlobalOptions(
    addScopeOptions(
      program
        .command('analyze')
        .description('Category breakdown, spending over time and the filtered statement')
        .argument('<file>', 'Bank statement (CSV)')
    )
  ).action((file: string, options: RawScopeOptions) => {
    result = { command: 'analyze', file, options: { ...globalOf(options), ...scopeOf(options) } }
  })

  // Periods command
  addGlobalOptions(
    program
      .command('periods')
      .description('List the years and months present in a statement')
      .argument('<file>', 'Bank statement (CSV)')
  ).action((file: string, options: RawGlobalOptions) => {
    result = { command: 'periods', file, options: globalOf(options) }
  })

  // Forecast command
  addGlobalOptions(
    program
      .command('forecast')
      .description('Project the next 12 months of spending and savings')
      .argument('<file>', 'Bank statement (CSV)')
      .option('-s, --salary <amount>', 'Net monthly salary (overrides config)', parseSalaryOption)
  ).action((file: string, options: RawGlobalOptions & { salary?: number }) => {
    result = { command: 'forecast', file, options: { ...globalOf(options), salary: options.salary } }
  })

  // Setup command
  addGlobalOptions(
    program.command('setup').description('Configure salary and currency interactively')
  ).action((options: RawGlobalOptions) => {
    result = { command: 'setup', options: globalOf(options) }
  })

  try {
    program.parse(argv)
  } catch (err: unknown) {
    // Commander throws on --help and --version, which is expected
    if (err && typeof err === 'object' && 'code' in err) {
      const code = err.code
      if (code === 'commander.helpDisplayed' || code === 'commander.version' || code === 'commander.help') {
        return null
      }
    }
    throw err
  }

  return result
}
