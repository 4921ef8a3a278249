import type { OutputFormat } from './args.js'
import type { DisplayConfig } from '../config/config-types.js'

export interface OutputFormatter {
  /** Output successful result to stdout */
  success<T>(data: T): void
  /** Output error to stderr and exit with code 1 */
  error(message: string, details?: unknown): never
  /** Output progress message to stderr (skipped in quiet mode) */
  progress(message: string): void
  /** Output warning to stderr */
  warn(message: string): void
}

const hasFormatted = (data: unknown): data is { formatted: string } =>
  typeof data === 'object' &&
  data !== null &&
  'formatted' in data &&
  typeof data.formatted === 'string'

/**
 * Create an output formatter based on format and quiet settings
 */
export const createFormatter = (format: OutputFormat, quiet: boolean): OutputFormatter => {
  const progress = (message: string) => {
    if (!quiet) {
      process.stderr.write(`${message}\n`)
    }
  }

  const warn = (message: string) => {
    process.stderr.write(`Warning: ${message}\n`)
  }

  if (format === 'json') {
    return {
      success: <T>(data: T) => {
        console.log(JSON.stringify(data, null, 2))
      },
      error: (message: string, details?: unknown): never => {
        console.error(JSON.stringify({ success: false, error: message, details }, null, 2))
        process.exit(1)
      },
      progress,
      warn,
    }
  }

  // Text format
  return {
    success: <T>(data: T) => {
      // For text mode, we expect data to have a formatted string or we'll stringify it
      if (typeof data === 'string') {
        console.log(data)
      } else if (hasFormatted(data)) {
        console.log(data.formatted)
      } else {
        console.log(JSON.stringify(data, null, 2))
      }
    },
    error: (message: string, details?: unknown): never => {
      console.error(`Error: ${message}`)
      if (details) {
        console.error(details)
      }
      process.exit(1)
    },
    progress,
    warn,
  }
}

/**
 * Format an amount as currency in the configured locale
 *
 * @example
 * formatMoney(1234.5, { currency: 'USD', locale: 'en-US' }) // => '$1,234.50'
 */
export const formatMoney = (
  amount: number,
  display: Pick<DisplayConfig, 'currency' | 'locale'>
): string => amount.toLocaleString(display.locale, { style: 'currency', currency: display.currency })

/**
 * Format a percentage with one decimal place
 */
export const formatPercent = (value: number): string => `${value.toFixed(1)}%`

/**
 * Create a simple text table from data
 */
export const formatTable = (
  headers: string[],
  rows: string[][],
  columnWidths?: number[]
): string => {
  const widths = columnWidths || headers.map((h, i) => {
    const maxRowWidth = Math.max(0, ...rows.map(r => (r[i] || '').length))
    return Math.max(h.length, maxRowWidth)
  })

  const formatRow = (cells: string[]) =>
    cells.map((cell, i) => (cell || '').padEnd(widths[i])).join('  ').trimEnd()

  const headerLine = formatRow(headers)
  const separator = widths.map(w => '-'.repeat(w)).join('  ')
  const dataLines = rows.map(formatRow)

  return [headerLine, separator, ...dataLines].join('\n')
}
