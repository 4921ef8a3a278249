import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { CommanderError } from 'commander'
import {
  parseArgs,
  parseFormatOption,
  parseYearOption,
  parseMonthOption,
  parseSalaryOption,
} from '../args.js'

const argv = (...args: string[]) => ['node', 'spendwise', ...args]

describe('option parsers', () => {
  it('parseFormatOption accepts json and text only', () => {
    expect(parseFormatOption('json')).toBe('json')
    expect(parseFormatOption('text')).toBe('text')
    expect(() => parseFormatOption('xml')).toThrow('Expected "json" or "text".')
  })

  it('parseYearOption requires four digits', () => {
    expect(parseYearOption('2024')).toBe(2024)
    expect(() => parseYearOption('24')).toThrow('Expected a four-digit year.')
    expect(() => parseYearOption('last')).toThrow('Expected a four-digit year.')
  })

  it('parseMonthOption accepts numbers, names and abbreviations', () => {
    expect(parseMonthOption('3')).toBe(3)
    expect(parseMonthOption('03')).toBe(3)
    expect(parseMonthOption('12')).toBe(12)
    expect(parseMonthOption('June')).toBe(6)
    expect(parseMonthOption('dec')).toBe(12)
    expect(parseMonthOption('SEP')).toBe(9)
  })

  it('parseMonthOption rejects anything else', () => {
    expect(() => parseMonthOption('0')).toThrow('Expected a month number (1-12) or name.')
    expect(() => parseMonthOption('13')).toThrow('Expected a month number (1-12) or name.')
    expect(() => parseMonthOption('ju')).toThrow('Expected a month number (1-12) or name.')
    expect(() => parseMonthOption('sept')).toThrow('Expected a month number (1-12) or name.')
  })

  it('parseSalaryOption accepts non-negative numbers', () => {
    expect(parseSalaryOption('3000')).toBe(3000)
    expect(parseSalaryOption('0')).toBe(0)
    expect(() => parseSalaryOption('-1')).toThrow('Expected a non-negative number.')
    expect(() => parseSalaryOption('')).toThrow('Expected a non-negative number.')
    expect(() => parseSalaryOption('plenty')).toThrow('Expected a non-negative number.')
  })
})

describe('parseArgs', () => {
  beforeEach(() => {
    vi.spyOn(process.stdout, 'write').mockImplementation(() => true)
    vi.spyOn(process.stderr, 'write').mockImplementation(() => true)
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('parses summary with defaults', () => {
    expect(parseArgs(argv('summary', 'january.csv'))).toEqual({
      command: 'summary',
      file: 'january.csv',
      options: { format: 'json', quiet: false, yearly: false },
    })
  })

  it('parses scope and output options', () => {
    expect(
      parseArgs(argv('analyze', 'statement.csv', '-y', '2023', '--month', 'feb', '-f', 'text', '-q'))
    ).toEqual({
      command: 'analyze',
      file: 'statement.csv',
      options: { format: 'text', quiet: true, year: 2023, month: 2, yearly: false },
    })
  })

  it('parses a yearly summary', () => {
    const action = parseArgs(argv('summary', 'statement.csv', '--year', '2024', '--yearly'))

    expect(action).toMatchObject({ command: 'summary', options: { year: 2024, yearly: true } })
  })

  it('parses periods with a config path', () => {
    expect(parseArgs(argv('periods', 'statement.csv', '--config', '/tmp/config.json'))).toEqual({
      command: 'periods',
      file: 'statement.csv',
      options: { format: 'json', quiet: false, config: '/tmp/config.json' },
    })
  })

  it('parses forecast with a salary', () => {
    expect(parseArgs(argv('forecast', 'statement.csv', '--salary', '3000'))).toEqual({
      command: 'forecast',
      file: 'statement.csv',
      options: { format: 'json', quiet: false, salary: 3000 },
    })
  })

  it('parses setup without a file', () => {
    expect(parseArgs(argv('setup'))).toEqual({
      command: 'setup',
      options: { format: 'json', quiet: false },
    })
  })

  it('returns null after printing the version', () => {
    expect(parseArgs(argv('--version'))).toBeNull()
  })

  it('returns null after printing help', () => {
    expect(parseArgs(argv('summary', '--help'))).toBeNull()
  })

  it('throws on an invalid option value', () => {
    expect(() => parseArgs(argv('summary', 'statement.csv', '--month', '13'))).toThrow()
    expect(() => parseArgs(argv('summary', 'statement.csv', '--format', 'xml'))).toThrow()
  })

  it('rejects --month together with --yearly', () => {
    let error: unknown
    try {
      parseArgs(argv('summary', 'statement.csv', '--yearly', '--month', '3'))
    } catch (err) {
      error = err
    }

    expect(error).toBeInstanceOf(CommanderError)
    expect(error).toMatchObject({ code: 'commander.conflictingOption' })
  })

  it('throws when the statement file is missing', () => {
    expect(() => parseArgs(argv('summary'))).toThrow()
  })
})
