import { normalize, readStatementFile, type RawStatement, type TransactionSet } from '../../ingest/index.js'
import type { OutputFormatter } from '../output.js'

/**
 * Reads and normalizes a statement for a command.
 * Format errors end the command; an empty result is only a warning.
 */
export const loadStatement = async (
  file: string,
  formatter: OutputFormatter
): Promise<TransactionSet> => {
  formatter.progress(`Reading statement ${file}...`)

  let statement: RawStatement
  try {
    statement = await readStatementFile(file)
  } catch (error) {
    formatter.error(
      `Could not read statement file: ${file}`,
      error instanceof Error ? error.message : error
    )
  }

  const result = normalize(statement)
  if (!result.success) {
    formatter.error(result.error.message, result.error)
  }

  const { stats } = result
  formatter.progress(
    `Parsed ${stats.rowsRead} row(s): ${stats.retainedRows} spending, ` +
      `${stats.excludedRows} excluded, ${stats.rejectedRows} unparsable.`
  )

  if (result.warning) {
    formatter.warn(result.warning.message)
  }

  return result.transactions
}
