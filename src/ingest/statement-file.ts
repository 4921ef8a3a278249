import { readFile } from 'node:fs/promises'
import { extname } from 'node:path'
import type { RawStatement } from './ingest-types.js'

/**
 * Reads a statement from disk. The declared format is the file extension.
 */
export const readStatementFile = async (path: string): Promise<RawStatement> => {
  const content = await readFile(path, 'utf-8')
  return { format: extname(path).slice(1), content }
}
