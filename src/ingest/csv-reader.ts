/**
 * Splits delimited text into rows of cells.
 * Handles quoted cells (with "" as an escaped quote), CRLF and LF endings.
 */
export const parseCsvRows = (text: string, delimiter = ','): string[][] => {
  const rows: string[][] = []
  let row: string[] = []
  let cell = ''
  let inQuotes = false

  for (let i = 0; i < text.length; i += 1) {
    const char = text[i]

    if (char === '"') {
      if (inQuotes && text[i + 1] === '"') {
        cell += '"'
        i += 1
      } else {
        inQuotes = !inQuotes
      }
      continue
    }

    if (char === delimiter && !inQuotes) {
      row.push(cell)
      cell = ''
      continue
    }

    if ((char === '\n' || char === '\r') && !inQuotes) {
      if (char === '\r' && text[i + 1] === '\n') {
        i += 1
      }
      row.push(cell)
      rows.push(row)
      row = []
      cell = ''
      continue
    }

    cell += char
  }

  if (cell.length > 0 || row.length > 0) {
    row.push(cell)
    rows.push(row)
  }

  return rows
}

const isBlankRow = (row: string[]): boolean => row.every((cell) => cell.trim().length === 0)

/**
 * Parses CSV text into a header row and data rows.
 * Strips a leading byte-order mark and skips wholly blank lines.
 * Returns null when there is no header row at all.
 */
export const readCsvTable = (
  text: string
): { header: string[]; rows: string[][] } | null => {
  const withoutBom = text.startsWith('\uFEFF') ? text.slice(1) : text
  const rows = parseCsvRows(withoutBom).filter((row) => !isBlankRow(row))
  if (rows.length === 0) return null

  const [header, ...data] = rows
  return { header: header.map((cell) => cell.trim()), rows: data }
}

/**
 * Pairs header names with a row's cells. The first column with a given
 * name wins; cells missing at the end of a short row read as ''.
 */
export const toRecord = (header: string[], row: string[]): Record<string, string> => {
  const record: Record<string, string> = {}
  header.forEach((name, index) => {
    if (!name || name in record) return
    record[name] = row[index] ?? ''
  })
  return record
}
