import { describe, it, expect, vi, beforeEach } from 'vitest'
import { readStatementFile } from '../statement-file.js'

vi.mock('node:fs/promises', () => ({
  readFile: vi.fn(),
}))

import { readFile } from 'node:fs/promises'

const mockReadFile = vi.mocked(readFile)

describe('readStatementFile', () => {
  beforeEach(() => {
    vi.clearAllMocks()
  })

  it('takes the declared format from the file extension', async () => {
    mockReadFile.mockResolvedValue('Date,Amount,Category\n')

    const statement = await readStatementFile('/statements/january.CSV')

    expect(statement).toEqual({ format: 'CSV', content: 'Date,Amount,Category\n' })
    expect(mockReadFile).toHaveBeenCalledWith('/statements/january.CSV', 'utf-8')
  })

  it('reports an empty format for files without an extension', async () => {
    mockReadFile.mockResolvedValue('')

    const statement = await readStatementFile('/statements/export')

    expect(statement.format).toBe('')
  })

  it('propagates read errors', async () => {
    mockReadFile.mockRejectedValue(new Error('ENOENT: no such file'))

    await expect(readStatementFile('/missing.csv')).rejects.toThrow('ENOENT')
  })
})
