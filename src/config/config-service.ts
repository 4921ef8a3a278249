import { homedir } from 'node:os'
import { dirname, join } from 'node:path'
import { readFile, writeFile, mkdir } from 'node:fs/promises'
import { existsSync } from 'node:fs'
import { appConfigSchema, type AppConfig } from './config-types.js'

const CONFIG_DIR = join(homedir(), '.config', 'spendwise')
const CONFIG_FILE = join(CONFIG_DIR, 'config.json')

export const getConfigPath = () => CONFIG_FILE

/**
 * Reads the config file. Returns null when the file is missing or invalid.
 */
export const loadConfig = async (path: string = CONFIG_FILE): Promise<AppConfig | null> => {
  try {
    if (!existsSync(path)) return null
    const content = await readFile(path, 'utf-8')
    const parsed: unknown = JSON.parse(content)
    return appConfigSchema.parse(parsed)
  } catch {
    return null
  }
}

export const saveConfig = async (config: AppConfig, path: string = CONFIG_FILE): Promise<void> => {
  await mkdir(dirname(path), { recursive: true })
  await writeFile(path, JSON.stringify(config, null, 2))
}
