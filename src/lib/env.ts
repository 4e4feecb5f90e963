import dotenv from 'dotenv'
import { existsSync } from 'node:fs'
import { dirname, join } from 'node:path'
import { fileURLToPath } from 'node:url'

const THIS_FILE_DIR = dirname(fileURLToPath(import.meta.url))

/** Nearest directory above `start` holding a package.json (src/lib and dist/src/lib alike) */
export function findProjectRoot(start: string): string {
  let dir = start
  while (!existsSync(join(dir, 'package.json'))) {
    const parent = dirname(dir)
    if (parent === dir) return start
    dir = parent
  }
  return dir
}

export const PROJECT_ROOT = findProjectRoot(THIS_FILE_DIR)

const ROOT_ENV_PATH = join(PROJECT_ROOT, '.env')

if (existsSync(ROOT_ENV_PATH)) {
  dotenv.config({ path: ROOT_ENV_PATH })
} else {
  dotenv.config()
}

export const LEAFLET_PROVIDERS_GIT_URL =
  process.env.LEAFLET_PROVIDERS_GIT_URL || 'https://github.com/leaflet-extras/leaflet-providers.git'
export const CHROMIUM_PATH = process.env.CHROMIUM_PATH || undefined
export const HEADLESS = (process.env.HEADLESS ?? 'true').toLowerCase() !== 'false'
export const NAV_TIMEOUT_MS = Number(process.env.NAV_TIMEOUT_MS || 60_000)
export const LEAFLET_PROVIDERS_RAW_FILE = process.env.LEAFLET_PROVIDERS_RAW_FILE || undefined
export const LEAFLET_PROVIDERS_DESCRIPTION = process.env.LEAFLET_PROVIDERS_DESCRIPTION || undefined

/** Output location is fixed: <project root>/output */
export const OUTPUT_DIR = join(PROJECT_ROOT, 'output')
