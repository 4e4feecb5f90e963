#!/usr/bin/env node
/**
 * Regenerate the tile provider catalogs from leaflet-providers.
 *
 * Usage:
 *   npm run generate
 *
 * Takes no flags. Writes output/leaflet-providers-raw.json,
 * output/leaflet-providers-parsed.json and output/leaflet-providers.ts.
 * Settings come from .env (see .env.example).
 */

import {
  CHROMIUM_PATH,
  HEADLESS,
  LEAFLET_PROVIDERS_DESCRIPTION,
  LEAFLET_PROVIDERS_GIT_URL,
  LEAFLET_PROVIDERS_RAW_FILE,
  NAV_TIMEOUT_MS,
  OUTPUT_DIR,
} from './lib/env.js'
import { fetchFromFile, fetchFromUpstream, type ProviderFetcher } from './core/fetch-providers.js'
import { runGeneration, type RunResult } from './core/runner.js'

function selectFetcher(): ProviderFetcher {
  const rawFile = LEAFLET_PROVIDERS_RAW_FILE
  if (rawFile) {
    console.warn(`Using cached snapshot ${rawFile} instead of cloning upstream`)
    return () => fetchFromFile(rawFile, LEAFLET_PROVIDERS_DESCRIPTION)
  }
  return () =>
    fetchFromUpstream({
      gitUrl: LEAFLET_PROVIDERS_GIT_URL,
      executablePath: CHROMIUM_PATH,
      headless: HEADLESS,
      navTimeoutMs: NAV_TIMEOUT_MS,
    })
}

function printResult(r: RunResult) {
  console.log(`  Source: ${r.description}`)
  console.log(`  Providers: ${r.providerCount} (${r.recordCount} tile layers)`)
  console.log(`  Raw: ${r.files.raw}`)
  console.log(`  Parsed: ${r.files.parsed}`)
  console.log(`  Module: ${r.files.module}`)
  console.log(`  Duration: ${(r.durationMs / 1000).toFixed(1)}s`)
}

async function main() {
  const result = await runGeneration({ fetch: selectFetcher(), outputDir: OUTPUT_DIR })
  printResult(result)
}

main().catch(err => {
  console.error('Fatal error:', err)
  process.exit(1)
})
