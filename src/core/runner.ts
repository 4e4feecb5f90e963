/**
 * Core runner — orchestrates: fetch → validate → normalize → render → write.
 *
 * Nothing is written until every stage has succeeded.
 */

import { normalizeCatalog, parseRawCatalog } from '../lib/normalize.js'
import { isNormalizedRecord, type NormalizedCatalog } from '../schema/provider.js'
import type { ProviderFetcher } from './fetch-providers.js'
import { ensureOutputDir, outputPaths, parsedCatalogBanner, writeJson, writeText, type OutputPaths } from './output.js'
import { generateModule } from './render-module.js'

export interface RunOptions {
  fetch: ProviderFetcher
  outputDir: string
  /** Date stamped into the generated module header */
  date?: Date
}

export interface RunResult {
  description: string
  providerCount: number
  recordCount: number
  files: OutputPaths
  durationMs: number
}

export function countRecords(catalog: NormalizedCatalog): number {
  let count = 0
  for (const entry of Object.values(catalog)) {
    count += isNormalizedRecord(entry) ? 1 : Object.keys(entry).length
  }
  return count
}

export async function runGeneration({ fetch, outputDir, date = new Date() }: RunOptions): Promise<RunResult> {
  const startTime = Date.now()

  // 1. Fetch raw registry
  const { data, description } = await fetch()
  console.log(`[fetch] Got leaflet-providers at ${description}`)

  // 2. Normalize
  const catalog = normalizeCatalog(parseRawCatalog(data))
  const providerCount = Object.keys(catalog).length
  const recordCount = countRecords(catalog)
  console.log(`[normalize] ${providerCount} providers, ${recordCount} tile layers`)

  // 3. Render
  const moduleText = generateModule(catalog, description, date)
  console.log(`[render] Generated module (${moduleText.length} chars)`)

  // 4. Write output
  const files = outputPaths(outputDir)
  ensureOutputDir(outputDir)
  writeJson(data, files.raw)
  for (const line of parsedCatalogBanner(description)) console.log(line)
  writeJson(catalog, files.parsed)
  writeText(moduleText, files.module)
  console.log(`[write] Output written to ${outputDir}`)

  return {
    description,
    providerCount,
    recordCount,
    files,
    durationMs: Date.now() - startTime,
  }
}
