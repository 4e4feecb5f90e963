/**
 * File writers for the three generation artifacts.
 */

import { mkdirSync, writeFileSync } from 'node:fs'
import { join } from 'node:path'

export const OUTPUT_FILES = {
  raw: 'leaflet-providers-raw.json',
  parsed: 'leaflet-providers-parsed.json',
  module: 'leaflet-providers.ts',
} as const

export type OutputFile = keyof typeof OUTPUT_FILES

export type OutputPaths = Record<OutputFile, string>

export function outputPaths(outputDir: string): OutputPaths {
  return {
    raw: join(outputDir, OUTPUT_FILES.raw),
    parsed: join(outputDir, OUTPUT_FILES.parsed),
    module: join(outputDir, OUTPUT_FILES.module),
  }
}

/** JSON carries no comments, so provenance for the parsed catalog goes to the console */
export function parsedCatalogBanner(description: string): string[] {
  return [
    'JSON representation of the leaflet providers defined by the leaflet-providers.js ' +
      'extension to Leaflet (https://github.com/leaflet-extras/leaflet-providers)',
    `This file is automatically generated from ${description}`,
  ]
}

export function writeJson(value: unknown, outputPath: string): void {
  writeFileSync(outputPath, JSON.stringify(value, null, 2) + '\n', 'utf-8')
}

export function writeText(content: string, outputPath: string): void {
  writeFileSync(outputPath, content, 'utf-8')
}

export function ensureOutputDir(outputDir: string): void {
  mkdirSync(outputDir, { recursive: true })
}
