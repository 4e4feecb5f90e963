/**
 * Attribution placeholders. Some providers reference another provider's
 * attribution text as `{attribution.<Provider>}`; the referenced texts are
 * collected up front and substituted into every record.
 */

import type { RawCatalog } from '../schema/provider.js'
import { MalformedProviderError, UnknownAttributionError } from './errors.js'

export const ATTRIBUTION_SOURCES = ['OpenStreetMap', 'Esri', 'OpenMapSurfer'] as const

const PLACEHOLDER_PREFIX = '{attribution.'

/** Placeholder token → literal attribution text, in source order */
export type AttributionTable = ReadonlyMap<string, string>

export function attributionPlaceholder(provider: string): string {
  return `${PLACEHOLDER_PREFIX}${provider}}`
}

export function hasAttributionPlaceholder(value: string): boolean {
  return value.includes(PLACEHOLDER_PREFIX)
}

/**
 * Read the attribution of each source provider straight from the raw catalog.
 * A source absent from the catalog gets no entry, so references to it fail as
 * unknown attributions.
 */
export function buildAttributionTable(catalog: RawCatalog): AttributionTable {
  const table = new Map<string, string>()
  for (const source of ATTRIBUTION_SOURCES) {
    const provider = catalog[source]
    if (!provider) continue
    const attribution = provider.options.attribution
    if (typeof attribution !== 'string') {
      throw new MalformedProviderError(source, 'options.attribution must be a string')
    }
    table.set(attributionPlaceholder(source), attribution)
  }
  return table
}

/**
 * Replace every known placeholder in an attribution string, repeating while a
 * substituted text brings in further placeholders. Throws if a
 * placeholder-shaped token is left that the table cannot resolve.
 */
export function resolveAttribution(value: string, table: AttributionTable): string {
  let resolved = value
  for (let pass = 0; pass <= table.size && hasAttributionPlaceholder(resolved); pass++) {
    let replaced = false
    for (const [placeholder, attribution] of table) {
      if (!resolved.includes(placeholder)) continue
      resolved = resolved.replaceAll(placeholder, attribution)
      replaced = true
    }
    if (!replaced) break
  }
  if (hasAttributionPlaceholder(resolved)) throw new UnknownAttributionError(value)
  return resolved
}
