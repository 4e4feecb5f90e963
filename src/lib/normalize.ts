/**
 * Normalization of the raw leaflet-providers registry into a flat,
 * language-neutral catalog: options merged into each record, variants
 * expanded, camelCase zoom keys renamed and attribution placeholders resolved.
 */

import {
  rawCatalogSchema,
  type Fields,
  type JsonValue,
  type NormalizedCatalog,
  type NormalizedEntry,
  type NormalizedGroup,
  type NormalizedRecord,
  type RawCatalog,
  type RawProvider,
  type RawVariant,
} from '../schema/provider.js'
import { buildAttributionTable, resolveAttribution, type AttributionTable } from './attribution.js'
import { MalformedProviderError } from './errors.js'

/** camelCase key → canonical key, applied to keys and to `{placeholder}`s in url templates */
export const RENAMED_KEYS: ReadonlyMap<string, string> = new Map([
  ['maxZoom', 'max_zoom'],
  ['minZoom', 'min_zoom'],
])

const RESERVED_NAME = '__proto__'

function isJsonObject(value: JsonValue | undefined): value is { [key: string]: JsonValue } {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/** zod rebuilds mappings by assignment, which would drop a `__proto__` entry without a trace */
function rejectReservedNames(data: JsonValue): void {
  if (!isJsonObject(data)) return
  for (const [name, provider] of Object.entries(data)) {
    if (name === RESERVED_NAME) throw new MalformedProviderError(name, 'reserved name')
    if (!isJsonObject(provider)) continue
    const { variants } = provider
    if (isJsonObject(variants) && Object.hasOwn(variants, RESERVED_NAME)) {
      throw new MalformedProviderError(name, `variants.${RESERVED_NAME}: reserved name`)
    }
  }
}

/** Validate scraped JSON into the tagged raw provider shape */
export function parseRawCatalog(data: JsonValue): RawCatalog {
  rejectReservedNames(data)
  const parsed = rawCatalogSchema.safeParse(data)
  if (parsed.success) return parsed.data

  const issue = parsed.error.issues[0]
  const [provider, ...path] = issue.path
  throw new MalformedProviderError(
    provider === undefined ? '(catalog)' : String(provider),
    path.length > 0 ? `${path.join('.')}: ${issue.message}` : issue.message
  )
}

export function normalizeCatalog(catalog: RawCatalog): NormalizedCatalog {
  const attributions = buildAttributionTable(catalog)
  const result: NormalizedCatalog = {}
  for (const [name, provider] of Object.entries(catalog)) {
    result[name] = normalizeProvider(name, provider, attributions)
  }
  return result
}

export function normalizeProvider(
  name: string,
  provider: RawProvider,
  attributions: AttributionTable
): NormalizedEntry {
  const base: Fields = { ...provider.fields, ...provider.options }

  if (provider.kind === 'leaf') {
    return toRecord(name, canonicalizeFields({ ...base, name }, attributions))
  }

  const group: NormalizedGroup = {}
  for (const [variantName, variant] of Object.entries(provider.variants)) {
    const qualified = `${name}.${variantName}`
    const merged: Fields = { ...base, ...variantFields(variant), name: qualified }
    group[variantName] = toRecord(qualified, canonicalizeFields(merged, attributions))
  }
  return group
}

function variantFields(variant: RawVariant): Fields {
  if (variant.kind === 'suffix') return { variant: variant.variant }
  return { ...variant.fields, ...variant.options }
}

/**
 * Rename zoom keys, rewrite zoom placeholders in the url template and resolve
 * attribution placeholders. Applying it to its own output changes nothing.
 */
export function canonicalizeFields(fields: Fields, attributions: AttributionTable): Fields {
  const result: Fields = {}
  for (const [key, value] of Object.entries(fields)) {
    if (key === 'attribution' && typeof value === 'string') {
      result[key] = resolveAttribution(value, attributions)
    } else if (RENAMED_KEYS.has(key)) {
      result[RENAMED_KEYS.get(key) ?? key] = value
    } else if (key === 'url' && typeof value === 'string') {
      result[key] = renameUrlPlaceholders(value)
    } else {
      result[key] = value
    }
  }
  return result
}

/** `{maxZoom}` → `{max_zoom}`; other placeholders such as `{z}` are untouched */
export function renameUrlPlaceholders(url: string): string {
  let renamed = url
  for (const [from, to] of RENAMED_KEYS) {
    renamed = renamed.replaceAll(`{${from}}`, `{${to}}`)
  }
  return renamed
}

function toRecord(name: string, fields: Fields): NormalizedRecord {
  const { url } = fields
  if (typeof url !== 'string') {
    throw new MalformedProviderError(name, 'no url template after merging options')
  }
  return { ...fields, name, url }
}
