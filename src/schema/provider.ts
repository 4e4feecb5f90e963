/**
 * Tile provider shapes — raw leaflet-providers definitions as scraped from the
 * browser, and the normalized catalog every output is rendered from.
 */

import { z } from 'zod'

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue }

/** Flat field mapping. Key order is insertion order and is preserved end to end. */
export type Fields = Record<string, JsonValue>

export type RawVariant =
  | { kind: 'suffix'; variant: string }
  | { kind: 'override'; fields: Fields; options: Fields }

export type RawProvider =
  | { kind: 'leaf'; fields: Fields; options: Fields }
  | { kind: 'variants'; fields: Fields; options: Fields; variants: Record<string, RawVariant> }

export type RawCatalog = Record<string, RawProvider>

/** A leaf record: always named, always has a url template */
export type NormalizedRecord = Fields & { name: string; url: string }

export type NormalizedGroup = Record<string, NormalizedRecord>

export type NormalizedEntry = NormalizedRecord | NormalizedGroup

export type NormalizedCatalog = Record<string, NormalizedEntry>

/** What the fetcher hands over: the verbatim scraped data plus where it came from */
export interface FetchedProviders {
  data: JsonValue
  description: string
}

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(jsonValueSchema), z.record(jsonValueSchema)])
)

const fieldsSchema = z.record(jsonValueSchema)

const rawVariantSchema = z.union([
  z.string().transform((variant): RawVariant => ({ kind: 'suffix', variant })),
  z
    .object({ options: fieldsSchema.optional() })
    .catchall(jsonValueSchema)
    .transform(({ options, ...fields }): RawVariant => ({
      kind: 'override',
      fields,
      options: options ?? {},
    })),
])

const rawProviderSchema = z
  .object({
    options: fieldsSchema,
    variants: z.record(rawVariantSchema).optional(),
  })
  .catchall(jsonValueSchema)
  .transform(({ options, variants, ...fields }): RawProvider =>
    variants === undefined
      ? { kind: 'leaf', fields, options }
      : { kind: 'variants', fields, options, variants }
  )

export const rawCatalogSchema = z.record(rawProviderSchema)

/** True for a catalog entry that is a record rather than a group of variants */
export function isNormalizedRecord(entry: NormalizedEntry): entry is NormalizedRecord {
  return typeof entry.url === 'string' && typeof entry.name === 'string'
}
