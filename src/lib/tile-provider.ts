/**
 * Read-only tile provider records for consumers that load the parsed JSON
 * catalog at runtime. The generated module carries the same helpers.
 */

import {
  isNormalizedRecord,
  type NormalizedCatalog,
  type NormalizedGroup,
} from '../schema/provider.js'

export type TileProviderValue =
  | string
  | number
  | boolean
  | null
  | readonly TileProviderValue[]
  | { readonly [key: string]: TileProviderValue }

export type TileProvider = {
  readonly name: string
  readonly url: string
  readonly [field: string]: TileProviderValue
}

export type TileProviderGroup = Readonly<Record<string, TileProvider>>

export type TileProviders = Readonly<Record<string, TileProvider | TileProviderGroup>>

/** Frozen copy all the way down, so records never share mutable arrays with their source */
function frozenCopy(value: TileProviderValue): TileProviderValue {
  if (Array.isArray(value)) return Object.freeze(value.map(frozenCopy))
  if (typeof value === 'object' && value !== null) {
    const copy: Record<string, TileProviderValue> = {}
    for (const [key, item] of Object.entries(value)) copy[key] = frozenCopy(item)
    return Object.freeze(copy)
  }
  return value
}

export function tileProvider(fields: TileProvider): TileProvider {
  const copy: Record<string, TileProviderValue> = {}
  for (const [key, value] of Object.entries(fields)) copy[key] = frozenCopy(value)
  return Object.freeze({ ...copy, name: fields.name, url: fields.url })
}

export function tileProviderGroup(variants: NormalizedGroup): TileProviderGroup {
  const group: Record<string, TileProvider> = {}
  for (const [name, record] of Object.entries(variants)) {
    group[name] = tileProvider(record)
  }
  return Object.freeze(group)
}

/** Copy of `provider` with `overrides` applied. `provider` itself is not modified. */
export function deriveProvider(
  provider: TileProvider,
  overrides: { readonly [field: string]: TileProviderValue }
): TileProvider {
  const fields: Record<string, TileProviderValue> = { ...provider, ...overrides }
  const { name, url } = fields
  if (typeof name !== 'string' || typeof url !== 'string') {
    throw new TypeError(`Overrides for ${provider.name} must keep a string name and url`)
  }
  return tileProvider({ ...fields, name, url })
}

export function hydrateCatalog(catalog: NormalizedCatalog): TileProviders {
  const providers: Record<string, TileProvider | TileProviderGroup> = {}
  for (const [name, entry] of Object.entries(catalog)) {
    providers[name] = isNormalizedRecord(entry) ? tileProvider(entry) : tileProviderGroup(entry)
  }
  return Object.freeze(providers)
}
