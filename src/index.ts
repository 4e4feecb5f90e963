export { parseRawCatalog, normalizeCatalog, normalizeProvider, canonicalizeFields, renameUrlPlaceholders, RENAMED_KEYS } from './lib/normalize.js'
export { buildAttributionTable, resolveAttribution, attributionPlaceholder, ATTRIBUTION_SOURCES, type AttributionTable } from './lib/attribution.js'
export { UnknownAttributionError, MalformedProviderError, FetchError } from './lib/errors.js'
export { tileProvider, tileProviderGroup, deriveProvider, hydrateCatalog } from './lib/tile-provider.js'
export type { TileProvider, TileProviderGroup, TileProviders, TileProviderValue } from './lib/tile-provider.js'
export { generateModule } from './core/render-module.js'
export { fetchFromUpstream, fetchFromFile, type ProviderFetcher, type UpstreamOptions } from './core/fetch-providers.js'
export { runGeneration, type RunOptions, type RunResult } from './core/runner.js'
export type * from './schema/provider.js'
