import { describe, it, expect } from 'vitest'
import { deriveProvider, hydrateCatalog, tileProvider } from '../src/lib/tile-provider.js'
import { normalizedProviders } from './fixtures.js'

describe('tileProvider', () => {
  it('should expose fields by attribute and by key', () => {
    const provider = tileProvider({ name: 'OSM', url: 'https://osm/{z}/{x}/{y}.png', max_zoom: 19 })
    expect(provider.url).toBe(provider['url'])
    expect(provider.max_zoom).toBe(19)
  })

  it('should be frozen', () => {
    expect(Object.isFrozen(tileProvider({ name: 'OSM', url: 'https://osm/{z}' }))).toBe(true)
  })
})

describe('deriveProvider', () => {
  const base = tileProvider({ name: 'OSM', url: 'https://osm/{z}', max_zoom: 19 })

  it('should return a copy with the overrides applied', () => {
    const derived = deriveProvider(base, { max_zoom: 5, apikey: 'test-key' })
    expect(derived).toEqual({ name: 'OSM', url: 'https://osm/{z}', max_zoom: 5, apikey: 'test-key' })
    expect(Object.isFrozen(derived)).toBe(true)
  })

  it('should leave the original untouched', () => {
    deriveProvider(base, { max_zoom: 5 })
    expect(base).toEqual({ name: 'OSM', url: 'https://osm/{z}', max_zoom: 19 })
  })

  it('should refuse overrides that drop the url', () => {
    expect(() => deriveProvider(base, { url: 5 })).toThrow(TypeError)
  })
})

describe('nested fields', () => {
  it('should not share arrays with the source record', () => {
    const bounds = [[0, 1], [2, 3]]
    const provider = tileProvider({ name: 'Bounded', url: 'https://b/{z}', bounds })
    bounds[0][0] = 9
    expect(provider.bounds).toEqual([[0, 1], [2, 3]])
    expect(Object.isFrozen(provider.bounds)).toBe(true)
    expect(Object.isFrozen(bounds)).toBe(false)
  })

  it('should freeze arrays brought in by overrides', () => {
    const base = tileProvider({ name: 'OSM', url: 'https://osm/{z}' })
    const subdomains = ['a', 'b']
    const derived = deriveProvider(base, { subdomains })
    subdomains.push('c')
    expect(derived.subdomains).toEqual(['a', 'b'])
    expect(Object.isFrozen(derived.subdomains)).toBe(true)
  })

  it('should copy nested arrays when hydrating a catalog', () => {
    const catalog = {
      Bounded: { name: 'Bounded', url: 'https://b/{z}', bounds: [[0, 1], [2, 3]] },
    }
    const providers = hydrateCatalog(catalog)
    catalog.Bounded.bounds[1][1] = 7
    expect(providers.Bounded.bounds).toEqual([[0, 1], [2, 3]])
  })
})

describe('hydrateCatalog', () => {
  it('should freeze records and groups', () => {
    const providers = hydrateCatalog(normalizedProviders)
    expect(Object.isFrozen(providers)).toBe(true)
    expect(Object.isFrozen(providers.OpenStreetMap)).toBe(true)
    expect(Object.isFrozen(providers.OpenMapSurfer)).toBe(true)
    expect(providers.OpenStreetMap.Mapnik).toEqual({
      url: 'https://{s}.tile.example.org/{z}/{x}/{y}.png',
      max_zoom: 19,
      attribution: '© OSM contributors',
      name: 'OpenStreetMap.Mapnik',
    })
    expect(Object.isFrozen(providers.OpenStreetMap.Mapnik)).toBe(true)
  })
})
