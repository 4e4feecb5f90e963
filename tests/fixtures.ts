import type { JsonValue, NormalizedCatalog } from '../src/schema/provider.js'

export const rawProviders = {
  OpenStreetMap: {
    url: 'https://{s}.tile.example.org/{z}/{x}/{y}.png',
    options: { maxZoom: 19, attribution: '© OSM contributors' },
    variants: {
      Mapnik: {},
      DE: {
        url: 'https://{s}.tile.example.de/{z}/{x}/{y}.png',
        options: { maxZoom: 18 },
      },
    },
  },
  Esri: {
    url: 'https://esri.example.com/{variant}/{z}/{y}/{x}',
    options: { variant: 'World_Street_Map', attribution: 'Tiles © Esri' },
    variants: {
      WorldStreetMap: { options: { attribution: '{attribution.Esri} Source: Esri' } },
      WorldImagery: 'World_Imagery',
    },
  },
  OpenMapSurfer: {
    url: 'https://surfer.example.com/{z}/{x}/{y}',
    options: {
      maxZoom: 20,
      attribution: 'Imagery from GIScience, map data {attribution.OpenStreetMap}',
    },
  },
  NASAGIBS: {
    url: 'https://gibs.example.gov/{variant}/{tilematrixset}{maxZoom}/{z}/{y}/{x}.{format}',
    options: {
      minZoom: 1,
      maxZoom: 9,
      format: 'jpg',
      attribution: 'NASA GIBS',
      variant: 'MODIS_Terra',
      tilematrixset: 'GoogleMapsCompatible_Level',
    },
  },
} satisfies JsonValue

export const normalizedProviders: NormalizedCatalog = {
  OpenStreetMap: {
    Mapnik: {
      url: 'https://{s}.tile.example.org/{z}/{x}/{y}.png',
      max_zoom: 19,
      attribution: '© OSM contributors',
      name: 'OpenStreetMap.Mapnik',
    },
    DE: {
      url: 'https://{s}.tile.example.de/{z}/{x}/{y}.png',
      max_zoom: 18,
      attribution: '© OSM contributors',
      name: 'OpenStreetMap.DE',
    },
  },
  Esri: {
    WorldStreetMap: {
      url: 'https://esri.example.com/{variant}/{z}/{y}/{x}',
      variant: 'World_Street_Map',
      attribution: 'Tiles © Esri Source: Esri',
      name: 'Esri.WorldStreetMap',
    },
    WorldImagery: {
      url: 'https://esri.example.com/{variant}/{z}/{y}/{x}',
      variant: 'World_Imagery',
      attribution: 'Tiles © Esri',
      name: 'Esri.WorldImagery',
    },
  },
  OpenMapSurfer: {
    url: 'https://surfer.example.com/{z}/{x}/{y}',
    max_zoom: 20,
    attribution: 'Imagery from GIScience, map data © OSM contributors',
    name: 'OpenMapSurfer',
  },
  NASAGIBS: {
    url: 'https://gibs.example.gov/{variant}/{tilematrixset}{max_zoom}/{z}/{y}/{x}.{format}',
    min_zoom: 1,
    max_zoom: 9,
    format: 'jpg',
    attribution: 'NASA GIBS',
    variant: 'MODIS_Terra',
    tilematrixset: 'GoogleMapsCompatible_Level',
    name: 'NASAGIBS',
  },
}
