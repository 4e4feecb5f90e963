/**
 * TypeScript module renderer — turns a NormalizedCatalog into a standalone
 * source file exposing every provider as a frozen record.
 */

import { isNormalizedRecord, type Fields, type NormalizedCatalog, type NormalizedGroup } from '../schema/provider.js'

const INDENT = '  '

const IDENTIFIER = /^[A-Za-z_$][A-Za-z0-9_$]*$/

const HELPERS = `export type TileProviderValue =
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

export type TileProviderGroup = { readonly [variant: string]: TileProvider }

function frozenCopy(value: TileProviderValue): TileProviderValue {
  if (Array.isArray(value)) return Object.freeze(value.map(frozenCopy))
  if (typeof value === 'object' && value !== null) {
    const copy: { [key: string]: TileProviderValue } = {}
    for (const [key, item] of Object.entries(value)) copy[key] = frozenCopy(item)
    return Object.freeze(copy)
  }
  return value
}

/** A tile provider: fields read as \`provider.url\` or \`provider['url']\` */
function tileProvider(fields: TileProvider): TileProvider {
  const copy: { [field: string]: TileProviderValue } = {}
  for (const [key, value] of Object.entries(fields)) copy[key] = frozenCopy(value)
  return Object.freeze({ ...copy, name: fields.name, url: fields.url })
}

function tileProviderGroup(variants: TileProviderGroup): TileProviderGroup {
  return Object.freeze({ ...variants })
}

/** Copy of \`provider\` with \`overrides\` applied. \`provider\` itself is not modified. */
export function deriveProvider(
  provider: TileProvider,
  overrides: { readonly [field: string]: TileProviderValue }
): TileProvider {
  const fields: { [field: string]: TileProviderValue } = { ...provider, ...overrides }
  const { name, url } = fields
  if (typeof name !== 'string' || typeof url !== 'string') {
    throw new TypeError(\`Overrides for \${provider.name} must keep a string name and url\`)
  }
  return tileProvider({ ...fields, name, url })
}`

/** Indent every non-blank line */
export function indent(text: string, prefix = INDENT): string {
  return text
    .split('\n')
    .map(line => (line.trim() ? prefix + line : line))
    .join('\n')
}

/** YYYY-MM-DD in local time */
export function formatDate(date: Date): string {
  const month = String(date.getMonth() + 1).padStart(2, '0')
  const day = String(date.getDate()).padStart(2, '0')
  return `${date.getFullYear()}-${month}-${day}`
}

export function formatKey(key: string): string {
  return IDENTIFIER.test(key) ? key : JSON.stringify(key)
}

export function formatProvider(record: Fields, name: string): string {
  const fields = Object.entries(record)
    .map(([key, value]) => `${formatKey(key)}: ${JSON.stringify(value)}`)
    .join(`,\n${INDENT}`)
  return `${formatKey(name)}: tileProvider({\n${INDENT}${fields}\n})`
}

export function formatGroup(group: NormalizedGroup, name: string): string {
  const variants = Object.entries(group)
    .map(([variant, record]) => formatProvider(record, variant))
    .join(',\n')
  return `${formatKey(name)}: tileProviderGroup({\n${indent(variants)}\n})`
}

function formatHeader(date: Date, description: string): string {
  const provenance = description.replaceAll('*/', '*\\/').split('\n')
  const lines = [
    'Tile providers.',
    '',
    'This file is autogenerated! It is a TypeScript representation of the leaflet',
    'providers defined by the leaflet-providers.js extension to Leaflet',
    '(https://github.com/leaflet-extras/leaflet-providers).',
    'Credit to the leaflet-providers.js project (BSD 2-Clause "Simplified" License)',
    'and the Leaflet Providers contributors.',
    '',
    `Generated by leaflet-providers-codegen at ${formatDate(date)} from leaflet-providers`,
    `at ${provenance[0]}`,
    ...provenance.slice(1),
  ]
  lines[lines.length - 1] += '.'
  return ['/**', ...lines.map(line => (line ? ` * ${line}` : ' *')), ' */'].join('\n')
}

export function generateModule(catalog: NormalizedCatalog, description: string, date = new Date()): string {
  const providers = Object.entries(catalog)
    .map(([name, entry]) => (isNormalizedRecord(entry) ? formatProvider(entry, name) : formatGroup(entry, name)))
    .join(',\n')

  return [
    formatHeader(date, description),
    '',
    HELPERS,
    '',
    `export const providers = Object.freeze({\n${indent(providers)}\n})`,
    '',
  ].join('\n')
}
