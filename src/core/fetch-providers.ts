/**
 * Fetchers — produce the raw leaflet-providers registry plus a provenance string.
 *
 * The upstream fetcher clones the registry into a temp dir, opens its demo page
 * in Chromium and reads `L.TileLayer.Provider.providers` back as JSON. The temp
 * dir is removed before the fetcher returns, whatever happened.
 */

import { execFile } from 'node:child_process'
import { mkdtemp, readFile, rm } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { pathToFileURL } from 'node:url'
import { promisify } from 'node:util'
import { chromium, type Browser } from 'playwright-core'
import { FetchError, type FetchStep } from '../lib/errors.js'
import { jsonValueSchema, type FetchedProviders, type JsonValue } from '../schema/provider.js'

const execFileAsync = promisify(execFile)

export type ProviderFetcher = () => Promise<FetchedProviders>

export interface UpstreamOptions {
  gitUrl: string
  executablePath?: string
  headless: boolean
  navTimeoutMs: number
}

interface Commit {
  hash: string
  message: string
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

async function git(args: string[]): Promise<string> {
  const { stdout } = await execFileAsync('git', args, { maxBuffer: 16 * 1024 * 1024 })
  return stdout
}

async function cloneRepository(gitUrl: string, dir: string): Promise<Commit> {
  try {
    await git(['clone', '--depth', '1', gitUrl, dir])
    const hash = (await git(['-C', dir, 'log', '-1', '--format=%H'])).trim()
    const message = (await git(['-C', dir, 'log', '-1', '--format=%B'])).trim()
    return { hash, message }
  } catch (err) {
    throw new FetchError('clone', `git clone of ${gitUrl} failed: ${describeError(err)}`, { cause: err })
  }
}

async function scrapeProviders(indexPath: string, options: UpstreamOptions): Promise<string> {
  let browser: Browser | null = null

  try {
    console.log('[fetch] Launching browser...')
    browser = await chromium.launch({
      headless: options.headless,
      executablePath: options.executablePath,
      args: ['--no-sandbox', '--allow-file-access-from-files'],
    })
    const page = await browser.newPage()
    await page.goto(pathToFileURL(indexPath).href, { waitUntil: 'load', timeout: options.navTimeoutMs })

    const json: unknown = await page.evaluate('JSON.stringify(L.TileLayer.Provider.providers)')
    if (typeof json !== 'string') {
      throw new FetchError('browser', 'L.TileLayer.Provider.providers is not defined on the demo page')
    }
    return json
  } catch (err) {
    if (err instanceof FetchError) throw err
    throw new FetchError('browser', `scraping ${indexPath} failed: ${describeError(err)}`, { cause: err })
  } finally {
    if (browser) await browser.close()
  }
}

export function parseProvidersJson(text: string, step: FetchStep = 'parse'): JsonValue {
  let parsed: unknown
  try {
    parsed = JSON.parse(text)
  } catch (err) {
    throw new FetchError(step, `provider data is not valid JSON: ${describeError(err)}`, { cause: err })
  }
  const result = jsonValueSchema.safeParse(parsed)
  if (!result.success) {
    throw new FetchError(step, 'provider data is not plain JSON')
  }
  return result.data
}

export async function fetchFromUpstream(options: UpstreamOptions): Promise<FetchedProviders> {
  const workDir = await mkdtemp(join(tmpdir(), 'leaflet-providers-'))

  try {
    console.log(`[fetch] Cloning ${options.gitUrl}...`)
    const commit = await cloneRepository(options.gitUrl, workDir)
    console.log(`[fetch] HEAD is ${commit.hash}`)

    const json = await scrapeProviders(join(workDir, 'index.html'), options)
    return {
      data: parseProvidersJson(json),
      description: `commit ${commit.hash} (${commit.message})`,
    }
  } finally {
    await rm(workDir, { recursive: true, force: true })
  }
}

/** Reuse a raw snapshot written by an earlier run */
export async function fetchFromFile(path: string, description = `file ${path}`): Promise<FetchedProviders> {
  let text: string
  try {
    text = await readFile(path, 'utf-8')
  } catch (err) {
    throw new FetchError('read', `cannot read ${path}: ${describeError(err)}`, { cause: err })
  }
  console.log(`[fetch] Loaded raw snapshot from ${path}`)
  return { data: parseProvidersJson(text, 'read'), description }
}
