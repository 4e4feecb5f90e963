import { afterEach, beforeEach, describe, it, expect } from 'vitest'
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { fileURLToPath } from 'node:url'
import { findProjectRoot, OUTPUT_DIR, PROJECT_ROOT } from '../src/lib/env.js'

const repoRoot = fileURLToPath(new URL('..', import.meta.url)).replace(/[\\/]$/, '')

describe('project root', () => {
  it('should anchor the output directory to the project root', () => {
    expect(PROJECT_ROOT).toBe(repoRoot)
    expect(OUTPUT_DIR).toBe(join(repoRoot, 'output'))
  })
})

describe('findProjectRoot', () => {
  let workDir: string

  beforeEach(() => {
    workDir = mkdtempSync(join(tmpdir(), 'lp-root-test-'))
  })

  afterEach(() => {
    rmSync(workDir, { recursive: true, force: true })
  })

  it('should find package.json from a built file directory', () => {
    writeFileSync(join(workDir, 'package.json'), '{}', 'utf-8')
    const builtLib = join(workDir, 'dist', 'src', 'lib')
    mkdirSync(builtLib, { recursive: true })
    expect(findProjectRoot(builtLib)).toBe(workDir)
  })
})
