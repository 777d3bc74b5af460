/**
 * Unit tests for config-system-impl.ts
 *
 * Tests:
 *  - Hierarchy loading (defaults < global < project < env < CLI)
 *  - Config validation errors
 *  - get() dot-notation access
 *  - set() with project file update
 *  - getMasked() credential masking
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdir, mkdtemp, readFile, writeFile, rm } from 'node:fs/promises'
import { join } from 'node:path'
import { tmpdir } from 'node:os'
import { coerceScalar, createConfigSystem, deepMerge, getByPath, setByPath } from '../config-system-impl.js'
import type { ConfigSystemOptions } from '../config-system.js'
import { DEFAULT_CONFIG } from '../defaults.js'
import { ConfigurationError } from '../../../core/errors.js'

// ---------------------------------------------------------------------------
// Test setup — temporary directories
// ---------------------------------------------------------------------------

let testDir: string
let projectConfigDir: string
let globalConfigDir: string

beforeEach(async () => {
  testDir = await mkdtemp(join(tmpdir(), 'analyst-config-'))
  projectConfigDir = join(testDir, 'project', '.sector-analyst')
  globalConfigDir = join(testDir, 'global', '.sector-analyst')
  await mkdir(projectConfigDir, { recursive: true })
  await mkdir(globalConfigDir, { recursive: true })
})

afterEach(async () => {
  await rm(testDir, { recursive: true, force: true })
})

function createSystem(overrides: ConfigSystemOptions = {}): ReturnType<typeof createConfigSystem> {
  return createConfigSystem({ projectConfigDir, globalConfigDir, env: {}, ...overrides })
}

async function writeYaml(dir: string, content: string): Promise<void> {
  await writeFile(join(dir, 'config.yaml'), content, 'utf-8')
}

// ---------------------------------------------------------------------------
// Default config loading
// ---------------------------------------------------------------------------

describe('ConfigSystem - default config', () => {
  it('returns the defaults when no config files exist', async () => {
    const system = createSystem()
    await system.load()
    expect(system.getConfig()).toEqual(DEFAULT_CONFIG)
  })

  it('throws ConfigurationError if getConfig is called before load', () => {
    const system = createSystem()
    expect(system.isLoaded).toBe(false)
    expect(() => system.getConfig()).toThrow(ConfigurationError)
  })

  it('treats an empty config file as no overrides', async () => {
    await writeYaml(projectConfigDir, '')
    const system = createSystem()
    await system.load()
    expect(system.getConfig().scheduler.max_concurrent).toBe(3)
  })
})

// ---------------------------------------------------------------------------
// Hierarchy loading
// ---------------------------------------------------------------------------

describe('ConfigSystem - hierarchy loading', () => {
  it('global config overrides defaults', async () => {
    await writeYaml(globalConfigDir, 'scheduler:\n  max_retries: 4\n')
    const system = createSystem()
    await system.load()
    expect(system.getConfig().scheduler.max_retries).toBe(4)
  })

  it('project config overrides global config', async () => {
    await writeYaml(globalConfigDir, 'scheduler:\n  max_retries: 4\n')
    await writeYaml(projectConfigDir, 'scheduler:\n  max_retries: 1\n')
    const system = createSystem()
    await system.load()
    expect(system.getConfig().scheduler.max_retries).toBe(1)
  })

  it('env vars override project config', async () => {
    await writeYaml(projectConfigDir, 'scheduler:\n  max_concurrent: 2\n')
    const system = createSystem({ env: { ANALYST_MAX_CONCURRENT: '5', ANALYST_INDUSTRY: 'solar' } })
    await system.load()
    expect(system.getConfig().scheduler.max_concurrent).toBe(5)
    expect(system.getConfig().global.industry).toBe('solar')
  })

  it('keeps numeric-looking strings for string settings', async () => {
    const system = createSystem({ env: { ANALYST_MODEL: '2024' } })
    await system.load()
    expect(system.getConfig().inference.model).toBe('2024')
  })

  it('ignores invalid env overrides', async () => {
    const system = createSystem({ env: { ANALYST_MAX_CONCURRENT: 'many' } })
    await system.load()
    expect(system.getConfig().scheduler.max_concurrent).toBe(3)
  })

  it('CLI overrides take highest priority', async () => {
    await writeYaml(projectConfigDir, 'global:\n  log_level: warn\n')
    const system = createSystem({
      env: { ANALYST_LOG_LEVEL: 'error' },
      cliOverrides: { global: { log_level: 'trace' } },
    })
    await system.load()
    expect(system.getConfig().global.log_level).toBe('trace')
  })

  it('merges role overrides with defaults preserved elsewhere', async () => {
    await writeYaml(
      projectConfigDir,
      ['roles:', '  market:', '    enabled: false', '  forecast:', '    temperature: 0.5'].join('\n') + '\n',
    )
    const system = createSystem()
    await system.load()
    const config = system.getConfig()
    expect(config.roles).toEqual({ market: { enabled: false }, forecast: { temperature: 0.5 } })
    expect(config.inference).toEqual(DEFAULT_CONFIG.inference)
  })
})

// ---------------------------------------------------------------------------
// Validation errors
// ---------------------------------------------------------------------------

describe('ConfigSystem - validation errors', () => {
  it('rejects an unknown key with its path', async () => {
    await writeYaml(projectConfigDir, 'scheduler:\n  max_parallel: 2\n')
    const system = createSystem()
    await expect(system.load()).rejects.toThrow("scheduler: Unrecognized key(s) in object: 'max_parallel'")
  })

  it('rejects an out-of-range value', async () => {
    await writeYaml(projectConfigDir, 'scheduler:\n  max_concurrent: 0\n')
    const system = createSystem()
    await expect(system.load()).rejects.toBeInstanceOf(ConfigurationError)
  })

  it('rejects a max delay below the base delay in the merged config', async () => {
    await writeYaml(projectConfigDir, 'scheduler:\n  max_delay_ms: 10\n')
    const system = createSystem()
    await expect(system.load()).rejects.toThrow(
      'scheduler.max_delay_ms: max_delay_ms must be greater than or equal to base_delay_ms',
    )
  })

  it('rejects malformed YAML', async () => {
    await writeYaml(projectConfigDir, 'scheduler: [unclosed\n')
    const system = createSystem()
    await expect(system.load()).rejects.toThrow('Failed to read config file at')
  })
})

// ---------------------------------------------------------------------------
// get / set
// ---------------------------------------------------------------------------

describe('ConfigSystem - get()', () => {
  it('reads scalar and section values by dot-notation key', async () => {
    const system = createSystem()
    await system.load()
    expect(system.get('scheduler.task_timeout_ms')).toBe(120_000)
    expect(system.get('data')).toEqual(DEFAULT_CONFIG.data)
    expect(system.get('scheduler.nope')).toBeUndefined()
  })
})

describe('ConfigSystem - set()', () => {
  it('writes the value to the project config file and reloads', async () => {
    const system = createSystem()
    await system.load()
    await system.set('scheduler.max_retries', 5)

    expect(system.get('scheduler.max_retries')).toBe(5)
    const raw = await readFile(join(projectConfigDir, 'config.yaml'), 'utf-8')
    expect(raw).toBe('scheduler:\n  max_retries: 5\n')
  })

  it('keeps existing project settings', async () => {
    await writeYaml(projectConfigDir, 'global:\n  industry: solar\n')
    const system = createSystem()
    await system.load()
    await system.set('roles.market.enabled', false)

    expect(system.getConfig().global.industry).toBe('solar')
    expect(system.getConfig().roles.market).toEqual({ enabled: false })
  })

  it('rejects unknown keys', async () => {
    const system = createSystem()
    await system.load()
    await expect(system.set('scheduler.max_parallel', 2)).rejects.toThrow('Unknown config key: scheduler.max_parallel')
  })

  it('rejects setting a whole section', async () => {
    const system = createSystem()
    await system.load()
    await expect(system.set('scheduler', 1)).rejects.toThrow('Cannot set "scheduler"')
  })

  it('rejects values of the wrong type', async () => {
    const system = createSystem()
    await system.load()
    await expect(system.set('scheduler.max_retries', 'five')).rejects.toThrow('Invalid value for "scheduler.max_retries"')
  })

  it('restores the previous file when the merged config is invalid', async () => {
    await writeYaml(projectConfigDir, 'global:\n  industry: solar\n')
    const system = createSystem()
    await system.load()

    await expect(system.set('scheduler.max_delay_ms', 10)).rejects.toBeInstanceOf(ConfigurationError)
    expect(await readFile(join(projectConfigDir, 'config.yaml'), 'utf-8')).toBe('global:\n  industry: solar\n')
    expect(system.get('scheduler.max_delay_ms')).toBe(30_000)
  })
})

describe('ConfigSystem - getMasked()', () => {
  it('masks credential values in the inference environment', async () => {
    await writeYaml(projectConfigDir, 'inference:\n  env:\n    ANALYST_API_KEY: test-secret\n    REGION: eu\n')
    const system = createSystem()
    await system.load()

    expect(system.getMasked().inference.env).toEqual({ ANALYST_API_KEY: '***', REGION: 'eu' })
    expect(system.getConfig().inference.env?.ANALYST_API_KEY).toBe('test-secret')
  })
})

// ---------------------------------------------------------------------------
// Object utilities
// ---------------------------------------------------------------------------

describe('object utilities', () => {
  it('deepMerge merges objects and replaces arrays', () => {
    expect(deepMerge({ a: { b: 1, c: [1, 2] }, d: 1 }, { a: { c: [3] }, d: undefined })).toEqual({
      a: { b: 1, c: [3] },
      d: 1,
    })
  })

  it('getByPath returns undefined through scalars', () => {
    expect(getByPath({ a: 1 }, 'a.b')).toBeUndefined()
  })

  it('setByPath creates intermediate objects without touching the input', () => {
    const input = { a: { x: 1 } }
    expect(setByPath(input, 'a.b.c', 2)).toEqual({ a: { x: 1, b: { c: 2 } } })
    expect(input).toEqual({ a: { x: 1 } })
  })

  it('coerceScalar parses booleans and numbers', () => {
    expect(coerceScalar('true')).toBe(true)
    expect(coerceScalar('42')).toBe(42)
    expect(coerceScalar('0.5')).toBe(0.5)
    expect(coerceScalar('llm')).toBe('llm')
  })
})
