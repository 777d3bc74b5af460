/**
 * Tests for the `sector-analyst config` command group
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { mkdir, mkdtemp, readFile, rm, writeFile } from 'fs/promises'
import { join } from 'path'
import { tmpdir } from 'os'
import yaml from 'js-yaml'
import {
  runConfigGet,
  runConfigSet,
  runConfigShow,
  CONFIG_EXIT_INVALID,
  CONFIG_EXIT_SUCCESS,
} from '../config.js'
import type { ConfigActionOptions } from '../config.js'

vi.mock('../../../utils/logger.js', async () => {
  const { default: pino } = await import('pino')
  return { createLogger: () => pino({ level: 'silent' }), setLogLevel: () => undefined }
})

let testDir: string
let projectConfigDir: string
let stdout: string
let stderr: string

beforeEach(async () => {
  testDir = await mkdtemp(join(tmpdir(), 'config-cmd-test-'))
  projectConfigDir = join(testDir, '.sector-analyst')
  stdout = ''
  stderr = ''
  vi.spyOn(process.stdout, 'write').mockImplementation((data: string | Uint8Array) => {
    stdout += String(data)
    return true
  })
  vi.spyOn(process.stderr, 'write').mockImplementation((data: string | Uint8Array) => {
    stderr += String(data)
    return true
  })
})

afterEach(async () => {
  vi.restoreAllMocks()
  await rm(testDir, { recursive: true, force: true })
})

function location(): ConfigActionOptions {
  return { projectConfigDir, globalConfigDir: join(testDir, 'global'), env: {} }
}

async function writeProjectConfig(content: string): Promise<void> {
  await mkdir(projectConfigDir, { recursive: true })
  await writeFile(join(projectConfigDir, 'config.yaml'), content)
}

describe('runConfigShow', () => {
  it('prints the defaults as YAML under a header', async () => {
    const code = await runConfigShow(location())

    expect(code).toBe(CONFIG_EXIT_SUCCESS)
    expect(stdout.startsWith('# Sector analyst configuration (credentials masked)\n\n')).toBe(true)
    const body = yaml.load(stdout) as { scheduler: { max_concurrent: number } }
    expect(body.scheduler.max_concurrent).toBe(3)
  })

  it('masks credential values in inference.env', async () => {
    await writeProjectConfig('inference:\n  env:\n    OPENAI_API_KEY: test-secret\n    REGION: eu\n')

    await runConfigShow({ ...location(), format: 'json' })

    const body = JSON.parse(stdout) as { inference: { env: Record<string, string> } }
    expect(body.inference.env).toEqual({ OPENAI_API_KEY: '***', REGION: 'eu' })
    expect(stdout).not.toContain('test-secret')
  })

  it('returns the usage exit code for an invalid config file', async () => {
    await writeProjectConfig('scheduler:\n  max_retries: 99\n')

    const code = await runConfigShow(location())

    expect(code).toBe(CONFIG_EXIT_INVALID)
    expect(stderr).toContain('scheduler.max_retries')
  })
})

describe('runConfigGet', () => {
  it('prints a scalar value', async () => {
    const code = await runConfigGet('global.industry', location())

    expect(code).toBe(CONFIG_EXIT_SUCCESS)
    expect(stdout).toBe('new energy vehicle\n')
  })

  it('prints a section as JSON', async () => {
    await runConfigGet('data', location())

    expect(JSON.parse(stdout)).toEqual({ root_dir: 'data', mapping_file: 'mapping.yaml', max_series_points: 200 })
  })

  it('rejects an unknown key', async () => {
    const code = await runConfigGet('global.nope', location())

    expect(code).toBe(CONFIG_EXIT_INVALID)
    expect(stderr).toBe('Error: Unknown config key: global.nope\n')
  })
})

describe('runConfigSet', () => {
  it('writes a coerced number to the project config', async () => {
    const code = await runConfigSet('scheduler.max_concurrent', '5', location())

    expect(code).toBe(CONFIG_EXIT_SUCCESS)
    expect(stdout).toBe('Set scheduler.max_concurrent = 5\n')
    const saved = yaml.load(await readFile(join(projectConfigDir, 'config.yaml'), 'utf-8'))
    expect(saved).toEqual({ scheduler: { max_concurrent: 5 } })
  })

  it('keeps numeric-looking text for string settings', async () => {
    await runConfigSet('global.output_dir', '2024', location())

    expect(stdout).toBe('Set global.output_dir = "2024"\n')
  })

  it('rejects an out-of-range value and leaves the file alone', async () => {
    await writeProjectConfig('scheduler:\n  max_retries: 1\n')

    const code = await runConfigSet('scheduler.max_retries', '11', location())

    expect(code).toBe(CONFIG_EXIT_INVALID)
    expect(stderr.startsWith('Error: Invalid value for "scheduler.max_retries"')).toBe(true)
    expect(await readFile(join(projectConfigDir, 'config.yaml'), 'utf-8')).toBe('scheduler:\n  max_retries: 1\n')
  })

  it('rejects a section key', async () => {
    const code = await runConfigSet('scheduler', '4', location())

    expect(code).toBe(CONFIG_EXIT_INVALID)
    expect(stderr).toContain('Cannot set "scheduler"')
  })

  it('rejects an empty key', async () => {
    const code = await runConfigSet('  ', '4', location())

    expect(code).toBe(CONFIG_EXIT_INVALID)
    expect(stderr).toBe('Error: key must not be empty\n')
  })
})
