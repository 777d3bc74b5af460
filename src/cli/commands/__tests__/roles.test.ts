/**
 * Tests for the `sector-analyst roles` command
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { mkdir, mkdtemp, rm, writeFile } from 'fs/promises'
import { join } from 'path'
import { tmpdir } from 'os'
import { runRolesAction, ROLES_EXIT_INVALID, ROLES_EXIT_SUCCESS } from '../roles.js'
import type { RolesActionOptions } from '../roles.js'

vi.mock('../../../utils/logger.js', async () => {
  const { default: pino } = await import('pino')
  return { createLogger: () => pino({ level: 'silent' }), setLogLevel: () => undefined }
})

let testDir: string
let stdout: string
let stderr: string

beforeEach(async () => {
  testDir = await mkdtemp(join(tmpdir(), 'roles-cmd-test-'))
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

function options(outputFormat: 'human' | 'json' = 'human'): RolesActionOptions {
  return {
    outputFormat,
    version: '1.2.3',
    projectConfigDir: join(testDir, '.sector-analyst'),
    globalConfigDir: join(testDir, 'global'),
    env: {},
  }
}

async function writeProjectConfig(yaml: string): Promise<void> {
  await mkdir(join(testDir, '.sector-analyst'), { recursive: true })
  await writeFile(join(testDir, '.sector-analyst', 'config.yaml'), yaml)
}

interface RolesJson {
  command: string
  version: string
  data: {
    roles: { role: string; prerequisites: { role: string; optional: boolean }[]; datasets: string[] }[]
    synthesis: { role: string }
  }
}

describe('runRolesAction', () => {
  it('prints the roles table with optional prerequisites marked', async () => {
    const code = await runRolesAction(options())

    expect(code).toBe(ROLES_EXIT_SUCCESS)
    const lines = stdout.split('\n')
    expect(lines[0]?.startsWith('Role ')).toBe(true)
    expect(lines.find((l) => l.startsWith('forecast '))).toContain('macro, finance, market?')
    expect(lines.find((l) => l.startsWith('report '))).toContain('all of the above')
    expect(stdout.endsWith('\n\n? optional prerequisite\n')).toBe(true)
  })

  it('lists roles in execution order as JSON', async () => {
    await runRolesAction(options('json'))

    const output = JSON.parse(stdout) as RolesJson
    expect(output.command).toBe('roles')
    expect(output.version).toBe('1.2.3')
    expect(output.data.roles.map((r) => r.role)).toEqual(['macro', 'finance', 'market', 'policy', 'forecast'])
    expect(output.data.roles[0]?.datasets).toEqual(['gdp', 'cpi'])
    expect(output.data.roles[4]?.prerequisites).toEqual([
      { role: 'macro', optional: false },
      { role: 'finance', optional: false },
      { role: 'market', optional: true },
    ])
    expect(output.data.synthesis.role).toBe('report')
  })

  it('omits disabled roles and the optional prerequisites on them', async () => {
    await writeProjectConfig('roles:\n  market:\n    enabled: false\n')

    await runRolesAction(options('json'))

    const output = JSON.parse(stdout) as RolesJson
    expect(output.data.roles.map((r) => r.role)).toEqual(['macro', 'finance', 'policy', 'forecast'])
    expect(output.data.roles[3]?.prerequisites.map((p) => p.role)).toEqual(['macro', 'finance'])
  })

  it('rejects a disabled mandatory prerequisite', async () => {
    await writeProjectConfig('roles:\n  macro:\n    enabled: false\n')

    const code = await runRolesAction(options())

    expect(code).toBe(ROLES_EXIT_INVALID)
    expect(stderr.startsWith('Error: ')).toBe(true)
    expect(stdout).toBe('')
  })
})
