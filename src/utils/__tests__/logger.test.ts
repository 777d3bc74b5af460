/**
 * Unit tests for src/utils/logger.ts — pino configuration and redaction.
 */

import { describe, it, expect } from 'vitest'
import { Writable } from 'node:stream'
import pino from 'pino'
import { PINO_REDACT_PATHS, maskSecrets, deepMask } from '../masking.js'
import { createLogger, childLogger, setLogLevel } from '../logger.js'

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function createCapturingLogger(name: string): { logger: pino.Logger; getLines: () => string[] } {
  const lines: string[] = []
  const stream = new Writable({
    write(chunk: Buffer, _encoding: string, callback: () => void) {
      lines.push(chunk.toString().trim())
      callback()
    },
  })

  const logger = pino(
    {
      name,
      level: 'trace',
      redact: PINO_REDACT_PATHS,
      formatters: {
        level(label) {
          return { level: label }
        },
      },
      timestamp: pino.stdTimeFunctions.isoTime,
      base: { pid: process.pid },
    },
    stream,
  )

  return { logger, getLines: () => lines }
}

function withEnv(vars: Record<string, string | undefined>, fn: () => void): void {
  const saved: Record<string, string | undefined> = {}
  for (const key of Object.keys(vars)) saved[key] = process.env[key]
  try {
    for (const [key, value] of Object.entries(vars)) {
      if (value === undefined) delete process.env[key]
      else process.env[key] = value
    }
    fn()
  } finally {
    for (const [key, value] of Object.entries(saved)) {
      if (value === undefined) delete process.env[key]
      else process.env[key] = value
    }
  }
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('createLogger', () => {
  it('honours an explicit level option', () => {
    const logger = createLogger('test-module', { pretty: false, level: 'error' })
    expect(logger.level).toBe('error')
  })

  it('uses LOG_LEVEL to override the default level', () => {
    withEnv({ LOG_LEVEL: 'warn' }, () => {
      expect(createLogger('test-level', { pretty: false }).level).toBe('warn')
    })
  })

  it('uses info level when NODE_ENV = production', () => {
    withEnv({ NODE_ENV: 'production', LOG_LEVEL: undefined }, () => {
      expect(createLogger('test-prod', { pretty: false }).level).toBe('info')
    })
  })

  it('defaults to warn when NODE_ENV is unset', () => {
    withEnv({ NODE_ENV: undefined, LOG_LEVEL: undefined }, () => {
      expect(createLogger('test-cli', { pretty: false }).level).toBe('warn')
    })
  })
})

describe('setLogLevel', () => {
  it('applies to existing and later loggers without an explicit level', () => {
    const before = createLogger('level-before', { pretty: false })
    const pinned = createLogger('level-pinned', { pretty: false, level: 'error' })

    setLogLevel('silent')

    expect(before.level).toBe('silent')
    expect(createLogger('level-after', { pretty: false }).level).toBe('silent')
    expect(pinned.level).toBe('error')
  })
})

describe('childLogger', () => {
  it('carries run and role bindings', () => {
    const parent = createLogger('parent-module', { pretty: false })
    const child = childLogger(parent, { runId: '20240101-000000-abcdef', role: 'macro' })
    expect(child).not.toBe(parent)
    expect(child.bindings()).toMatchObject({ runId: '20240101-000000-abcdef', role: 'macro' })
  })
})

describe('pino redaction', () => {
  it('redacts apiKey field in log output', () => {
    const { logger, getLines } = createCapturingLogger('redact-test')

    logger.info({ apiKey: 'test-secret' }, 'test redaction')

    const lines = getLines()
    expect(lines).toHaveLength(1)
    const parsed = JSON.parse(lines[0]) as { apiKey?: string }
    expect(parsed.apiKey).toBe('[Redacted]')
  })

  it('redacts the inference api key inside a config object', () => {
    const { logger, getLines } = createCapturingLogger('redact-test-2')

    logger.info({ inference: { api_key: 'test-secret', model: 'm1' } }, 'config loaded')

    const parsed = JSON.parse(getLines()[0]) as { inference: { api_key: string; model: string } }
    expect(parsed.inference).toEqual({ api_key: '[Redacted]', model: 'm1' })
  })
})

describe('maskSecrets', () => {
  it('masks sk- style keys', () => {
    expect(maskSecrets('sk-test-placeholder-0000000000')).toBe('***')
  })

  it('returns input unchanged when no secrets present', () => {
    expect(maskSecrets('no secrets here')).toBe('no secrets here')
  })

  it('masks a key embedded in an error message', () => {
    expect(maskSecrets('invalid key sk-test-placeholder-0000000000 rejected')).toBe(
      'invalid key *** rejected',
    )
  })
})

describe('deepMask', () => {
  it('replaces credential fields at any depth', () => {
    expect(deepMask({ inference: { api_key: 'test-secret', api_key_env: 'ANALYST_API_KEY' } })).toEqual({
      inference: { api_key: '***', api_key_env: 'ANALYST_API_KEY' },
    })
  })

  it('masks environment-style credential names', () => {
    expect(deepMask({ env: { ANALYST_API_KEY: 'test-secret', HF_TOKEN: 'test-token', REGION: 'eu' } })).toEqual({
      env: { ANALYST_API_KEY: '***', HF_TOKEN: '***', REGION: 'eu' },
    })
  })
})
