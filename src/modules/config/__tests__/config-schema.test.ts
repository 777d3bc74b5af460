/**
 * Unit tests for config-schema.ts
 */

import { describe, it, expect } from 'vitest'
import { AnalystConfigSchema, PartialAnalystConfigSchema, RoleSettingsSchema } from '../config-schema.js'
import { DEFAULT_CONFIG } from '../defaults.js'

describe('AnalystConfigSchema', () => {
  it('accepts the built-in default config', () => {
    expect(AnalystConfigSchema.safeParse(DEFAULT_CONFIG).success).toBe(true)
  })

  it('requires config_format_version "1"', () => {
    const result = AnalystConfigSchema.safeParse({ ...DEFAULT_CONFIG, config_format_version: '2' })
    expect(result.success).toBe(false)
  })

  it('rejects unknown top-level sections', () => {
    const result = AnalystConfigSchema.safeParse({ ...DEFAULT_CONFIG, providers: {} })
    expect(result.success).toBe(false)
  })

  it('rejects a token ceiling below 500', () => {
    const result = AnalystConfigSchema.safeParse({
      ...DEFAULT_CONFIG,
      global: { ...DEFAULT_CONFIG.global, token_ceiling: 100 },
    })
    expect(result.success).toBe(false)
  })
})

describe('RoleSettingsSchema', () => {
  it('accepts every override field', () => {
    const result = RoleSettingsSchema.safeParse({
      enabled: true,
      optional_prerequisites: ['market'],
      temperature: 0.2,
      max_tokens: 2000,
      model: 'test-model',
    })
    expect(result.success).toBe(true)
  })

  it('rejects a temperature above 2', () => {
    expect(RoleSettingsSchema.safeParse({ temperature: 3 }).success).toBe(false)
  })
})

describe('PartialAnalystConfigSchema', () => {
  it('accepts an empty document', () => {
    expect(PartialAnalystConfigSchema.safeParse({}).success).toBe(true)
  })

  it('accepts a single nested value', () => {
    const result = PartialAnalystConfigSchema.safeParse({ data: { root_dir: '/srv/data' } })
    expect(result.success).toBe(true)
  })
})
