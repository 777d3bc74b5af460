/**
 * ConfigSystem implementation — loads configuration in hierarchy order and
 * exposes get/set/getMasked operations.
 *
 * Hierarchy (lowest → highest priority):
 *   built-in defaults
 *     → global user config  (~/.sector-analyst/config.yaml)
 *     → project config      (./.sector-analyst/config.yaml)
 *     → environment vars    (ANALYST_* prefixed)
 *     → CLI flag overrides  (passed via ConfigSystemOptions.cliOverrides)
 */

import { readFile, writeFile, mkdir, access } from 'node:fs/promises'
import { join, resolve } from 'node:path'
import { homedir } from 'node:os'
import yaml from 'js-yaml'
import type { ZodIssue } from 'zod'
import { createLogger } from '../../utils/logger.js'
import { ConfigurationError } from '../../core/errors.js'
import { isPlainObject } from '../../utils/helpers.js'
import { deepMask } from '../../utils/masking.js'
import { AnalystConfigSchema, PartialAnalystConfigSchema } from './config-schema.js'
import type { AnalystConfig, PartialAnalystConfig } from './config-schema.js'
import { CONFIG_DIR_NAME, DEFAULT_CONFIG } from './defaults.js'
import type { ConfigSystem, ConfigSystemOptions } from './config-system.js'

const logger = createLogger('config')

const CONFIG_FILE = 'config.yaml'

// ---------------------------------------------------------------------------
// Object utilities
// ---------------------------------------------------------------------------

/**
 * Merge `override` into a copy of `base`. Plain objects merge recursively;
 * arrays and scalars replace; undefined leaves the base value.
 */
export function deepMerge(base: Record<string, unknown>, override: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base }
  for (const [key, val] of Object.entries(override)) {
    const current = result[key]
    if (isPlainObject(val) && isPlainObject(current)) {
      result[key] = deepMerge(current, val)
    } else if (val !== undefined) {
      result[key] = val
    }
  }
  return result
}

/** Value at a dot-notation path, or undefined */
export function getByPath(obj: unknown, path: string): unknown {
  let cursor: unknown = obj
  for (const part of path.split('.')) {
    if (!isPlainObject(cursor)) return undefined
    cursor = cursor[part]
  }
  return cursor
}

/**
 * Copy of `obj` with `path` set to `value`.
 * Creates intermediate objects as needed.
 */
export function setByPath(obj: Record<string, unknown>, path: string, value: unknown): Record<string, unknown> {
  const [head, ...rest] = path.split('.')
  if (head === undefined) return { ...obj }
  if (rest.length === 0) return { ...obj, [head]: value }
  const child = obj[head]
  return { ...obj, [head]: setByPath(isPlainObject(child) ? child : {}, rest.join('.'), value) }
}

/** Parse an environment or command-line string into a boolean, number or string */
export function coerceScalar(raw: string): boolean | number | string {
  if (raw === 'true') return true
  if (raw === 'false') return false
  if (/^-?\d+$/.test(raw)) return parseInt(raw, 10)
  if (/^-?\d*\.\d+$/.test(raw)) return parseFloat(raw)
  return raw
}

function formatIssues(issues: readonly ZodIssue[]): string[] {
  return issues.map((i) => (i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message))
}

// ---------------------------------------------------------------------------
// Environment variable resolution
// ---------------------------------------------------------------------------

/**
 * ANALYST_ environment variables and the config paths they set.
 * Only scalar values can be overridden this way.
 */
export const ENV_VAR_MAP: Readonly<Record<string, string>> = {
  ANALYST_LOG_LEVEL: 'global.log_level',
  ANALYST_INDUSTRY: 'global.industry',
  ANALYST_OUTPUT_DIR: 'global.output_dir',
  ANALYST_DATABASE_PATH: 'global.database_path',
  ANALYST_ENABLE_CHARTS: 'global.enable_charts',
  ANALYST_MAX_CONCURRENT: 'scheduler.max_concurrent',
  ANALYST_MAX_RETRIES: 'scheduler.max_retries',
  ANALYST_TASK_TIMEOUT_MS: 'scheduler.task_timeout_ms',
  ANALYST_INFERENCE_BINARY: 'inference.binary',
  ANALYST_MODEL: 'inference.model',
  ANALYST_DATA_DIR: 'data.root_dir',
}

/** String-valued settings that must not be coerced to numbers */
const STRING_PATHS = new Set(['global.industry', 'global.output_dir', 'global.database_path', 'inference.binary', 'inference.model', 'data.root_dir'])

function readEnvOverrides(env: NodeJS.ProcessEnv): PartialAnalystConfig {
  let overrides: Record<string, unknown> = {}
  for (const [envKey, configPath] of Object.entries(ENV_VAR_MAP)) {
    const raw = env[envKey]
    if (raw === undefined || raw === '') continue
    overrides = setByPath(overrides, configPath, STRING_PATHS.has(configPath) ? raw : coerceScalar(raw))
  }

  const parsed = PartialAnalystConfigSchema.safeParse(overrides)
  if (!parsed.success) {
    logger.warn({ issues: formatIssues(parsed.error.issues) }, 'Invalid environment variable overrides ignored')
    return {}
  }
  return parsed.data
}

// ---------------------------------------------------------------------------
// ConfigSystemImpl
// ---------------------------------------------------------------------------

export class ConfigSystemImpl implements ConfigSystem {
  private _config: AnalystConfig | null = null
  private readonly _projectConfigDir: string
  private readonly _globalConfigDir: string
  private readonly _cliOverrides: PartialAnalystConfig
  private readonly _env: NodeJS.ProcessEnv

  constructor(options: ConfigSystemOptions = {}) {
    this._projectConfigDir = resolve(options.projectConfigDir ?? join(process.cwd(), CONFIG_DIR_NAME))
    this._globalConfigDir = resolve(options.globalConfigDir ?? join(homedir(), CONFIG_DIR_NAME))
    this._cliOverrides = options.cliOverrides ?? {}
    this._env = options.env ?? process.env
  }

  get isLoaded(): boolean {
    return this._config !== null
  }

  get projectConfigPath(): string {
    return join(this._projectConfigDir, CONFIG_FILE)
  }

  async load(): Promise<void> {
    const layers: PartialAnalystConfig[] = []
    const globalConfig = await this._loadYamlFile(join(this._globalConfigDir, CONFIG_FILE))
    if (globalConfig !== null) layers.push(globalConfig)
    const projectConfig = await this._loadYamlFile(this.projectConfigPath)
    if (projectConfig !== null) layers.push(projectConfig)
    layers.push(readEnvOverrides(this._env), this._cliOverrides)

    let merged: Record<string, unknown> = structuredClone(DEFAULT_CONFIG)
    for (const layer of layers) {
      merged = deepMerge(merged, layer)
    }

    const result = AnalystConfigSchema.safeParse(merged)
    if (!result.success) {
      throw new ConfigurationError('Configuration validation failed', formatIssues(result.error.issues))
    }

    this._config = result.data
    logger.debug({ layers: layers.length }, 'Configuration loaded')
  }

  getConfig(): AnalystConfig {
    if (this._config === null) {
      throw new ConfigurationError('Configuration has not been loaded. Call load() before getConfig().')
    }
    return this._config
  }

  get(key: string): unknown {
    return getByPath(this.getConfig(), key)
  }

  async set(key: string, value: unknown): Promise<void> {
    const existing = getByPath(this.getConfig(), key)
    if (isPlainObject(existing) || Array.isArray(existing)) {
      throw new ConfigurationError(`Cannot set "${key}": use a more specific dot-notation key`, [], { key })
    }

    const path = this.projectConfigPath
    const previous = await readOptional(path)
    const current = (await this._loadYamlFile(path)) ?? {}
    const updated = setByPath(current, key, value)

    const partial = PartialAnalystConfigSchema.safeParse(updated)
    if (!partial.success) {
      if (partial.error.issues.some((i) => i.code === 'unrecognized_keys')) {
        throw new ConfigurationError(`Unknown config key: ${key}`, [], { key })
      }
      throw new ConfigurationError(`Invalid value for "${key}"`, formatIssues(partial.error.issues), { key })
    }

    await mkdir(this._projectConfigDir, { recursive: true })
    await writeFile(path, yaml.dump(partial.data), 'utf-8')
    try {
      await this.load()
    } catch (err: unknown) {
      // The merged config rejects the new value: put the old file back
      if (previous === null) await writeFile(path, '', 'utf-8')
      else await writeFile(path, previous, 'utf-8')
      await this.load()
      throw err
    }
    logger.info({ key, path }, 'Config value updated')
  }

  getMasked(): AnalystConfig {
    const masked = AnalystConfigSchema.safeParse(deepMask(this.getConfig()))
    if (!masked.success) {
      throw new ConfigurationError('Masked configuration failed validation', formatIssues(masked.error.issues))
    }
    return masked.data
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  private async _loadYamlFile(filePath: string): Promise<PartialAnalystConfig | null> {
    const raw = await readOptional(filePath)
    if (raw === null) return null

    let parsed: unknown
    try {
      parsed = yaml.load(raw)
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err)
      throw new ConfigurationError(`Failed to read config file at ${filePath}`, [message], { filePath })
    }

    const result = PartialAnalystConfigSchema.safeParse(parsed ?? {})
    if (!result.success) {
      throw new ConfigurationError(`Invalid config file at ${filePath}`, formatIssues(result.error.issues), {
        filePath,
      })
    }
    return result.data
  }
}

async function readOptional(filePath: string): Promise<string | null> {
  try {
    await access(filePath)
  } catch {
    return null
  }
  return readFile(filePath, 'utf-8')
}

// ---------------------------------------------------------------------------
// Factory function
// ---------------------------------------------------------------------------

/**
 * Create a new ConfigSystem instance.
 *
 * @example
 * const config = createConfigSystem()
 * await config.load()
 * const { scheduler } = config.getConfig()
 */
export function createConfigSystem(options: ConfigSystemOptions = {}): ConfigSystem {
  return new ConfigSystemImpl(options)
}
