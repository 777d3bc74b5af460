/**
 * ConfigSystem interface — public contract for the configuration subsystem.
 *
 * Create an instance via `createConfigSystem()` from config-system-impl.ts.
 */

import type { AnalystConfig, PartialAnalystConfig } from './config-schema.js'

export interface ConfigSystemOptions {
  /** Project-level config directory (default: <cwd>/.sector-analyst) */
  projectConfigDir?: string
  /** User-level config directory (default: ~/.sector-analyst) */
  globalConfigDir?: string
  /**
   * Values that override every other source.
   * Typically populated from CLI flags.
   */
  cliOverrides?: PartialAnalystConfig
  /** Environment to read `ANALYST_*` variables from (default: process.env) */
  env?: NodeJS.ProcessEnv
}

/**
 * Provides access to the fully-merged, validated configuration.
 *
 * Hierarchy (lowest → highest priority):
 *   built-in defaults < global config < project config < env vars < CLI flags
 */
export interface ConfigSystem {
  /**
   * Load and validate configuration from all sources in hierarchy order.
   * @throws {ConfigurationError} listing every invalid value
   */
  load(): Promise<void>

  /** @throws {ConfigurationError} if `load()` has not succeeded */
  getConfig(): AnalystConfig

  /** Value at a dot-notation key (e.g. "scheduler.max_retries"), or undefined */
  get(key: string): unknown

  /**
   * Persist a scalar value to the project config file and reload.
   * @throws {ConfigurationError} for unknown keys, object keys or invalid values
   */
  set(key: string, value: unknown): Promise<void>

  /** Merged config with credential values masked */
  getMasked(): AnalystConfig

  readonly isLoaded: boolean
}
