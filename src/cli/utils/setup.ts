/**
 * Wiring shared by the CLI commands: configuration loading and construction
 * of the registry, data provider, inference client and sinks from it.
 */

import { isAbsolute, join, resolve } from 'node:path'
import type { RoleName } from '../../core/types.js'
import type { AnalystConfig, PartialAnalystConfig } from '../../modules/config/config-schema.js'
import { createConfigSystem } from '../../modules/config/config-system-impl.js'
import type { ConfigSystem } from '../../modules/config/config-system.js'
import { CsvDataProvider } from '../../modules/data/csv-data-provider.js'
import { CliInferenceClient } from '../../modules/inference/cli-inference-client.js'
import { createBuiltInRegistry } from '../../modules/roles/built-in-roles.js'
import type { RoleOverride } from '../../modules/roles/role-definition.js'
import type { RoleRegistry } from '../../modules/roles/role-registry.js'
import { setLogLevel } from '../../utils/logger.js'

export interface ConfigLocation {
  projectConfigDir?: string
  globalConfigDir?: string
}

/**
 * Load the merged configuration and apply its log level.
 * @throws {ConfigurationError} when invalid
 */
export async function loadConfig(
  location: ConfigLocation,
  cliOverrides: PartialAnalystConfig = {},
  env?: NodeJS.ProcessEnv,
): Promise<ConfigSystem> {
  const system = createConfigSystem({
    ...(location.projectConfigDir !== undefined && { projectConfigDir: location.projectConfigDir }),
    ...(location.globalConfigDir !== undefined && { globalConfigDir: location.globalConfigDir }),
    ...(env !== undefined && { env }),
    cliOverrides,
  })
  await system.load()
  setLogLevel(system.getConfig().global.log_level)
  return system
}

export function roleOverridesFrom(config: AnalystConfig): Record<RoleName, RoleOverride> {
  const overrides: Record<RoleName, RoleOverride> = {}
  for (const [role, settings] of Object.entries(config.roles)) {
    const override: RoleOverride = {}
    if (settings.enabled !== undefined) override.enabled = settings.enabled
    if (settings.optional_prerequisites !== undefined) override.optionalPrerequisites = settings.optional_prerequisites
    if (settings.temperature !== undefined) override.temperature = settings.temperature
    if (settings.max_tokens !== undefined) override.maxTokens = settings.max_tokens
    if (settings.model !== undefined) override.model = settings.model
    overrides[role] = override
  }
  return overrides
}

/** Built-in roles with the configured industry and per-role settings */
export function buildRegistry(config: AnalystConfig): RoleRegistry {
  return createBuiltInRegistry({
    industry: config.global.industry,
    tokenCeiling: config.global.token_ceiling,
  }).withOverrides(roleOverridesFrom(config))
}

export interface ResolvedPaths {
  dataDir: string
  mappingFile: string
  outputDir: string
  databasePath: string
}

/** Relative paths resolve against `cwd`; the mapping file against the data directory */
export function resolvePaths(config: AnalystConfig, cwd: string): ResolvedPaths {
  const dataDir = resolve(cwd, config.data.root_dir)
  const mapping = config.data.mapping_file
  return {
    dataDir,
    mappingFile: isAbsolute(mapping) ? mapping : join(dataDir, mapping),
    outputDir: resolve(cwd, config.global.output_dir),
    databasePath: resolve(cwd, config.global.database_path),
  }
}

export function buildDataProvider(config: AnalystConfig, registry: RoleRegistry, paths: ResolvedPaths): CsvDataProvider {
  return new CsvDataProvider({
    rootDir: paths.dataDir,
    mappingFile: paths.mappingFile,
    datasetsByRole: registry.datasetsByRole(),
    maxSeriesPoints: config.data.max_series_points,
  })
}

export function buildInferenceClient(config: AnalystConfig, cwd: string): CliInferenceClient {
  const { inference } = config
  return new CliInferenceClient({
    binary: inference.binary,
    args: inference.args,
    outputFormat: inference.output_format,
    cwd,
    ...(inference.model !== undefined && { model: inference.model }),
    ...(inference.api_key_env !== undefined && { apiKeyEnv: inference.api_key_env }),
    ...(inference.env !== undefined && { env: inference.env }),
  })
}
