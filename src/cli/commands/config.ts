/**
 * `sector-analyst config` command group
 *
 * Subcommands:
 *   - `sector-analyst config show`              — display merged config (credentials masked)
 *   - `sector-analyst config get <key>`         — print one value by dot-notation key
 *   - `sector-analyst config set <key> <value>` — update a project config value
 */

import type { Command } from 'commander'
import yaml from 'js-yaml'
import { ConfigurationError } from '../../core/errors.js'
import { coerceScalar, createConfigSystem, getByPath } from '../../modules/config/config-system-impl.js'
import type { ConfigSystem } from '../../modules/config/config-system.js'
import { createLogger } from '../../utils/logger.js'
import type { ConfigLocation } from '../utils/setup.js'

const logger = createLogger('config-cmd')

// ---------------------------------------------------------------------------
// Exit codes
// ---------------------------------------------------------------------------

export const CONFIG_EXIT_SUCCESS = 0
export const CONFIG_EXIT_ERROR = 1
export const CONFIG_EXIT_INVALID = 2

export interface ConfigActionOptions extends ConfigLocation {
  env?: NodeJS.ProcessEnv
}

/** Loaded config system, or the exit code to return */
async function loadSystem(opts: ConfigActionOptions): Promise<ConfigSystem | number> {
  const system = createConfigSystem({
    ...(opts.projectConfigDir !== undefined && { projectConfigDir: opts.projectConfigDir }),
    ...(opts.globalConfigDir !== undefined && { globalConfigDir: opts.globalConfigDir }),
    ...(opts.env !== undefined && { env: opts.env }),
  })
  try {
    await system.load()
    return system
  } catch (err: unknown) {
    return reportFailure(err, 'loading')
  }
}

function reportFailure(err: unknown, doing: string): number {
  if (err instanceof ConfigurationError) {
    process.stderr.write(`Error: ${err.message}\n`)
    return CONFIG_EXIT_INVALID
  }
  const message = err instanceof Error ? err.message : String(err)
  logger.error({ err }, `Failed ${doing} configuration`)
  process.stderr.write(`Error ${doing} configuration: ${message}\n`)
  return CONFIG_EXIT_ERROR
}

// ---------------------------------------------------------------------------
// `config show`
// ---------------------------------------------------------------------------

export interface ConfigShowOptions extends ConfigActionOptions {
  format?: 'yaml' | 'json'
}

export async function runConfigShow(opts: ConfigShowOptions = {}): Promise<number> {
  const system = await loadSystem(opts)
  if (typeof system === 'number') return system

  const masked = system.getMasked()
  if (opts.format === 'json') {
    process.stdout.write(JSON.stringify(masked, null, 2) + '\n')
  } else {
    process.stdout.write('# Sector analyst configuration (credentials masked)\n\n')
    process.stdout.write(yaml.dump(masked))
  }
  return CONFIG_EXIT_SUCCESS
}

// ---------------------------------------------------------------------------
// `config get`
// ---------------------------------------------------------------------------

export async function runConfigGet(key: string, opts: ConfigActionOptions = {}): Promise<number> {
  const system = await loadSystem(opts)
  if (typeof system === 'number') return system

  const value = getByPath(system.getMasked(), key)
  if (value === undefined) {
    process.stderr.write(`Error: Unknown config key: ${key}\n`)
    return CONFIG_EXIT_INVALID
  }
  process.stdout.write(typeof value === 'string' ? `${value}\n` : `${JSON.stringify(value)}\n`)
  return CONFIG_EXIT_SUCCESS
}

// ---------------------------------------------------------------------------
// `config set`
// ---------------------------------------------------------------------------

export async function runConfigSet(key: string, rawValue: string, opts: ConfigActionOptions = {}): Promise<number> {
  if (key.trim() === '') {
    process.stderr.write('Error: key must not be empty\n')
    return CONFIG_EXIT_INVALID
  }

  const system = await loadSystem(opts)
  if (typeof system === 'number') return system

  // String settings keep the raw text ("2024" stays a directory name)
  const value = typeof system.get(key) === 'string' ? rawValue : coerceScalar(rawValue)
  try {
    await system.set(key, value)
  } catch (err: unknown) {
    return reportFailure(err, 'updating')
  }
  process.stdout.write(`Set ${key} = ${JSON.stringify(system.get(key))}\n`)
  return CONFIG_EXIT_SUCCESS
}

// ---------------------------------------------------------------------------
// Command registration
// ---------------------------------------------------------------------------

interface LocationFlags {
  projectConfigDir?: string
  globalConfigDir?: string
}

function locationFrom(opts: LocationFlags): ConfigLocation {
  return {
    ...(opts.projectConfigDir !== undefined && { projectConfigDir: opts.projectConfigDir }),
    ...(opts.globalConfigDir !== undefined && { globalConfigDir: opts.globalConfigDir }),
  }
}

export function registerConfigCommand(program: Command): void {
  const configCmd = program.command('config').description('Show and modify configuration')

  configCmd
    .command('show')
    .description('Display the merged configuration with credentials masked')
    .option('--format <format>', 'Output format: yaml (default) or json', 'yaml')
    .option('--project-config-dir <dir>', 'Path to project .sector-analyst/ directory')
    .option('--global-config-dir <dir>', 'Path to global .sector-analyst/ directory')
    .action(async (opts: LocationFlags & { format: string }) => {
      process.exitCode = await runConfigShow({
        ...locationFrom(opts),
        format: opts.format === 'json' ? 'json' : 'yaml',
      })
    })

  configCmd
    .command('get <key>')
    .description('Print a configuration value (e.g. scheduler.max_retries)')
    .option('--project-config-dir <dir>', 'Path to project .sector-analyst/ directory')
    .option('--global-config-dir <dir>', 'Path to global .sector-analyst/ directory')
    .action(async (key: string, opts: LocationFlags) => {
      process.exitCode = await runConfigGet(key, locationFrom(opts))
    })

  configCmd
    .command('set <key> <value>')
    .description('Set a value in the project config file (e.g. scheduler.max_concurrent 4)')
    .option('--project-config-dir <dir>', 'Path to project .sector-analyst/ directory')
    .option('--global-config-dir <dir>', 'Path to global .sector-analyst/ directory')
    .action(async (key: string, value: string, opts: LocationFlags) => {
      process.exitCode = await runConfigSet(key, value, locationFrom(opts))
    })
}
