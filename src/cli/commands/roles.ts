/**
 * `sector-analyst roles` command
 *
 * Lists the enabled analysis roles in execution order with their
 * prerequisites and datasets.
 */

import type { Command } from 'commander'
import { ConfigurationError } from '../../core/errors.js'
import { formatRolesTable } from '../formatters/run-formatter.js'
import { buildJsonOutput } from '../utils/formatting.js'
import { buildRegistry, loadConfig } from '../utils/setup.js'
import type { ConfigLocation } from '../utils/setup.js'

export const ROLES_EXIT_SUCCESS = 0
export const ROLES_EXIT_INVALID = 2

export interface RolesActionOptions extends ConfigLocation {
  outputFormat: 'human' | 'json'
  version: string
  env?: NodeJS.ProcessEnv
}

export async function runRolesAction(options: RolesActionOptions): Promise<number> {
  try {
    const config = (await loadConfig(options, {}, options.env)).getConfig()
    const registry = buildRegistry(config)
    const graph = registry.graph()

    if (options.outputFormat === 'json') {
      const data = {
        roles: graph.topologicalOrder().map((role) => {
          const def = registry.get(role)
          return {
            role,
            title: def.title,
            description: def.description,
            prerequisites: graph.prerequisitesOf(role),
            datasets: def.dataSources,
          }
        }),
        synthesis: { role: registry.synthesis.role, description: registry.synthesis.description },
      }
      process.stdout.write(JSON.stringify(buildJsonOutput('roles', data, options.version), null, 2) + '\n')
    } else {
      process.stdout.write(formatRolesTable(registry, graph))
    }
    return ROLES_EXIT_SUCCESS
  } catch (err: unknown) {
    if (err instanceof ConfigurationError) {
      process.stderr.write(`Error: ${err.message}\n`)
      return ROLES_EXIT_INVALID
    }
    throw err
  }
}

export function registerRolesCommand(program: Command, version: string): void {
  program
    .command('roles')
    .description('List the analysis roles in execution order')
    .option('--output-format <format>', 'Output format: human (default) or json', 'human')
    .option('--project-config-dir <dir>', 'Path to project .sector-analyst/ directory')
    .option('--global-config-dir <dir>', 'Path to global .sector-analyst/ directory')
    .action(async (opts: { outputFormat: string; projectConfigDir?: string; globalConfigDir?: string }) => {
      process.exitCode = await runRolesAction({
        outputFormat: opts.outputFormat === 'json' ? 'json' : 'human',
        version,
        ...(opts.projectConfigDir !== undefined && { projectConfigDir: opts.projectConfigDir }),
        ...(opts.globalConfigDir !== undefined && { globalConfigDir: opts.globalConfigDir }),
      })
    })
}
