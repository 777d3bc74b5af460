/**
 * `sector-analyst runs` command group
 *
 * Subcommands:
 *   - `sector-analyst runs [--limit n]`   — most recent runs
 *   - `sector-analyst runs show <id>`     — one run with its tasks, failures and report
 */

import { existsSync } from 'node:fs'
import type { Command } from 'commander'
import { ConfigurationError } from '../../core/errors.js'
import { DatabaseWrapper } from '../../persistence/database.js'
import { getRun, listRuns } from '../../persistence/queries/runs.js'
import { formatRunDetail, formatRunList } from '../formatters/run-formatter.js'
import { buildJsonOutput } from '../utils/formatting.js'
import { loadConfig, resolvePaths } from '../utils/setup.js'
import type { ConfigLocation } from '../utils/setup.js'

export const RUNS_EXIT_SUCCESS = 0
export const RUNS_EXIT_ERROR = 1
export const RUNS_EXIT_INVALID = 2

export interface RunsActionOptions extends ConfigLocation {
  outputFormat: 'human' | 'json'
  projectRoot: string
  version: string
  env?: NodeJS.ProcessEnv
}

/**
 * Open the run history database read for a command, or null when no run
 * was ever recorded.
 */
async function openHistory(options: RunsActionOptions): Promise<DatabaseWrapper | null> {
  const config = (await loadConfig(options, {}, options.env)).getConfig()
  const { databasePath } = resolvePaths(config, options.projectRoot)
  if (!existsSync(databasePath)) return null
  const database = new DatabaseWrapper(databasePath)
  database.open()
  return database
}

async function withHistory(
  options: RunsActionOptions,
  body: (database: DatabaseWrapper | null) => number,
): Promise<number> {
  let database: DatabaseWrapper | null = null
  try {
    database = await openHistory(options)
    return body(database)
  } catch (err: unknown) {
    if (err instanceof ConfigurationError) {
      process.stderr.write(`Error: ${err.message}\n`)
      return RUNS_EXIT_INVALID
    }
    const message = err instanceof Error ? err.message : String(err)
    process.stderr.write(`Error reading run history: ${message}\n`)
    return RUNS_EXIT_ERROR
  } finally {
    database?.close()
  }
}

export function runRunsList(options: RunsActionOptions & { limit: number }): Promise<number> {
  return withHistory(options, (database) => {
    const runs = database === null ? [] : listRuns(database.db, options.limit)
    if (options.outputFormat === 'json') {
      process.stdout.write(JSON.stringify(buildJsonOutput('runs', runs, options.version), null, 2) + '\n')
    } else {
      process.stdout.write(formatRunList(runs))
    }
    return RUNS_EXIT_SUCCESS
  })
}

export function runRunsShow(runId: string, options: RunsActionOptions): Promise<number> {
  return withHistory(options, (database) => {
    const detail = database === null ? undefined : getRun(database.db, runId)
    if (detail === undefined) {
      process.stderr.write(`Error: run "${runId}" not found\n`)
      return RUNS_EXIT_INVALID
    }
    if (options.outputFormat === 'json') {
      process.stdout.write(JSON.stringify(buildJsonOutput('runs show', detail, options.version), null, 2) + '\n')
    } else {
      process.stdout.write(formatRunDetail(detail))
    }
    return RUNS_EXIT_SUCCESS
  })
}

interface RunsCommandOptions {
  outputFormat: string
  projectConfigDir?: string
  globalConfigDir?: string
}

function actionOptions(opts: RunsCommandOptions, version: string): RunsActionOptions {
  return {
    outputFormat: opts.outputFormat === 'json' ? 'json' : 'human',
    projectRoot: process.cwd(),
    version,
    ...(opts.projectConfigDir !== undefined && { projectConfigDir: opts.projectConfigDir }),
    ...(opts.globalConfigDir !== undefined && { globalConfigDir: opts.globalConfigDir }),
  }
}

export function registerRunsCommand(program: Command, version: string): void {
  const runsCmd = program
    .command('runs')
    .description('Show the run history')
    .option('--limit <n>', 'Number of runs to list', (v: string) => parseInt(v, 10), 20)
    .option('--output-format <format>', 'Output format: human (default) or json', 'human')
    .option('--project-config-dir <dir>', 'Path to project .sector-analyst/ directory')
    .option('--global-config-dir <dir>', 'Path to global .sector-analyst/ directory')
    .action(async (opts: RunsCommandOptions & { limit: number }) => {
      process.exitCode = await runRunsList({ ...actionOptions(opts, version), limit: opts.limit })
    })

  runsCmd
    .command('show <runId>')
    .description('Show one run with its tasks, failures and report')
    .option('--output-format <format>', 'Output format: human (default) or json', 'human')
    .option('--project-config-dir <dir>', 'Path to project .sector-analyst/ directory')
    .option('--global-config-dir <dir>', 'Path to global .sector-analyst/ directory')
    .action(async (runId: string, opts: RunsCommandOptions) => {
      process.exitCode = await runRunsShow(runId, actionOptions(opts, version))
    })
}
