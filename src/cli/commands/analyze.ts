/**
 * `sector-analyst analyze` command
 *
 * Runs the selected analysis roles against the configured data and writes
 * the report, per-role results and run summary.
 *
 * Usage:
 *   sector-analyst analyze                              Run every enabled role
 *   sector-analyst analyze --roles forecast             Run forecast and its mandatory prerequisites
 *   sector-analyst analyze --dry-run                    Show the execution plan only
 *   sector-analyst analyze --output-format json         NDJSON event stream
 *
 * Exit codes:
 *   0   - Report produced, every role succeeded
 *   1   - System error (unexpected exception)
 *   2   - Usage or configuration error
 *   3   - Report produced, some roles failed or were skipped
 *   4   - Run failed (no report)
 *   130 - User interrupted (SIGINT/Ctrl+C)
 */

import { InvalidArgumentError } from 'commander'
import type { Command } from 'commander'
import { ConfigurationError } from '../../core/errors.js'
import { createEventBus } from '../../core/event-bus.js'
import type { TypedEventBus } from '../../core/event-bus.js'
import type { AnalystConfig, PartialAnalystConfig } from '../../modules/config/config-schema.js'
import type { DependencyGraph } from '../../modules/dependency-graph/dependency-graph.js'
import type { RoleRegistry } from '../../modules/roles/role-registry.js'
import type { RunSummary } from '../../core/types.js'
import { CompositeArtifactSink } from '../../modules/artifact-sink/composite-artifact-sink.js'
import { FileArtifactSink } from '../../modules/artifact-sink/file-artifact-sink.js'
import { SqliteArtifactSink } from '../../modules/artifact-sink/sqlite-artifact-sink.js'
import type { InferenceClient } from '../../modules/inference/inference-client.js'
import { resolveSelection, runAnalysis } from '../../modules/orchestrator/run-analysis.js'
import { DatabaseWrapper } from '../../persistence/database.js'
import { formatDuration } from '../../utils/helpers.js'
import { createLogger } from '../../utils/logger.js'
import { emitEvent, streamEvents } from '../formatters/streaming.js'
import { formatProgressLine, formatRolesTable, formatRunSummary } from '../formatters/run-formatter.js'
import {
  buildDataProvider,
  buildInferenceClient,
  buildRegistry,
  loadConfig,
  resolvePaths,
} from '../utils/setup.js'
import type { ConfigLocation } from '../utils/setup.js'

const logger = createLogger('analyze-cmd')

// ---------------------------------------------------------------------------
// Exit codes
// ---------------------------------------------------------------------------

export const ANALYZE_EXIT_SUCCESS = 0
export const ANALYZE_EXIT_ERROR = 1
export const ANALYZE_EXIT_USAGE_ERROR = 2
export const ANALYZE_EXIT_COMPLETED_WITH_ERRORS = 3
export const ANALYZE_EXIT_FAILED = 4
export const ANALYZE_EXIT_INTERRUPTED = 130

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface AnalyzeActionOptions extends ConfigLocation {
  roles?: string[]
  maxConcurrent?: number
  maxRetries?: number
  taskTimeoutMs?: number
  /** Artifact directory override */
  output?: string
  /** `false` when --no-charts was given */
  charts?: boolean
  outputFormat: 'human' | 'json'
  dryRun: boolean
  /** Directory relative config paths resolve against */
  projectRoot: string
  env?: NodeJS.ProcessEnv
  /** Replaces the configured inference backend */
  inference?: InferenceClient
  /** Aborts the run in addition to SIGINT */
  signal?: AbortSignal
}

/** Exit code for a finished run */
export function exitCodeFor(summary: RunSummary): number {
  if (summary.cancelled) return ANALYZE_EXIT_INTERRUPTED
  switch (summary.status) {
    case 'completed':
      return ANALYZE_EXIT_SUCCESS
    case 'completed_with_errors':
      return ANALYZE_EXIT_COMPLETED_WITH_ERRORS
    default:
      return ANALYZE_EXIT_FAILED
  }
}

function cliOverridesFrom(options: AnalyzeActionOptions): PartialAnalystConfig {
  const scheduler: NonNullable<PartialAnalystConfig['scheduler']> = {}
  if (options.maxConcurrent !== undefined) scheduler.max_concurrent = options.maxConcurrent
  if (options.maxRetries !== undefined) scheduler.max_retries = options.maxRetries
  if (options.taskTimeoutMs !== undefined) scheduler.task_timeout_ms = options.taskTimeoutMs

  const global: NonNullable<PartialAnalystConfig['global']> = {}
  if (options.output !== undefined) global.output_dir = options.output
  if (options.charts === false) global.enable_charts = false

  return { scheduler, global }
}

function reportProgress(bus: TypedEventBus): void {
  const write = (line: string): void => {
    process.stdout.write(line + '\n')
  }
  bus.on('run:started', ({ runId, roles }) => {
    write(`Run ${runId}: ${roles.join(', ')}`)
  })
  bus.on('task:retrying', ({ role, attempt, delayMs, error }) => {
    write(formatProgressLine(role, 'running', `attempt ${String(attempt)} failed (${error.errorClass}), retrying in ${formatDuration(delayMs)}`))
  })
  bus.on('task:succeeded', ({ role, attempts, latencyMs }) => {
    write(formatProgressLine(role, 'succeeded', `(${String(attempts)} attempt(s), ${formatDuration(latencyMs)})`))
  })
  bus.on('task:failed', ({ role, error }) => {
    write(formatProgressLine(role, 'failed', `${error.errorClass}: ${error.message}`))
  })
  bus.on('task:skipped', ({ role, reason }) => {
    write(formatProgressLine(role, 'skipped', reason))
  })
  bus.on('aggregation:started', ({ role }) => {
    write(formatProgressLine(role, 'running', 'writing report'))
  })
}

interface Prepared {
  config: AnalystConfig
  registry: RoleRegistry
  graph: DependencyGraph
}

async function prepare(options: AnalyzeActionOptions): Promise<Prepared> {
  const system = await loadConfig(options, cliOverridesFrom(options), options.env)
  const config = system.getConfig()
  const registry = buildRegistry(config)
  return { config, registry, graph: resolveSelection(registry, options.roles ?? []) }
}

// ---------------------------------------------------------------------------
// runAnalyzeAction — testable core logic
// ---------------------------------------------------------------------------

export async function runAnalyzeAction(options: AnalyzeActionOptions): Promise<number> {
  const { outputFormat, projectRoot } = options

  // Pre-flight: configuration, registry and role selection
  let prepared: Prepared
  try {
    prepared = await prepare(options)
  } catch (err: unknown) {
    if (err instanceof ConfigurationError) {
      process.stderr.write(`Error: ${err.message}\n`)
      return ANALYZE_EXIT_USAGE_ERROR
    }
    throw err
  }
  const { config, registry, graph } = prepared

  if (options.dryRun) {
    if (outputFormat === 'json') {
      emitEvent('run:plan', {
        roles: graph.topologicalOrder().map((role) => ({
          role,
          prerequisites: graph.prerequisitesOf(role),
        })),
        synthesis: registry.synthesis.role,
      })
    } else {
      process.stdout.write(`Dry run: ${String(graph.roles.length)} role(s) would run\n\n`)
      process.stdout.write(formatRolesTable(registry, graph))
    }
    return ANALYZE_EXIT_SUCCESS
  }

  const paths = resolvePaths(config, projectRoot)
  const database = new DatabaseWrapper(paths.databasePath)
  const fileSink = new FileArtifactSink(paths.outputDir)
  const bus = createEventBus()
  if (outputFormat === 'json') streamEvents(bus)
  else reportProgress(bus)

  const controller = new AbortController()
  const onSigint = (): void => {
    controller.abort(new Error('interrupted by user (SIGINT)'))
  }
  const onExternalAbort = (): void => {
    controller.abort(options.signal?.reason)
  }
  process.once('SIGINT', onSigint)
  if (options.signal?.aborted === true) onExternalAbort()
  else options.signal?.addEventListener('abort', onExternalAbort, { once: true })

  try {
    database.open()
    const summary = await runAnalysis(
      options.roles,
      {
        maxConcurrent: config.scheduler.max_concurrent,
        maxRetries: config.scheduler.max_retries,
        taskTimeoutMs: config.scheduler.task_timeout_ms,
        baseDelayMs: config.scheduler.base_delay_ms,
        maxDelayMs: config.scheduler.max_delay_ms,
        jitter: config.scheduler.jitter,
        enableCharts: config.global.enable_charts,
        signal: controller.signal,
      },
      {
        registry,
        inference: options.inference ?? buildInferenceClient(config, projectRoot),
        provider: buildDataProvider(config, registry, paths),
        sink: new CompositeArtifactSink([fileSink, new SqliteArtifactSink(database)]),
        eventBus: bus,
      },
    )

    if (outputFormat === 'json') {
      emitEvent('run:summary', { ...summary, artifactsDir: fileSink.runDir(summary.runId) })
    } else {
      process.stdout.write(formatRunSummary(summary, fileSink.runDir(summary.runId)))
    }
    return exitCodeFor(summary)
  } catch (err: unknown) {
    if (err instanceof ConfigurationError) {
      process.stderr.write(`Error: ${err.message}\n`)
      return ANALYZE_EXIT_USAGE_ERROR
    }
    const message = err instanceof Error ? err.message : String(err)
    logger.error({ err }, 'Analysis run failed')
    process.stderr.write(`Error: ${message}\n`)
    return ANALYZE_EXIT_ERROR
  } finally {
    process.off('SIGINT', onSigint)
    options.signal?.removeEventListener('abort', onExternalAbort)
    database.close()
  }
}

// ---------------------------------------------------------------------------
// Commander registration
// ---------------------------------------------------------------------------

function parseInteger(flag: string): (value: string) => number {
  return (value) => {
    if (!/^\d+$/.test(value)) {
      throw new InvalidArgumentError(`${flag} expects a non-negative integer, got "${value}"`)
    }
    return parseInt(value, 10)
  }
}

export function registerAnalyzeCommand(program: Command): void {
  program
    .command('analyze')
    .description('Run the analysis roles and write the synthesized report')
    .option('--roles <roles>', 'Comma-separated roles to run (prerequisites are added)', (v: string) =>
      v
        .split(',')
        .map((r) => r.trim())
        .filter((r) => r !== ''),
    )
    .option('--max-concurrent <n>', 'Maximum concurrent inference calls', parseInteger('--max-concurrent'))
    .option('--max-retries <n>', 'Retries per role after transient failures', parseInteger('--max-retries'))
    .option('--task-timeout <ms>', 'Per-attempt timeout in milliseconds', parseInteger('--task-timeout'))
    .option('--output <dir>', 'Directory for run artifacts')
    .option('--no-charts', 'Skip chart specifications')
    .option('--output-format <format>', 'Output format: human (default) or json', 'human')
    .option('--dry-run', 'Show the execution plan without calling any model', false)
    .option('--project-config-dir <dir>', 'Path to project .sector-analyst/ directory')
    .option('--global-config-dir <dir>', 'Path to global .sector-analyst/ directory')
    .action(
      async (opts: {
        roles?: string[]
        maxConcurrent?: number
        maxRetries?: number
        taskTimeout?: number
        output?: string
        charts: boolean
        outputFormat: string
        dryRun: boolean
        projectConfigDir?: string
        globalConfigDir?: string
      }) => {
        if (opts.outputFormat !== 'human' && opts.outputFormat !== 'json') {
          process.stderr.write(`Error: --output-format must be "human" or "json", got "${opts.outputFormat}"\n`)
          process.exitCode = ANALYZE_EXIT_USAGE_ERROR
          return
        }
        process.exitCode = await runAnalyzeAction({
          outputFormat: opts.outputFormat,
          dryRun: opts.dryRun,
          charts: opts.charts,
          projectRoot: process.cwd(),
          ...(opts.roles !== undefined && { roles: opts.roles }),
          ...(opts.maxConcurrent !== undefined && { maxConcurrent: opts.maxConcurrent }),
          ...(opts.maxRetries !== undefined && { maxRetries: opts.maxRetries }),
          ...(opts.taskTimeout !== undefined && { taskTimeoutMs: opts.taskTimeout }),
          ...(opts.output !== undefined && { output: opts.output }),
          ...(opts.projectConfigDir !== undefined && { projectConfigDir: opts.projectConfigDir }),
          ...(opts.globalConfigDir !== undefined && { globalConfigDir: opts.globalConfigDir }),
        })
      },
    )
}
