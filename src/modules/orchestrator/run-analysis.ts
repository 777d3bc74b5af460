/**
 * runAnalysis — the invocation surface of the orchestration engine.
 *
 * Pre-flight (options, role selection, graph) raises ConfigurationError
 * before any task launches. After that the call always resolves with a
 * RunSummary, whatever happened to individual roles or the aggregation.
 */

import type { Logger } from 'pino'
import { z } from 'zod'
import { AggregationError, ConfigurationError } from '../../core/errors.js'
import type { TypedEventBus } from '../../core/event-bus.js'
import type {
  AggregationFailure,
  AgentResult,
  ReportArtifact,
  RoleName,
  RoleOutcome,
  RunStatus,
  RunSummary,
  UnavailableRole,
} from '../../core/types.js'
import { generateRunId, toError } from '../../utils/helpers.js'
import { createLogger } from '../../utils/logger.js'
import { Aggregator } from '../aggregator/aggregator.js'
import type { ArtifactSink } from '../artifact-sink/artifact-sink.js'
import type { RawDataProvider, RoleInput } from '../data/data-provider.js'
import type { DependencyGraph } from '../dependency-graph/dependency-graph.js'
import type { InferenceClient } from '../inference/inference-client.js'
import { createResultStore } from '../result-store/result-store.js'
import { extractKeyInsights } from '../roles/output-parser.js'
import type { RoleRegistry } from '../roles/role-registry.js'
import { DEFAULT_RETRY_POLICY } from '../scheduler/retry-policy.js'
import { SchedulerImpl } from '../scheduler/scheduler-impl.js'
import type { AgentTask } from '../scheduler/scheduler.js'
import { createAgentExecutor, createSynthesisExecutor } from './agent-unit.js'

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export const RunOptionsSchema = z
  .object({
    maxConcurrent: z.number().int().min(1).default(3),
    maxRetries: z.number().int().min(0).default(DEFAULT_RETRY_POLICY.maxRetries),
    taskTimeoutMs: z.number().int().positive().default(120_000),
    baseDelayMs: z.number().int().min(0).default(DEFAULT_RETRY_POLICY.baseDelayMs),
    maxDelayMs: z.number().int().min(0).default(DEFAULT_RETRY_POLICY.maxDelayMs),
    jitter: z.boolean().default(DEFAULT_RETRY_POLICY.jitter),
    enableCharts: z.boolean().default(true),
    runId: z.string().regex(/^[\w.-]+$/, 'must contain only letters, digits, ".", "_" or "-"').optional(),
  })
  .strict()
  .refine((o) => o.maxDelayMs >= o.baseDelayMs, {
    message: 'maxDelayMs must be greater than or equal to baseDelayMs',
    path: ['maxDelayMs'],
  })

export type ResolvedRunOptions = z.output<typeof RunOptionsSchema>

export interface RunAnalysisOptions extends Partial<ResolvedRunOptions> {
  /** Cooperative cancellation of the whole run */
  signal?: AbortSignal
  /** Uniform [0, 1) source for backoff jitter */
  random?: () => number
}

export interface RunAnalysisDeps {
  registry: RoleRegistry
  inference: InferenceClient
  provider: RawDataProvider
  sink?: ArtifactSink
  eventBus?: TypedEventBus
  logger?: Logger
}

// ---------------------------------------------------------------------------
// Pre-flight
// ---------------------------------------------------------------------------

/** @throws {ConfigurationError} listing every invalid option */
export function resolveRunOptions(options: RunAnalysisOptions): ResolvedRunOptions {
  const { signal: _signal, random: _random, ...rest } = options
  const result = RunOptionsSchema.safeParse(rest)
  if (!result.success) {
    throw new ConfigurationError(
      'Invalid run options',
      result.error.issues.map((i) => (i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message)),
    )
  }
  return result.data
}

/**
 * The graph a run would execute: every role when the selection is empty,
 * else the selected roles plus their mandatory prerequisites.
 *
 * @throws {ConfigurationError} for unknown roles, the synthesis role or an invalid graph
 */
export function resolveSelection(registry: RoleRegistry, selectedRoles: Iterable<RoleName> = []): DependencyGraph {
  const graph = registry.graph()
  const selected = [...new Set(selectedRoles)]
  if (selected.length === 0) return graph

  if (selected.includes(registry.synthesis.role)) {
    throw new ConfigurationError('Invalid role selection', [
      `"${registry.synthesis.role}" is the synthesis role and always runs last; select domain roles only`,
    ])
  }
  return graph.subgraph(selected)
}

// ---------------------------------------------------------------------------
// runAnalysis
// ---------------------------------------------------------------------------

export async function runAnalysis(
  selectedRoles: Iterable<RoleName> | undefined,
  options: RunAnalysisOptions,
  deps: RunAnalysisDeps,
): Promise<RunSummary> {
  const resolved = resolveRunOptions(options)
  const graph = resolveSelection(deps.registry, selectedRoles)
  const { registry, eventBus, sink } = deps
  const { signal } = options

  const started = new Date()
  const runId = resolved.runId ?? generateRunId(started)
  const logger = (deps.logger ?? createLogger('orchestrator')).child({ runId })
  const roles = [...graph.roles]

  const inputs = new Map<RoleName, RoleInput>()
  const store = createResultStore(roles)
  const retry = {
    maxRetries: resolved.maxRetries,
    baseDelayMs: resolved.baseDelayMs,
    maxDelayMs: resolved.maxDelayMs,
    jitter: resolved.jitter,
  }
  const random = options.random ?? Math.random

  const scheduler = new SchedulerImpl(
    {
      graph,
      store,
      runId,
      eventBus,
      logger,
      executor: createAgentExecutor({
        registry,
        inference: deps.inference,
        provider: deps.provider,
        logger,
        onInput: (input) => inputs.set(input.role, input),
      }),
    },
    { ...retry, maxConcurrent: resolved.maxConcurrent, taskTimeoutMs: resolved.taskTimeoutMs, random },
  )

  eventBus?.emit('run:started', { runId, roles })
  logger.info({ roles, maxConcurrent: resolved.maxConcurrent }, 'Run started')

  const outcome = await scheduler.run(signal)
  const results = [...store.snapshot()]
  const unavailable = unavailableRoles(outcome.tasks)

  // -------------------------------------------------------------------------
  // Aggregation
  // -------------------------------------------------------------------------

  let report: ReportArtifact | undefined
  let aggregationError: AggregationFailure | undefined
  try {
    const aggregator = new Aggregator(
      { executor: createSynthesisExecutor({ registry, inference: deps.inference, logger }), runId, eventBus, logger },
      { ...retry, timeoutMs: resolved.taskTimeoutMs, random },
    )
    report = await aggregator.aggregate({ role: registry.synthesis.role, results, unavailable }, signal)
  } catch (err: unknown) {
    if (!(err instanceof AggregationError)) throw err
    aggregationError = {
      errorClass: 'AggregationError',
      message: err.message,
      attempts: err.attempts,
      ...(err.lastError !== undefined ? { cause: err.lastError } : {}),
    }
  }

  // -------------------------------------------------------------------------
  // Summary
  // -------------------------------------------------------------------------

  const finished = new Date()
  const summary: RunSummary = {
    runId,
    status: runStatus(outcome.tasks, report),
    selectedRoles: roles,
    startedAt: started.toISOString(),
    finishedAt: finished.toISOString(),
    durationMs: finished.getTime() - started.getTime(),
    cancelled: outcome.cancelled,
    roles: outcome.tasks.map(roleOutcome),
    failures: outcome.failures,
    results,
    keyInsights: keyInsights(registry, results),
  }
  if (report !== undefined) summary.report = report
  if (aggregationError !== undefined) summary.aggregationError = aggregationError

  if (sink !== undefined) {
    try {
      await sink.emit({
        summary,
        results,
        ...(report !== undefined ? { report } : {}),
        inputs: roles.flatMap((role) => inputs.get(role) ?? []),
        enableCharts: resolved.enableCharts,
      })
    } catch (err: unknown) {
      const error = toError(err)
      logger.error({ err: error, sink: sink.name }, 'Failed to persist run artifacts')
      summary.persistenceError = { errorClass: error.name, message: error.message }
    }
  }

  eventBus?.emit('run:complete', { runId, status: summary.status, durationMs: summary.durationMs })
  logger.info(
    { status: summary.status, durationMs: summary.durationMs, failures: summary.failures.length },
    'Run complete',
  )
  return summary
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function runStatus(tasks: readonly AgentTask[], report: ReportArtifact | undefined): RunStatus {
  if (report === undefined) return 'failed'
  return tasks.every((t) => t.state === 'succeeded') ? 'completed' : 'completed_with_errors'
}

function roleOutcome(task: AgentTask): RoleOutcome {
  const outcome: RoleOutcome = { role: task.role, state: task.state, attempts: task.attempts }
  if (task.lastError !== undefined) {
    outcome.lastError = { errorClass: task.lastError.errorClass, message: task.lastError.message }
  }
  return outcome
}

function unavailableRoles(tasks: readonly AgentTask[]): UnavailableRole[] {
  return tasks
    .filter((t) => t.state !== 'succeeded')
    .map((t) => {
      const entry: UnavailableRole = { role: t.role, state: t.state }
      if (t.lastError !== undefined) entry.errorClass = t.lastError.errorClass
      return entry
    })
}

function keyInsights(registry: RoleRegistry, results: readonly AgentResult[]): Record<RoleName, string[]> {
  const digest: Record<RoleName, string[]> = {}
  for (const result of results) {
    const summaryField = registry.has(result.role) ? registry.get(result.role).summaryField : undefined
    digest[result.role] = extractKeyInsights(result.content, summaryField)
  }
  return digest
}
