/**
 * Aggregator — runs the synthesis role once every domain task is terminal.
 *
 * The synthesis call gets the same retry policy and per-attempt timeout as
 * domain tasks. Any outcome other than a report is an AggregationError.
 */

import type { Logger } from 'pino'
import { AggregationError } from '../../core/errors.js'
import type { TypedEventBus } from '../../core/event-bus.js'
import type {
  AgentResult,
  ReportArtifact,
  ResultMetrics,
  RoleName,
  RunId,
  UnavailableRole,
} from '../../core/types.js'
import { maskSecrets } from '../../utils/masking.js'
import { sleep } from '../../utils/helpers.js'
import { createLogger } from '../../utils/logger.js'
import type { SynthesisPayload } from '../roles/role-definition.js'
import { runAttempt } from '../scheduler/attempt.js'
import { classifyFailure } from '../scheduler/failure-classifier.js'
import { backoffDelay, canRetry } from '../scheduler/retry-policy.js'
import type { RetryPolicy } from '../scheduler/retry-policy.js'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface SynthesisOutput {
  /** Markdown report body */
  text: string
  metrics?: ResultMetrics
}

/** One synthesis attempt */
export type SynthesisExecutor = (payload: SynthesisPayload, signal: AbortSignal) => Promise<SynthesisOutput>

export interface AggregationInput {
  /** Name of the synthesis role */
  role: RoleName
  /** Result store snapshot: succeeded results in declared order */
  results: readonly AgentResult[]
  unavailable: readonly UnavailableRole[]
}

export interface AggregatorOptions extends RetryPolicy {
  timeoutMs: number
  random?: () => number
}

export interface AggregatorDeps {
  executor: SynthesisExecutor
  runId: RunId
  eventBus?: TypedEventBus
  logger?: Logger
}

// ---------------------------------------------------------------------------
// Aggregator
// ---------------------------------------------------------------------------

export class Aggregator {
  private readonly _deps: AggregatorDeps
  private readonly _options: AggregatorOptions
  private readonly _logger: Logger

  constructor(deps: AggregatorDeps, options: AggregatorOptions) {
    this._deps = deps
    this._options = options
    this._logger = deps.logger ?? createLogger('aggregator').child({ runId: deps.runId })
  }

  /**
   * Produce the report artifact.
   *
   * @throws {AggregationError} with `attempts = 0` when there is no input or
   *   the run was already cancelled, else with the number of attempts made
   */
  async aggregate(input: AggregationInput, signal?: AbortSignal): Promise<ReportArtifact> {
    const { runId, eventBus, executor } = this._deps
    const { role } = input

    if (input.results.length === 0) {
      throw new AggregationError('Aggregation did not run: no domain role produced a result', 0)
    }
    if (signal?.aborted === true) {
      throw new AggregationError('Aggregation did not run: the run was cancelled', 0)
    }

    // Deep copies, owned by the report
    const sources = input.results.map((r) => structuredClone(r))
    const unavailable = input.unavailable.map((u) => ({ ...u }))
    const payload: SynthesisPayload = { role, results: sources, unavailable }

    eventBus?.emit('aggregation:started', { runId, role, inputs: sources.map((r) => r.role) })

    for (let attempt = 1; ; attempt++) {
      const startedAt = Date.now()
      try {
        const output = await runAttempt((s) => executor(structuredClone(payload), s), {
          timeoutMs: this._options.timeoutMs,
          signal,
          label: `Synthesis role "${role}"`,
        })
        const metrics: ResultMetrics = {
          ...output.metrics,
          latencyMs: output.metrics?.latencyMs ?? Date.now() - startedAt,
          attempts: attempt,
        }
        eventBus?.emit('aggregation:succeeded', { runId, attempts: attempt })
        this._logger.info({ role, attempt, inputs: sources.length }, 'Report synthesized')
        return {
          role,
          content: output.text,
          timestamp: new Date().toISOString(),
          sources,
          unavailable,
          metrics,
        }
      } catch (err: unknown) {
        const { kind, error } = classifyFailure(err)
        const lastError = { errorClass: error.name, message: maskSecrets(error.message) }

        if (kind === 'transient' && canRetry(attempt, this._options) && signal?.aborted !== true) {
          const delayMs = backoffDelay(attempt, this._options, this._options.random ?? Math.random)
          eventBus?.emit('aggregation:retrying', { runId, attempt, delayMs, error: lastError })
          this._logger.warn({ attempt, delayMs, err: lastError }, 'Synthesis attempt failed, retrying')
          await sleep(delayMs, signal)
          if (signal?.aborted !== true) continue
        }

        const message =
          signal?.aborted === true
            ? `Aggregation cancelled after ${String(attempt)} attempt(s)`
            : `Aggregation failed after ${String(attempt)} attempt(s): ${lastError.message}`
        eventBus?.emit('aggregation:failed', { runId, attempts: attempt, message })
        this._logger.error({ attempt, kind, err: lastError }, 'Aggregation failed')
        throw new AggregationError(message, attempt, lastError)
      }
    }
  }
}

export function createAggregator(deps: AggregatorDeps, options: AggregatorOptions): Aggregator {
  return new Aggregator(deps, options)
}
