/**
 * Agent units: the executors that turn a role definition, its data and an
 * inference client into an Agent Result (or the report text).
 */

import type { Logger } from 'pino'
import type { AgentResult, ResultMetrics } from '../../core/types.js'
import type { RawDataProvider, RoleInput } from '../data/data-provider.js'
import type { InferenceClient, InferenceResponse } from '../inference/inference-client.js'
import type { SynthesisExecutor } from '../aggregator/aggregator.js'
import type { RoleRegistry } from '../roles/role-registry.js'
import { stripCodeFences } from '../roles/output-parser.js'
import type { TaskExecutor } from '../scheduler/scheduler.js'

export interface AgentUnitDeps {
  registry: RoleRegistry
  inference: InferenceClient
  provider: RawDataProvider
  logger: Logger
  /** Called with the data each role loaded */
  onInput?: (input: RoleInput) => void
}

/**
 * Executor for domain roles. Each attempt reloads the role's data, builds
 * its prompt from data and prerequisite results, calls the model and parses
 * the answer.
 */
export function createAgentExecutor(deps: AgentUnitDeps): TaskExecutor {
  const { registry, inference, provider, logger } = deps

  return async (input, signal) => {
    const def = registry.get(input.role)
    const data = await provider.loadInput(input.role)
    deps.onInput?.(data)

    const prompt = def.buildPrompt({
      role: input.role,
      attempt: input.attempt,
      datasets: data.datasets,
      prerequisites: input.prerequisites,
      omitted: input.omitted,
    })
    logger.debug(
      { role: input.role, attempt: input.attempt, promptChars: prompt.length, omitted: input.omitted },
      'Calling inference',
    )

    const startedAt = Date.now()
    const response = await inference.infer(input.role, prompt, def.params, signal)
    const result: AgentResult = {
      role: input.role,
      content: def.parseOutput(response.text),
      rawText: response.text,
      timestamp: new Date().toISOString(),
      metrics: metricsOf(response, Date.now() - startedAt),
    }
    return result
  }
}

/** Executor for the synthesis role */
export function createSynthesisExecutor(deps: Pick<AgentUnitDeps, 'registry' | 'inference' | 'logger'>): SynthesisExecutor {
  const { registry, inference, logger } = deps

  return async (payload, signal) => {
    const def = registry.synthesis
    const prompt = def.buildPrompt(payload)
    logger.debug({ role: def.role, inputs: payload.results.length, promptChars: prompt.length }, 'Calling inference')

    const startedAt = Date.now()
    const response = await inference.infer(def.role, prompt, def.params, signal)
    return { text: stripCodeFences(response.text), metrics: metricsOf(response, Date.now() - startedAt) }
  }
}

function metricsOf(response: InferenceResponse, latencyMs: number): ResultMetrics {
  const metrics: ResultMetrics = { latencyMs }
  if (response.inputTokens !== undefined) metrics.inputTokens = response.inputTokens
  if (response.outputTokens !== undefined) metrics.outputTokens = response.outputTokens
  return metrics
}
