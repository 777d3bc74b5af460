/**
 * InferenceClient — abstract LLM-calling capability consumed by agent units.
 */

import type { RoleName } from '../../core/types.js'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface InferenceParams {
  temperature?: number
  maxTokens?: number
  model?: string
  /** Instructions sent ahead of the prompt where the backend supports it */
  systemPrompt?: string
}

export interface InferenceResponse {
  text: string
  model?: string
  inputTokens?: number
  outputTokens?: number
}

// ---------------------------------------------------------------------------
// InferenceClient interface
// ---------------------------------------------------------------------------

export interface InferenceClient {
  /**
   * Run one inference call.
   *
   * Implementations reject with TransientInferenceError for timeouts, rate
   * limiting and backend hiccups and with PermanentInferenceError for
   * rejected requests. They should stop work when `signal` aborts.
   */
  infer(
    role: RoleName,
    prompt: string,
    params: InferenceParams,
    signal?: AbortSignal,
  ): Promise<InferenceResponse>
}
