/**
 * Failure classification: maps anything an attempt throws onto the error
 * taxonomy and decides whether it is worth retrying.
 */

import {
  AnalystError,
  PermanentInferenceError,
  TransientInferenceError,
} from '../../core/errors.js'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type FailureKind = 'transient' | 'permanent'

export interface ClassifiedFailure {
  kind: FailureKind
  /** The original error, or a taxonomy error wrapping it */
  error: AnalystError
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

const TRANSIENT_STATUS = new Set([408, 429])
const PERMANENT_STATUS = new Set([400, 401, 403, 404, 422])

const TRANSIENT_MESSAGE =
  /time(d)?[\s-]?out|rate[\s_-]?limit|too many requests|ECONNRESET|ECONNREFUSED|ETIMEDOUT|EAI_AGAIN|socket hang up|overloaded|temporarily unavailable/i

// ---------------------------------------------------------------------------
// classifyFailure
// ---------------------------------------------------------------------------

/**
 * Classify an error raised by an attempt.
 *
 * Order: taxonomy instances, then an HTTP-like `status`/`statusCode`,
 * then message heuristics. Unrecognized errors are permanent.
 */
export function classifyFailure(err: unknown): ClassifiedFailure {
  if (err instanceof TransientInferenceError) {
    return { kind: 'transient', error: err }
  }
  if (err instanceof AnalystError) {
    return { kind: 'permanent', error: err }
  }

  const message = err instanceof Error ? err.message : String(err)
  const status = statusOf(err)
  const context: Record<string, unknown> = { originalName: err instanceof Error ? err.name : typeof err }
  if (status !== undefined) context.status = status

  if (status !== undefined) {
    if (TRANSIENT_STATUS.has(status) || status >= 500) {
      return { kind: 'transient', error: new TransientInferenceError(message, context) }
    }
    if (PERMANENT_STATUS.has(status) || (status >= 400 && status < 500)) {
      return { kind: 'permanent', error: new PermanentInferenceError(message, context) }
    }
  }

  if (TRANSIENT_MESSAGE.test(message) || TRANSIENT_MESSAGE.test(codeOf(err) ?? '')) {
    return { kind: 'transient', error: new TransientInferenceError(message, context) }
  }

  return { kind: 'permanent', error: new PermanentInferenceError(message, context) }
}

function statusOf(err: unknown): number | undefined {
  if (typeof err !== 'object' || err === null) return undefined
  if ('status' in err && typeof err.status === 'number') return err.status
  if ('statusCode' in err && typeof err.statusCode === 'number') return err.statusCode
  return undefined
}

function codeOf(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    return err.code
  }
  return undefined
}
