/**
 * Retry policy: attempt budget and exponential backoff with optional jitter.
 */

export interface RetryPolicy {
  /** Retries after the first attempt; total attempts = maxRetries + 1 */
  maxRetries: number
  baseDelayMs: number
  maxDelayMs: number
  /** Draw the delay uniformly from [delay/2, delay] */
  jitter: boolean
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxRetries: 2,
  baseDelayMs: 1_000,
  maxDelayMs: 30_000,
  jitter: true,
}

/** Total attempts a task may make */
export function maxAttempts(policy: RetryPolicy): number {
  return policy.maxRetries + 1
}

/** Whether a transient failure on `attempt` (1-based) earns another attempt */
export function canRetry(attempt: number, policy: RetryPolicy): boolean {
  return attempt < maxAttempts(policy)
}

/**
 * Delay before the retry that follows failed attempt `attempt` (1-based):
 * `min(baseDelay * 2^(attempt-1), maxDelay)`, jittered when enabled.
 *
 * @param random - Source of uniform [0, 1) values
 */
export function backoffDelay(
  attempt: number,
  policy: RetryPolicy,
  random: () => number = Math.random,
): number {
  const exponential = policy.baseDelayMs * Math.pow(2, Math.max(0, attempt - 1))
  const capped = Math.min(exponential, policy.maxDelayMs)
  if (!policy.jitter) return capped
  const half = capped / 2
  return Math.round(half + random() * half)
}
