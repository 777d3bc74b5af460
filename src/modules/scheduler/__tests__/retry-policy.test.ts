/**
 * Unit tests for backoff arithmetic
 */

import { describe, it, expect } from 'vitest'
import { backoffDelay, canRetry, maxAttempts } from '../retry-policy.js'
import type { RetryPolicy } from '../retry-policy.js'

const policy: RetryPolicy = { maxRetries: 2, baseDelayMs: 100, maxDelayMs: 350, jitter: false }

describe('backoffDelay', () => {
  it('doubles from the base delay per attempt', () => {
    expect(backoffDelay(1, policy)).toBe(100)
    expect(backoffDelay(2, policy)).toBe(200)
  })

  it('caps at maxDelay', () => {
    expect(backoffDelay(3, policy)).toBe(350)
    expect(backoffDelay(10, policy)).toBe(350)
  })

  it('jitters uniformly within [delay/2, delay]', () => {
    const jittered = { ...policy, jitter: true }
    expect(backoffDelay(2, jittered, () => 0)).toBe(100)
    expect(backoffDelay(2, jittered, () => 0.5)).toBe(150)
    expect(backoffDelay(2, jittered, () => 0.999)).toBe(200)
  })
})

describe('attempt budget', () => {
  it('allows maxRetries + 1 attempts in total', () => {
    expect(maxAttempts(policy)).toBe(3)
    expect(canRetry(1, policy)).toBe(true)
    expect(canRetry(2, policy)).toBe(true)
    expect(canRetry(3, policy)).toBe(false)
  })

  it('never retries with maxRetries = 0', () => {
    expect(canRetry(1, { ...policy, maxRetries: 0 })).toBe(false)
  })
})
