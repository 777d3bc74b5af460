/**
 * Unit tests for failure classification
 */

import { describe, it, expect } from 'vitest'
import { classifyFailure } from '../failure-classifier.js'
import {
  CancelledError,
  InputNotFoundError,
  PermanentInferenceError,
  TransientInferenceError,
} from '../../../core/errors.js'

class HttpError extends Error {
  constructor(message: string, public readonly status: number) {
    super(message)
  }
}

describe('classifyFailure', () => {
  it('keeps taxonomy errors as they are', () => {
    const transient = new TransientInferenceError('busy')
    expect(classifyFailure(transient)).toEqual({ kind: 'transient', error: transient })
    const permanent = new PermanentInferenceError('bad request')
    expect(classifyFailure(permanent)).toEqual({ kind: 'permanent', error: permanent })
  })

  it('treats other analyst errors as permanent', () => {
    expect(classifyFailure(new InputNotFoundError('macro')).kind).toBe('permanent')
    expect(classifyFailure(new CancelledError()).kind).toBe('permanent')
  })

  it.each([408, 429, 500, 503])('classifies HTTP status %i as transient', (status) => {
    const { kind, error } = classifyFailure(new HttpError('upstream said no', status))
    expect(kind).toBe('transient')
    expect(error).toBeInstanceOf(TransientInferenceError)
    expect(error.context.status).toBe(status)
  })

  it.each([400, 401, 403, 404, 422])('classifies HTTP status %i as permanent', (status) => {
    const { kind, error } = classifyFailure(new HttpError('rejected', status))
    expect(kind).toBe('permanent')
    expect(error).toBeInstanceOf(PermanentInferenceError)
  })

  it.each([
    'Request timed out',
    'rate limit exceeded',
    'read ECONNRESET',
    'connect ECONNREFUSED 127.0.0.1:443',
    'socket hang up',
  ])('classifies "%s" as transient', (message) => {
    expect(classifyFailure(new Error(message)).kind).toBe('transient')
  })

  it('uses a network error code when the message is generic', () => {
    const err = Object.assign(new Error('request failed'), { code: 'ETIMEDOUT' })
    expect(classifyFailure(err).kind).toBe('transient')
  })

  it('defaults unknown errors to permanent and keeps the message', () => {
    const { kind, error } = classifyFailure(new Error('invalid credentials'))
    expect(kind).toBe('permanent')
    expect(error.name).toBe('PermanentInferenceError')
    expect(error.message).toBe('invalid credentials')
  })

  it('handles non-Error throwables', () => {
    const { kind, error } = classifyFailure('boom')
    expect(kind).toBe('permanent')
    expect(error.message).toBe('boom')
  })
})
