/**
 * Single bounded attempt: races an async call against its timeout and the
 * run's cancellation signal.
 */

import { CancelledError, TransientInferenceError } from '../../core/errors.js'

export interface AttemptOptions {
  timeoutMs: number
  /** Run-level cancellation */
  signal?: AbortSignal
  /** Used in the timeout message, e.g. `Role "macro"` */
  label?: string
}

/**
 * Run `fn` with a per-attempt AbortSignal.
 *
 * Rejects with TransientInferenceError when `timeoutMs` elapses and with
 * CancelledError when `options.signal` aborts. In both cases the signal
 * handed to `fn` is aborted too; a late result from `fn` is discarded.
 */
export function runAttempt<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  options: AttemptOptions,
): Promise<T> {
  const controller = new AbortController()
  const label = options.label ?? 'Attempt'

  return new Promise<T>((resolve, reject) => {
    let settled = false

    const settle = (): boolean => {
      if (settled) return false
      settled = true
      clearTimeout(timer)
      options.signal?.removeEventListener('abort', onAbort)
      return true
    }

    const onAbort = (): void => {
      if (!settle()) return
      const err = new CancelledError(`${label} cancelled`)
      controller.abort(err)
      reject(err)
    }

    const timer = setTimeout(() => {
      if (!settle()) return
      const err = new TransientInferenceError(
        `${label} timed out after ${String(options.timeoutMs)}ms`,
        { timeoutMs: options.timeoutMs },
      )
      controller.abort(err)
      reject(err)
    }, options.timeoutMs)

    if (options.signal?.aborted === true) {
      onAbort()
      return
    }
    options.signal?.addEventListener('abort', onAbort, { once: true })

    let pending: Promise<T>
    try {
      pending = fn(controller.signal)
    } catch (err) {
      if (settle()) reject(err)
      return
    }

    pending.then(
      (value) => {
        if (settle()) resolve(value)
      },
      (err: unknown) => {
        if (settle()) reject(err)
      },
    )
  })
}
