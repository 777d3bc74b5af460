/**
 * Unit tests for TypedEventBus.
 *
 * Covers:
 *  - Emit/subscribe with the typed payload
 *  - Unsubscribe removes handler
 *  - Multiple handlers for same event all invoked
 *  - Event dispatch is synchronous
 */

import { describe, it, expect, vi, beforeEach } from 'vitest'
import { TypedEventBusImpl, createEventBus } from '../event-bus.js'
import type { TypedEventBus } from '../event-bus.js'
import type { RunEvents } from '../event-bus.types.js'

describe('TypedEventBusImpl', () => {
  let bus: TypedEventBus

  beforeEach(() => {
    bus = new TypedEventBusImpl()
  })

  it('invokes handler when matching event is emitted', () => {
    const handler = vi.fn<(payload: RunEvents['task:succeeded']) => void>()
    bus.on('task:succeeded', handler)

    const payload: RunEvents['task:succeeded'] = { runId: 'r1', role: 'macro', attempts: 2, latencyMs: 1500 }
    bus.emit('task:succeeded', payload)

    expect(handler).toHaveBeenCalledOnce()
    expect(handler).toHaveBeenCalledWith(payload)
  })

  it('does not invoke handlers of other events', () => {
    const handler = vi.fn()
    bus.on('task:failed', handler)

    bus.emit('task:started', { runId: 'r1', role: 'macro', attempt: 1 })

    expect(handler).not.toHaveBeenCalled()
  })

  it('invokes every handler registered for an event', () => {
    const first = vi.fn()
    const second = vi.fn()
    bus.on('run:started', first)
    bus.on('run:started', second)

    bus.emit('run:started', { runId: 'r1', roles: ['macro', 'finance'] })

    expect(first).toHaveBeenCalledOnce()
    expect(second).toHaveBeenCalledOnce()
  })

  it('stops invoking a handler after off()', () => {
    const handler = vi.fn()
    bus.on('run:cancelled', handler)
    bus.off('run:cancelled', handler)

    bus.emit('run:cancelled', { runId: 'r1', reason: 'stop' })

    expect(handler).not.toHaveBeenCalled()
  })

  it('treats off() of an unknown handler as a no-op', () => {
    expect(() => {
      bus.off('run:complete', vi.fn())
    }).not.toThrow()
  })

  it('dispatches synchronously', () => {
    const order: string[] = []
    bus.on('aggregation:started', () => order.push('handler'))

    bus.emit('aggregation:started', { runId: 'r1', role: 'report', inputs: ['macro'] })
    order.push('after emit')

    expect(order).toEqual(['handler', 'after emit'])
  })
})

describe('createEventBus', () => {
  it('returns an independent bus per call', () => {
    const a = createEventBus()
    const b = createEventBus()
    const handler = vi.fn()
    a.on('task:ready', handler)

    b.emit('task:ready', { runId: 'r1', role: 'macro' })

    expect(handler).not.toHaveBeenCalled()
  })
})
