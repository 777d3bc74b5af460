/**
 * TypedEventBus — typed internal pub/sub for run and task lifecycle events.
 *
 * Built on top of Node.js EventEmitter.
 *
 * Key design constraints:
 *  - Event dispatch is SYNCHRONOUS — handlers run immediately when emit() is called.
 *  - No async/Promise-based dispatch; async work should be scheduled separately.
 *  - TypeScript `keyof` constraint enforces handler type safety at compile time.
 */

import { EventEmitter } from 'node:events'
import type { RunEvents } from './event-bus.types.js'

// ---------------------------------------------------------------------------
// TypedEventBus interface
// ---------------------------------------------------------------------------

/**
 * A typed publish-subscribe bus.
 *
 * All event names and payload types are enforced by the `RunEvents` map.
 */
export interface TypedEventBus {
  /**
   * Emit an event with a strongly-typed payload.
   * Dispatch is synchronous — all registered handlers run before emit() returns.
   */
  emit<K extends keyof RunEvents>(event: K, payload: RunEvents[K]): void

  on<K extends keyof RunEvents>(event: K, handler: (payload: RunEvents[K]) => void): void

  /** If the handler was not registered, this is a no-op. */
  off<K extends keyof RunEvents>(event: K, handler: (payload: RunEvents[K]) => void): void
}

// ---------------------------------------------------------------------------
// TypedEventBusImpl
// ---------------------------------------------------------------------------

/**
 * @example
 * const bus = new TypedEventBusImpl()
 * bus.on('task:succeeded', ({ role, attempts }) => {
 *   console.log(`${role} finished after ${attempts} attempt(s)`)
 * })
 */
export class TypedEventBusImpl implements TypedEventBus {
  private readonly _emitter: EventEmitter

  constructor() {
    this._emitter = new EventEmitter()
    this._emitter.setMaxListeners(100)
  }

  emit<K extends keyof RunEvents>(event: K, payload: RunEvents[K]): void {
    this._emitter.emit(event, payload)
  }

  on<K extends keyof RunEvents>(event: K, handler: (payload: RunEvents[K]) => void): void {
    // EventEmitter passes arguments as rest params; cast to satisfy TypeScript
    this._emitter.on(event, handler as (arg: unknown) => void)
  }

  off<K extends keyof RunEvents>(event: K, handler: (payload: RunEvents[K]) => void): void {
    this._emitter.off(event, handler as (arg: unknown) => void)
  }
}

// ---------------------------------------------------------------------------
// Factory function
// ---------------------------------------------------------------------------

export function createEventBus(): TypedEventBus {
  return new TypedEventBusImpl()
}
