/**
 * NDJSON event stream for `analyze --output-format json`.
 *
 * Each event follows: {"event":"<name>","timestamp":"<ISO8601>","data":{...}}
 */

import type { TypedEventBus } from '../../core/event-bus.js'
import type { RunEvents } from '../../core/event-bus.types.js'

/** Every event forwarded to the stream */
export const STREAMED_EVENTS: readonly (keyof RunEvents)[] = [
  'run:started',
  'run:cancelled',
  'run:complete',
  'task:ready',
  'task:started',
  'task:retrying',
  'task:succeeded',
  'task:failed',
  'task:skipped',
  'aggregation:started',
  'aggregation:retrying',
  'aggregation:succeeded',
  'aggregation:failed',
]

/**
 * Write a single NDJSON event to stdout.
 *
 * @param event - Event name (e.g. "task:started")
 * @param data  - Event payload data
 */
export function emitEvent(event: string, data: object): void {
  const line = JSON.stringify({
    event,
    timestamp: new Date().toISOString(),
    data,
  })
  process.stdout.write(line + '\n')
}

/** Forward every run event on `bus` to stdout as NDJSON */
export function streamEvents(bus: TypedEventBus): void {
  for (const event of STREAMED_EVENTS) {
    bus.on(event, (payload) => {
      emitEvent(event, payload)
    })
  }
}
