/**
 * RunEvents interface — defines all typed events for the event bus.
 *
 * Event naming convention: {module}:{action} (e.g., "task:succeeded", "run:complete")
 */

import type { RoleName, RunId, RunStatus } from './types.js'

// ---------------------------------------------------------------------------
// Shared payload subtypes
// ---------------------------------------------------------------------------

/** Error payload for a failed attempt */
export interface TaskError {
  errorClass: string
  message: string
}

// ---------------------------------------------------------------------------
// RunEvents
// ---------------------------------------------------------------------------

/**
 * Complete typed map of all events emitted during a run.
 * Use `keyof RunEvents` to constrain event keys.
 */
export interface RunEvents {
  // -------------------------------------------------------------------------
  // Run lifecycle events
  // -------------------------------------------------------------------------

  /** Pre-flight passed and the scheduler is about to launch tasks */
  'run:started': { runId: RunId; roles: RoleName[] }

  /** The run was aborted through its signal */
  'run:cancelled': { runId: RunId; reason: string }

  /** Summary built and handed to the sinks */
  'run:complete': { runId: RunId; status: RunStatus; durationMs: number }

  // -------------------------------------------------------------------------
  // Task lifecycle events
  // -------------------------------------------------------------------------

  /** All prerequisites are terminal and the task may be launched */
  'task:ready': { runId: RunId; role: RoleName }

  /** An attempt took a pool slot */
  'task:started': { runId: RunId; role: RoleName; attempt: number }

  /** A transient failure was recorded and a retry is scheduled */
  'task:retrying': { runId: RunId; role: RoleName; attempt: number; delayMs: number; error: TaskError }

  'task:succeeded': { runId: RunId; role: RoleName; attempts: number; latencyMs: number }

  /** Terminal failure: permanent error or retries exhausted */
  'task:failed': { runId: RunId; role: RoleName; attempts: number; error: TaskError }

  /** Dependency unmet or run cancelled */
  'task:skipped': { runId: RunId; role: RoleName; reason: string }

  // -------------------------------------------------------------------------
  // Aggregation events
  // -------------------------------------------------------------------------

  'aggregation:started': { runId: RunId; role: RoleName; inputs: RoleName[] }

  'aggregation:retrying': { runId: RunId; attempt: number; delayMs: number; error: TaskError }

  'aggregation:succeeded': { runId: RunId; attempts: number }

  'aggregation:failed': { runId: RunId; attempts: number; message: string }
}
