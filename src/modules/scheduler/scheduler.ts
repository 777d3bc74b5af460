/**
 * Scheduler interface and shared types.
 *
 * The scheduler drives every task of a dependency graph from `waiting` to a
 * terminal state under a concurrency cap, a retry policy and a per-attempt
 * timeout. Per-task errors never escape it: they end up as failure records.
 */

import type {
  AgentResult,
  FailureRecord,
  OmittedPrerequisite,
  Prerequisite,
  RoleName,
  TaskState,
} from '../../core/types.js'
import type { RetryPolicy } from './retry-policy.js'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** What an executor receives for one attempt */
export interface TaskInput {
  role: RoleName
  attempt: number
  /** Results of succeeded prerequisites, in declared order */
  prerequisites: AgentResult[]
  /** Optional prerequisites whose results are missing */
  omitted: OmittedPrerequisite[]
}

/**
 * Runs one attempt of a role. Must honour `signal` where the underlying
 * client supports cancellation; a result delivered after abort is dropped.
 */
export type TaskExecutor = (input: TaskInput, signal: AbortSignal) => Promise<AgentResult>

export interface SchedulerOptions extends RetryPolicy {
  maxConcurrent: number
  taskTimeoutMs: number
  /** Uniform [0, 1) source used for jitter */
  random?: () => number
}

/** Mutable per-run record of one role's progress */
export interface AgentTask {
  role: RoleName
  prerequisites: readonly Prerequisite[]
  state: TaskState
  attempts: number
  lastError?: FailureRecord
  failures: FailureRecord[]
  omitted: OmittedPrerequisite[]
}

export interface SchedulerOutcome {
  /** Final task records in declaration order */
  tasks: AgentTask[]
  /** Every failure record in the order it was written */
  failures: FailureRecord[]
  cancelled: boolean
}

// ---------------------------------------------------------------------------
// Scheduler interface
// ---------------------------------------------------------------------------

export interface Scheduler {
  /**
   * Execute the graph once. Resolves when every task is terminal or the
   * signal aborts; never rejects for task-level failures.
   */
  run(signal?: AbortSignal): Promise<SchedulerOutcome>
}
