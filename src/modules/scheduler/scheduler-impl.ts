/**
 * SchedulerImpl — event-driven execution of a dependency graph.
 *
 * Every state transition triggers a synchronous tick that:
 *  1. skips waiting tasks whose mandatory prerequisites failed or were skipped
 *  2. promotes waiting tasks with terminal prerequisites to `ready`
 *  3. launches ready tasks (not in backoff) by descending dependent count,
 *     then declaration order, until `maxConcurrent` attempts are in flight
 *
 * Bookkeeping never awaits, so the event loop serializes all access to task
 * state and the result store. Only the executor call is asynchronous.
 */

import type { Logger } from 'pino'
import { CancelledError, DependencyUnmetError } from '../../core/errors.js'
import type { TypedEventBus } from '../../core/event-bus.js'
import type {
  AgentResult,
  FailureRecord,
  OmittedPrerequisite,
  RoleName,
  RunId,
  TaskState,
} from '../../core/types.js'
import { isTerminal } from '../../core/types.js'
import { maskSecrets } from '../../utils/masking.js'
import { createLogger } from '../../utils/logger.js'
import type { DependencyGraph } from '../dependency-graph/dependency-graph.js'
import type { ResultStore } from '../result-store/result-store.js'
import { runAttempt } from './attempt.js'
import { classifyFailure } from './failure-classifier.js'
import { backoffDelay, canRetry } from './retry-policy.js'
import type {
  AgentTask,
  Scheduler,
  SchedulerOptions,
  SchedulerOutcome,
  TaskExecutor,
  TaskInput,
} from './scheduler.js'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface SchedulerDeps {
  graph: DependencyGraph
  store: ResultStore
  executor: TaskExecutor
  runId: RunId
  eventBus?: TypedEventBus
  logger?: Logger
}

// ---------------------------------------------------------------------------
// SchedulerImpl
// ---------------------------------------------------------------------------

export class SchedulerImpl implements Scheduler {
  private readonly _graph: DependencyGraph
  private readonly _store: ResultStore
  private readonly _executor: TaskExecutor
  private readonly _runId: RunId
  private readonly _eventBus: TypedEventBus | undefined
  private readonly _logger: Logger
  private readonly _options: SchedulerOptions
  private readonly _random: () => number

  private readonly _tasks = new Map<RoleName, AgentTask>()
  private readonly _states = new Map<RoleName, TaskState>()
  private readonly _backoff = new Map<RoleName, ReturnType<typeof setTimeout>>()
  private readonly _failures: FailureRecord[] = []
  private _running = 0
  private _started = false
  private _finished = false
  private _cancelled = false
  private _signal: AbortSignal | undefined
  private _resolve: ((outcome: SchedulerOutcome) => void) | undefined
  private _reject: ((err: unknown) => void) | undefined

  constructor(deps: SchedulerDeps, options: SchedulerOptions) {
    this._graph = deps.graph
    this._store = deps.store
    this._executor = deps.executor
    this._runId = deps.runId
    this._eventBus = deps.eventBus
    this._logger = deps.logger ?? createLogger('scheduler').child({ runId: deps.runId })
    this._options = options
    this._random = options.random ?? Math.random

    for (const role of this._graph.roles) {
      this._tasks.set(role, {
        role,
        prerequisites: this._graph.prerequisitesOf(role),
        state: 'waiting',
        attempts: 0,
        failures: [],
        omitted: [],
      })
      this._states.set(role, 'waiting')
    }
  }

  /** Number of attempts currently holding a pool slot */
  get runningCount(): number {
    return this._running
  }

  run(signal?: AbortSignal): Promise<SchedulerOutcome> {
    if (this._started) {
      return Promise.reject(new Error('Scheduler.run() may only be called once'))
    }
    this._started = true
    this._signal = signal

    return new Promise<SchedulerOutcome>((resolve, reject) => {
      this._resolve = resolve
      this._reject = reject

      if (signal?.aborted === true) {
        this._cancel(reasonOf(signal))
        return
      }
      signal?.addEventListener('abort', this._onAbort, { once: true })

      this._logger.debug(
        { roles: this._graph.roles, maxConcurrent: this._options.maxConcurrent },
        'Scheduler started',
      )
      this._tick()
    })
  }

  // -------------------------------------------------------------------------
  // Tick
  // -------------------------------------------------------------------------

  private _tick(): void {
    if (this._finished || this._cancelled) return

    this._skipBlocked()

    for (const role of this._graph.readySet(this._states)) {
      this._setState(role, 'ready')
      this._eventBus?.emit('task:ready', { runId: this._runId, role })
    }

    const candidates = this._graph.roles
      .filter((role) => this._states.get(role) === 'ready' && !this._backoff.has(role))
      .sort((a, b) => this._priority(a, b))

    for (const role of candidates) {
      if (this._running >= this._options.maxConcurrent) break
      this._launch(role)
    }

    if (this._allTerminal()) {
      this._finish()
    }
  }

  /** Descending transitive dependent count, then declaration order */
  private _priority(a: RoleName, b: RoleName): number {
    const byDependents = this._graph.dependentCount(b) - this._graph.dependentCount(a)
    if (byDependents !== 0) return byDependents
    return this._graph.indexOf(a) - this._graph.indexOf(b)
  }

  /** Skip waiting tasks with an unmet mandatory prerequisite, cascading */
  private _skipBlocked(): void {
    let changed = true
    while (changed) {
      changed = false
      for (const role of this._graph.roles) {
        if (this._states.get(role) !== 'waiting') continue
        const unmet = this._graph.blockedBy(role, this._states)
        if (unmet.length === 0) continue

        const error = new DependencyUnmetError(role, unmet)
        this._recordFailure(this._task(role), error.name, error.message)
        this._setState(role, 'skipped')
        this._eventBus?.emit('task:skipped', { runId: this._runId, role, reason: error.message })
        this._logger.warn({ role, unmet }, 'Task skipped: mandatory prerequisite did not succeed')
        changed = true
      }
    }
  }

  // -------------------------------------------------------------------------
  // Attempt lifecycle
  // -------------------------------------------------------------------------

  private _launch(role: RoleName): void {
    const task = this._task(role)
    task.attempts += 1
    const attempt = task.attempts
    this._setState(role, 'running')
    this._running += 1

    const input = this._buildInput(task, attempt)
    const startedAt = Date.now()
    this._eventBus?.emit('task:started', { runId: this._runId, role, attempt })
    this._logger.debug({ role, attempt, running: this._running }, 'Attempt started')

    runAttempt((signal) => this._executor(input, signal), {
      timeoutMs: this._options.taskTimeoutMs,
      signal: this._signal,
      label: `Role "${role}"`,
    })
      .then(
        (result) => {
          this._onSuccess(task, attempt, result, Date.now() - startedAt)
        },
        (err: unknown) => {
          this._onFailure(task, attempt, err)
        },
      )
      .catch((err: unknown) => {
        this._fail(err)
      })
  }

  private _buildInput(task: AgentTask, attempt: number): TaskInput {
    const prerequisites: AgentResult[] = []
    const omitted: OmittedPrerequisite[] = []

    for (const prereq of task.prerequisites) {
      const state = this._states.get(prereq.role)
      if (state === 'succeeded') {
        prerequisites.push(this._store.get(prereq.role))
      } else if (state === 'failed' || state === 'skipped') {
        omitted.push({ role: prereq.role, reason: state })
      }
    }
    for (const role of this._graph.excludedOptionalOf(task.role)) {
      omitted.push({ role, reason: 'not_selected' })
    }

    task.omitted = omitted
    return { role: task.role, attempt, prerequisites, omitted }
  }

  private _onSuccess(task: AgentTask, attempt: number, result: AgentResult, elapsedMs: number): void {
    // Late arrival after cancellation
    if (this._cancelled || task.state !== 'running') return

    const latencyMs = result.metrics?.latencyMs ?? elapsedMs
    this._store.put(task.role, {
      ...result,
      role: task.role,
      metrics: { ...result.metrics, latencyMs, attempts: attempt },
    })

    this._running -= 1
    delete task.lastError
    this._setState(task.role, 'succeeded')
    this._eventBus?.emit('task:succeeded', {
      runId: this._runId,
      role: task.role,
      attempts: attempt,
      latencyMs,
    })
    this._logger.info({ role: task.role, attempt, latencyMs }, 'Task succeeded')
    this._tick()
  }

  private _onFailure(task: AgentTask, attempt: number, err: unknown): void {
    if (this._cancelled || task.state !== 'running') return

    this._running -= 1
    const { kind, error } = classifyFailure(err)
    const record = this._recordFailure(task, error.name, error.message, attempt)
    const taskError = { errorClass: record.errorClass, message: record.message }

    if (kind === 'transient' && canRetry(attempt, this._options)) {
      const delayMs = backoffDelay(attempt, this._options, this._random)
      this._setState(task.role, 'ready')
      this._backoff.set(
        task.role,
        setTimeout(() => {
          this._backoff.delete(task.role)
          this._tick()
        }, delayMs),
      )
      this._eventBus?.emit('task:retrying', {
        runId: this._runId,
        role: task.role,
        attempt,
        delayMs,
        error: taskError,
      })
      this._logger.warn({ role: task.role, attempt, delayMs, err: taskError }, 'Transient failure, retrying')
    } else {
      this._setState(task.role, 'failed')
      this._eventBus?.emit('task:failed', {
        runId: this._runId,
        role: task.role,
        attempts: attempt,
        error: taskError,
      })
      this._logger.error({ role: task.role, attempt, kind, err: taskError }, 'Task failed')
    }

    this._tick()
  }

  // -------------------------------------------------------------------------
  // Cancellation and completion
  // -------------------------------------------------------------------------

  private readonly _onAbort = (): void => {
    if (this._signal !== undefined) this._cancel(reasonOf(this._signal))
  }

  private _cancel(reason: string): void {
    if (this._finished || this._cancelled) return
    this._cancelled = true

    for (const timer of this._backoff.values()) clearTimeout(timer)
    this._backoff.clear()

    for (const role of this._graph.roles) {
      const state = this._states.get(role)
      if (state === undefined || isTerminal(state)) continue
      const error = new CancelledError(`Run cancelled: ${reason}`)
      this._recordFailure(this._task(role), error.name, error.message)
      this._setState(role, 'skipped')
      this._eventBus?.emit('task:skipped', { runId: this._runId, role, reason: error.message })
    }
    // Abandoned attempts settle later and are discarded
    this._running = 0
    this._eventBus?.emit('run:cancelled', { runId: this._runId, reason })
    this._logger.warn({ reason }, 'Run cancelled')
    this._finish()
  }

  private _finish(): void {
    if (this._finished) return
    this._finished = true
    this._signal?.removeEventListener('abort', this._onAbort)

    const tasks = this._graph.roles.map((role) => {
      const task = this._task(role)
      return { ...task, failures: [...task.failures], omitted: [...task.omitted] }
    })
    this._resolve?.({ tasks, failures: [...this._failures], cancelled: this._cancelled })
  }

  /** Internal invariant broken (e.g. a duplicate store write); fail the run loudly */
  private _fail(err: unknown): void {
    if (this._finished) return
    this._finished = true
    for (const timer of this._backoff.values()) clearTimeout(timer)
    this._backoff.clear()
    this._signal?.removeEventListener('abort', this._onAbort)
    this._logger.error({ err }, 'Scheduler bookkeeping failed')
    this._reject?.(err)
  }

  // -------------------------------------------------------------------------
  // Helpers
  // -------------------------------------------------------------------------

  private _task(role: RoleName): AgentTask {
    const task = this._tasks.get(role)
    if (task === undefined) {
      throw new Error(`Unknown role "${role}" in scheduler`)
    }
    return task
  }

  private _setState(role: RoleName, state: TaskState): void {
    this._task(role).state = state
    this._states.set(role, state)
  }

  private _allTerminal(): boolean {
    for (const state of this._states.values()) {
      if (!isTerminal(state)) return false
    }
    return true
  }

  private _recordFailure(
    task: AgentTask,
    errorClass: string,
    message: string,
    attempt: number = task.attempts,
  ): FailureRecord {
    const record: FailureRecord = {
      role: task.role,
      attempt,
      errorClass,
      message: maskSecrets(message),
      timestamp: new Date().toISOString(),
    }
    task.failures.push(record)
    task.lastError = record
    this._failures.push(record)
    return record
  }
}

function reasonOf(signal: AbortSignal): string {
  const reason: unknown = signal.reason
  if (reason instanceof Error) return reason.message
  if (typeof reason === 'string') return reason
  return 'aborted'
}

// ---------------------------------------------------------------------------
// Factory function
// ---------------------------------------------------------------------------

export function createScheduler(deps: SchedulerDeps, options: SchedulerOptions): Scheduler {
  return new SchedulerImpl(deps, options)
}
