/**
 * Core types for sector-analyst
 * Shared type definitions used across all modules
 */

/** Name of an analysis role; unique within a run */
export type RoleName = string

/** Unique identifier for a run (`YYYYMMDD-HHmmss-<6 hex>`) */
export type RunId = string

/** State of an individual agent task */
export type TaskState =
  | 'waiting'
  | 'ready'
  | 'running'
  | 'succeeded'
  | 'failed'
  | 'skipped'

/** Overall status of a run */
export type RunStatus =
  | 'pending'
  | 'running'
  | 'completed'
  | 'completed_with_errors'
  | 'failed'

/** Severity level for log messages */
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal'

/** Any value that survives a JSON round trip */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue }

/** Terminal task states */
export const TERMINAL_STATES: ReadonlySet<TaskState> = new Set<TaskState>([
  'succeeded',
  'failed',
  'skipped',
])

export function isTerminal(state: TaskState): boolean {
  return TERMINAL_STATES.has(state)
}

/** A declared prerequisite edge */
export interface Prerequisite {
  role: RoleName
  /** Failure of an optional prerequisite does not block the dependent */
  optional: boolean
}

/** Optional observability metrics attached to a result */
export interface ResultMetrics {
  latencyMs?: number
  inputTokens?: number
  outputTokens?: number
  attempts?: number
}

/** Output of a successfully completed agent task */
export interface AgentResult {
  role: RoleName
  content: JsonValue
  rawText: string
  /** ISO-8601 */
  timestamp: string
  metrics?: ResultMetrics
}

/** One failed attempt (or skip) of a task */
export interface FailureRecord {
  role: RoleName
  attempt: number
  /** Name of the taxonomy class, e.g. `TransientInferenceError` */
  errorClass: string
  message: string
  timestamp: string
}

/** A prerequisite result left out of a dependent's payload */
export interface OmittedPrerequisite {
  role: RoleName
  reason: 'failed' | 'skipped' | 'not_selected'
}

/** Final state of one role, as reported in the run summary */
export interface RoleOutcome {
  role: RoleName
  state: TaskState
  attempts: number
  lastError?: { errorClass: string; message: string }
}

/** Metadata for a role whose content is absent from the report */
export interface UnavailableRole {
  role: RoleName
  state: TaskState
  errorClass?: string
}

/** Final synthesized output */
export interface ReportArtifact {
  role: RoleName
  content: string
  timestamp: string
  /** Copies of every result the report was built from, in declared order */
  sources: AgentResult[]
  unavailable: UnavailableRole[]
  metrics?: ResultMetrics
}

/** Serializable record of a failed aggregation */
export interface AggregationFailure {
  errorClass: 'AggregationError'
  message: string
  attempts: number
  cause?: { errorClass: string; message: string }
}

/** Everything the caller gets back from a run */
export interface RunSummary {
  runId: RunId
  status: RunStatus
  selectedRoles: RoleName[]
  startedAt: string
  finishedAt: string
  durationMs: number
  cancelled: boolean
  roles: RoleOutcome[]
  failures: FailureRecord[]
  results: AgentResult[]
  report?: ReportArtifact
  aggregationError?: AggregationFailure
  /** Set when an artifact sink failed after the run finished */
  persistenceError?: { errorClass: string; message: string }
  /** Up to five insights per succeeded role */
  keyInsights: Record<RoleName, string[]>
}
