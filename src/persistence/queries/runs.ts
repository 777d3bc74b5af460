/**
 * Run history queries.
 *
 * All functions take a raw BetterSqlite3 database and use prepared
 * statements. JSON columns are validated on the way out.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import { z } from 'zod'
import type {
  AgentResult,
  AggregationFailure,
  FailureRecord,
  JsonValue,
  ReportArtifact,
  RunStatus,
  RunSummary,
  TaskState,
  UnavailableRole,
} from '../../core/types.js'
import { JsonValueSchema } from '../../modules/roles/output-parser.js'

// ---------------------------------------------------------------------------
// Row types
// ---------------------------------------------------------------------------

interface RunRow {
  id: string
  status: RunStatus
  selected_roles: string
  started_at: string
  finished_at: string
  duration_ms: number
  cancelled: number
  aggregation_error: string | null
  key_insights: string
}

interface RunTaskRow {
  role: string
  state: TaskState
  attempts: number
  last_error_class: string | null
  last_error: string | null
}

interface AgentResultRow {
  role: string
  content: string
  raw_text: string
  latency_ms: number | null
  input_tokens: number | null
  output_tokens: number | null
  attempts: number | null
  created_at: string
}

interface FailureRow {
  role: string
  attempt: number
  error_class: string
  message: string
  created_at: string
}

interface ReportRow {
  role: string
  content: string
  unavailable: string
  created_at: string
}

// ---------------------------------------------------------------------------
// Public shapes
// ---------------------------------------------------------------------------

export interface RunRecord {
  id: string
  status: RunStatus
  selectedRoles: string[]
  startedAt: string
  finishedAt: string
  durationMs: number
  cancelled: boolean
  aggregationError?: AggregationFailure
  keyInsights: Record<string, string[]>
}

export interface RunTaskRecord {
  role: string
  state: TaskState
  attempts: number
  lastError?: { errorClass: string; message: string }
}

export interface StoredReport {
  role: string
  content: string
  unavailable: UnavailableRole[]
  createdAt: string
}

export interface RunDetail {
  run: RunRecord
  tasks: RunTaskRecord[]
  results: AgentResult[]
  failures: FailureRecord[]
  report?: StoredReport
}

const RoleListSchema = z.array(z.string())
const KeyInsightsSchema = z.record(z.string(), z.array(z.string()))
const AggregationFailureSchema = z.object({
  errorClass: z.literal('AggregationError'),
  message: z.string(),
  attempts: z.number(),
  cause: z.object({ errorClass: z.string(), message: z.string() }).optional(),
})
const UnavailableSchema = z.array(
  z.object({
    role: z.string(),
    state: z.enum(['waiting', 'ready', 'running', 'succeeded', 'failed', 'skipped']),
    errorClass: z.string().optional(),
  }),
)

function parseJson<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, text: string, column: string): T {
  const result = schema.safeParse(JSON.parse(text))
  if (!result.success) {
    throw new Error(`Corrupt ${column} column: ${result.error.issues.map((i) => i.message).join('; ')}`)
  }
  return result.data
}

// ---------------------------------------------------------------------------
// Writes
// ---------------------------------------------------------------------------

/** Insert a finished run and everything it produced, atomically */
export function insertRun(db: BetterSqlite3Database, summary: RunSummary, report?: ReportArtifact): void {
  const insertRunRow = db.prepare(`
    INSERT INTO runs (id, status, selected_roles, started_at, finished_at, duration_ms, cancelled, aggregation_error, key_insights)
    VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
  `)
  const insertTask = db.prepare(`
    INSERT INTO run_tasks (run_id, role, state, attempts, last_error_class, last_error, position)
    VALUES (?, ?, ?, ?, ?, ?, ?)
  `)
  const insertResult = db.prepare(`
    INSERT INTO agent_results (run_id, role, content, raw_text, latency_ms, input_tokens, output_tokens, attempts, created_at)
    VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
  `)
  const insertFailure = db.prepare(`
    INSERT INTO failure_records (run_id, role, attempt, error_class, message, created_at)
    VALUES (?, ?, ?, ?, ?, ?)
  `)
  const insertReport = db.prepare(`
    INSERT INTO reports (run_id, role, content, unavailable, created_at) VALUES (?, ?, ?, ?, ?)
  `)

  db.transaction(() => {
    insertRunRow.run(
      summary.runId,
      summary.status,
      JSON.stringify(summary.selectedRoles),
      summary.startedAt,
      summary.finishedAt,
      summary.durationMs,
      summary.cancelled ? 1 : 0,
      summary.aggregationError !== undefined ? JSON.stringify(summary.aggregationError) : null,
      JSON.stringify(summary.keyInsights),
    )
    summary.roles.forEach((task, position) => {
      insertTask.run(
        summary.runId,
        task.role,
        task.state,
        task.attempts,
        task.lastError?.errorClass ?? null,
        task.lastError?.message ?? null,
        position,
      )
    })
    for (const r of summary.results) {
      insertResult.run(
        summary.runId,
        r.role,
        JSON.stringify(r.content),
        r.rawText,
        r.metrics?.latencyMs ?? null,
        r.metrics?.inputTokens ?? null,
        r.metrics?.outputTokens ?? null,
        r.metrics?.attempts ?? null,
        r.timestamp,
      )
    }
    for (const f of summary.failures) {
      insertFailure.run(summary.runId, f.role, f.attempt, f.errorClass, f.message, f.timestamp)
    }
    if (report !== undefined) {
      insertReport.run(summary.runId, report.role, report.content, JSON.stringify(report.unavailable), report.timestamp)
    }
  })()
}

// ---------------------------------------------------------------------------
// Reads
// ---------------------------------------------------------------------------

/** Most recent runs first */
export function listRuns(db: BetterSqlite3Database, limit = 20): RunRecord[] {
  const rows = db
    .prepare('SELECT * FROM runs ORDER BY started_at DESC, id DESC LIMIT ?')
    .all(limit) as RunRow[]
  return rows.map(toRunRecord)
}

export function getRun(db: BetterSqlite3Database, runId: string): RunDetail | undefined {
  const row = db.prepare('SELECT * FROM runs WHERE id = ?').get(runId) as RunRow | undefined
  if (row === undefined) return undefined

  const tasks = (
    db.prepare('SELECT * FROM run_tasks WHERE run_id = ? ORDER BY position').all(runId) as RunTaskRow[]
  ).map((t) => {
    const task: RunTaskRecord = { role: t.role, state: t.state, attempts: t.attempts }
    if (t.last_error_class !== null) {
      task.lastError = { errorClass: t.last_error_class, message: t.last_error ?? '' }
    }
    return task
  })

  const positions = new Map(tasks.map((t, i) => [t.role, i]))
  const results = (
    db.prepare('SELECT * FROM agent_results WHERE run_id = ?').all(runId) as AgentResultRow[]
  )
    .map(toAgentResult)
    .sort((a, b) => (positions.get(a.role) ?? 0) - (positions.get(b.role) ?? 0))

  const failures = (
    db.prepare('SELECT * FROM failure_records WHERE run_id = ? ORDER BY id').all(runId) as FailureRow[]
  ).map((f) => ({
    role: f.role,
    attempt: f.attempt,
    errorClass: f.error_class,
    message: f.message,
    timestamp: f.created_at,
  }))

  const reportRow = db.prepare('SELECT * FROM reports WHERE run_id = ?').get(runId) as ReportRow | undefined
  const detail: RunDetail = { run: toRunRecord(row), tasks, results, failures }
  if (reportRow !== undefined) {
    detail.report = {
      role: reportRow.role,
      content: reportRow.content,
      unavailable: parseJson(UnavailableSchema, reportRow.unavailable, 'reports.unavailable'),
      createdAt: reportRow.created_at,
    }
  }
  return detail
}

function toRunRecord(row: RunRow): RunRecord {
  const record: RunRecord = {
    id: row.id,
    status: row.status,
    selectedRoles: parseJson(RoleListSchema, row.selected_roles, 'runs.selected_roles'),
    startedAt: row.started_at,
    finishedAt: row.finished_at,
    durationMs: row.duration_ms,
    cancelled: row.cancelled === 1,
    keyInsights: parseJson(KeyInsightsSchema, row.key_insights, 'runs.key_insights'),
  }
  if (row.aggregation_error !== null) {
    record.aggregationError = parseJson(AggregationFailureSchema, row.aggregation_error, 'runs.aggregation_error')
  }
  return record
}

function toAgentResult(row: AgentResultRow): AgentResult {
  const content: JsonValue = parseJson(JsonValueSchema, row.content, 'agent_results.content')
  const result: AgentResult = { role: row.role, content, rawText: row.raw_text, timestamp: row.created_at }
  const metrics: NonNullable<AgentResult['metrics']> = {}
  if (row.latency_ms !== null) metrics.latencyMs = row.latency_ms
  if (row.input_tokens !== null) metrics.inputTokens = row.input_tokens
  if (row.output_tokens !== null) metrics.outputTokens = row.output_tokens
  if (row.attempts !== null) metrics.attempts = row.attempts
  if (Object.keys(metrics).length > 0) result.metrics = metrics
  return result
}
