/**
 * Human-readable output for the analyze, roles and runs commands.
 */

import type { RunSummary, TaskState } from '../../core/types.js'
import type { DependencyGraph } from '../../modules/dependency-graph/dependency-graph.js'
import type { RoleRegistry } from '../../modules/roles/role-registry.js'
import type { RunDetail, RunRecord } from '../../persistence/queries/runs.js'
import { formatDuration } from '../../utils/helpers.js'
import { formatTable } from '../utils/formatting.js'

const STATE_MARKS: Record<TaskState, string> = {
  waiting: '·',
  ready: '·',
  running: '…',
  succeeded: '✓',
  failed: '✗',
  skipped: '-',
}

// ---------------------------------------------------------------------------
// Progress lines
// ---------------------------------------------------------------------------

export function formatProgressLine(role: string, state: TaskState, detail?: string): string {
  return `  ${STATE_MARKS[state]} ${role}${detail !== undefined ? ` ${detail}` : ''}`
}

// ---------------------------------------------------------------------------
// Run summary
// ---------------------------------------------------------------------------

/**
 * Final report of an `analyze` run.
 * @param artifactsDir - where the file sink wrote the artifacts, when it ran
 */
export function formatRunSummary(summary: RunSummary, artifactsDir?: string): string {
  const lines: string[] = [
    '',
    `Run ${summary.runId}: ${summary.status}${summary.cancelled ? ' (cancelled)' : ''} in ${formatDuration(summary.durationMs)}`,
    '',
  ]

  lines.push(
    formatTable(
      ['Role', 'State', 'Attempts', 'Last error'],
      summary.roles.map((r) => ({
        role: r.role,
        state: r.state,
        attempts: String(r.attempts),
        error: r.lastError !== undefined ? `${r.lastError.errorClass}: ${r.lastError.message}` : '',
      })),
      ['role', 'state', 'attempts', 'error'],
    ),
  )

  lines.push('')
  if (summary.report !== undefined) {
    lines.push(`Report: synthesized from ${summary.report.sources.map((s) => s.role).join(', ')}`)
  } else if (summary.aggregationError !== undefined) {
    lines.push(`Report: not produced (${summary.aggregationError.message})`)
  }
  if (artifactsDir !== undefined && summary.persistenceError === undefined) {
    lines.push(`Artifacts: ${artifactsDir}`)
  }
  if (summary.persistenceError !== undefined) {
    lines.push(`Warning: artifacts were not fully saved: ${summary.persistenceError.message}`)
  }

  return lines.join('\n') + '\n'
}

// ---------------------------------------------------------------------------
// Roles
// ---------------------------------------------------------------------------

/** Roles of `graph` in execution order, followed by the synthesis role */
export function formatRolesTable(registry: RoleRegistry, graph: DependencyGraph): string {
  const datasets = registry.datasetsByRole()
  const rows = graph.topologicalOrder().map((role) => ({
    role,
    prerequisites:
      graph
        .prerequisitesOf(role)
        .map((p) => (p.optional ? `${p.role}?` : p.role))
        .join(', ') || '-',
    datasets: (datasets[role] ?? []).join(', ') || '-',
    description: registry.get(role).description,
  }))
  rows.push({
    role: registry.synthesis.role,
    prerequisites: 'all of the above',
    datasets: '-',
    description: registry.synthesis.description,
  })
  return (
    formatTable(
      ['Role', 'Prerequisites', 'Datasets', 'Description'],
      rows,
      ['role', 'prerequisites', 'datasets', 'description'],
    ) + '\n\n? optional prerequisite\n'
  )
}

// ---------------------------------------------------------------------------
// Run history
// ---------------------------------------------------------------------------

export function formatRunList(runs: readonly RunRecord[]): string {
  if (runs.length === 0) return 'No runs recorded yet.\n'
  return (
    formatTable(
      ['Run', 'Status', 'Started', 'Duration', 'Roles'],
      runs.map((r) => ({
        id: r.id,
        status: r.cancelled ? `${r.status} (cancelled)` : r.status,
        started: r.startedAt,
        duration: formatDuration(r.durationMs),
        roles: r.selectedRoles.join(', '),
      })),
      ['id', 'status', 'started', 'duration', 'roles'],
    ) + '\n'
  )
}

export function formatRunDetail(detail: RunDetail): string {
  const { run } = detail
  const lines: string[] = [
    `Run ${run.id}`,
    `  Status:   ${run.status}${run.cancelled ? ' (cancelled)' : ''}`,
    `  Started:  ${run.startedAt}`,
    `  Finished: ${run.finishedAt}`,
    `  Duration: ${formatDuration(run.durationMs)}`,
    '',
    formatTable(
      ['Role', 'State', 'Attempts', 'Last error'],
      detail.tasks.map((t) => ({
        role: t.role,
        state: t.state,
        attempts: String(t.attempts),
        error: t.lastError !== undefined ? `${t.lastError.errorClass}: ${t.lastError.message}` : '',
      })),
      ['role', 'state', 'attempts', 'error'],
    ),
  ]

  if (detail.failures.length > 0) {
    lines.push('', 'Failures:')
    for (const f of detail.failures) {
      lines.push(`  ${f.role} attempt ${String(f.attempt)}: ${f.errorClass}: ${f.message}`)
    }
  }

  const insights = Object.entries(run.keyInsights).filter(([, list]) => list.length > 0)
  if (insights.length > 0) {
    lines.push('', 'Key insights:')
    for (const [role, list] of insights) {
      lines.push(`  ${role}:`, ...list.map((i) => `    - ${i}`))
    }
  }

  lines.push('')
  if (detail.report !== undefined) {
    lines.push(detail.report.content)
  } else if (run.aggregationError !== undefined) {
    lines.push(`No report: ${run.aggregationError.message}`)
  }

  return lines.join('\n') + '\n'
}
