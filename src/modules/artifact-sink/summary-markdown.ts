/**
 * Markdown rendering of a run summary (`summary.md`).
 */

import type { RunSummary } from '../../core/types.js'
import { formatDuration } from '../../utils/helpers.js'

function cell(text: string): string {
  return text.replace(/\|/g, '\\|').replace(/\s*\n\s*/g, ' ')
}

export function renderSummaryMarkdown(summary: RunSummary): string {
  const lines: string[] = [
    `# Run ${summary.runId}`,
    '',
    `- Status: ${summary.status}`,
    `- Started: ${summary.startedAt}`,
    `- Finished: ${summary.finishedAt}`,
    `- Duration: ${formatDuration(summary.durationMs)}`,
  ]
  if (summary.cancelled) lines.push('- Cancelled: yes')

  lines.push('', '## Roles', '', '| Role | State | Attempts | Last error |', '| --- | --- | --- | --- |')
  for (const role of summary.roles) {
    const error = role.lastError !== undefined ? `${role.lastError.errorClass}: ${role.lastError.message}` : ''
    lines.push(`| ${role.role} | ${role.state} | ${String(role.attempts)} | ${cell(error)} |`)
  }

  lines.push('', '## Failures', '')
  if (summary.failures.length === 0) {
    lines.push('None.')
  } else {
    for (const f of summary.failures) {
      lines.push(`- ${f.role} (attempt ${String(f.attempt)}): ${f.errorClass}: ${cell(f.message)}`)
    }
  }

  lines.push('', '## Report', '')
  if (summary.report !== undefined) {
    lines.push(`Synthesized by \`${summary.report.role}\` from ${summary.report.sources.map((s) => s.role).join(', ')}.`)
  } else if (summary.aggregationError !== undefined) {
    lines.push(`Not produced: ${cell(summary.aggregationError.message)}`)
  }

  const digest = Object.entries(summary.keyInsights).filter(([, insights]) => insights.length > 0)
  if (digest.length > 0) {
    lines.push('', '## Key insights')
    for (const [role, insights] of digest) {
      lines.push('', `### ${role}`, '', ...insights.map((i) => `- ${cell(i)}`))
    }
  }

  return `${lines.join('\n')}\n`
}
