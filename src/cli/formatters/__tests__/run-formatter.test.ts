import { describe, it, expect } from 'vitest'
import { formatProgressLine, formatRunList, formatRunSummary } from '../run-formatter.js'
import { makeSummary } from '../../../../test/helpers/run-fixtures.js'

describe('formatProgressLine', () => {
  it('prefixes the role with its state mark', () => {
    expect(formatProgressLine('macro', 'succeeded', '(1 attempt(s), 1.2s)')).toBe('  ✓ macro (1 attempt(s), 1.2s)')
    expect(formatProgressLine('market', 'failed')).toBe('  ✗ market')
    expect(formatProgressLine('forecast', 'skipped', 'dependency unmet')).toBe('  - forecast dependency unmet')
  })
})

describe('formatRunSummary', () => {
  it('renders the header, role table, report sources and artifact location', () => {
    const lines = formatRunSummary(makeSummary(), '/tmp/out/run-1').split('\n')

    expect(lines.slice(0, 5)).toEqual([
      '',
      'Run 20240301-100000-abc123: completed_with_errors in 5.0s',
      '',
      'Role    | State     | Attempts | Last error',
      `--------+-----------+----------+-${'-'.repeat(36)}`,
    ])
    expect(lines).toContain('macro   | succeeded | 1        |')
    expect(lines).toContain('market  | failed    | 1        | PermanentInferenceError: bad request')
    expect(lines.slice(-3)).toEqual(['Report: synthesized from macro, finance', 'Artifacts: /tmp/out/run-1', ''])
  })

  it('explains a missing report', () => {
    const summary = makeSummary({
      status: 'failed',
      report: undefined,
      aggregationError: { errorClass: 'AggregationError', message: 'no domain role produced a result', attempts: 0 },
    })

    expect(formatRunSummary(summary)).toContain('\nReport: not produced (no domain role produced a result)\n')
  })

  it('warns instead of pointing at artifacts that were not saved', () => {
    const summary = makeSummary({ persistenceError: { errorClass: 'PersistenceError', message: 'disk full' } })
    const output = formatRunSummary(summary, '/tmp/out/run-1')

    expect(output).not.toContain('Artifacts:')
    expect(output.endsWith('Warning: artifacts were not fully saved: disk full\n')).toBe(true)
  })

  it('marks cancelled runs', () => {
    const summary = makeSummary({ status: 'failed', cancelled: true })

    expect(formatRunSummary(summary).split('\n')[1]).toBe('Run 20240301-100000-abc123: failed (cancelled) in 5.0s')
  })
})

describe('formatRunList', () => {
  it('says so when there is no history', () => {
    expect(formatRunList([])).toBe('No runs recorded yet.\n')
  })
})
