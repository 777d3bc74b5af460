/**
 * Tests for the run history queries.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { DatabaseWrapper, IN_MEMORY } from '../../../src/persistence/database.js'
import { getRun, insertRun, listRuns } from '../../../src/persistence/queries/runs.js'
import type { RunSummary } from '../../../src/core/types.js'
import { makeSummary, report } from '../../helpers/run-fixtures.js'

describe('run history queries', () => {
  let database: DatabaseWrapper

  beforeEach(() => {
    database = new DatabaseWrapper(IN_MEMORY)
    database.open()
  })

  afterEach(() => {
    database.close()
  })

  describe('insertRun / getRun', () => {
    it('round-trips the run record', () => {
      insertRun(database.db, makeSummary(), report)
      const detail = getRun(database.db, '20240301-100000-abc123')

      expect(detail?.run).toEqual({
        id: '20240301-100000-abc123',
        status: 'completed_with_errors',
        selectedRoles: ['macro', 'finance', 'market'],
        startedAt: '2024-03-01T10:00:00.000Z',
        finishedAt: '2024-03-01T10:00:05.000Z',
        durationMs: 5000,
        cancelled: false,
        keyInsights: { macro: ['GDP up 5%'], finance: ['Margins are thin.'] },
      })
    })

    it('keeps task order and last errors', () => {
      insertRun(database.db, makeSummary(), report)
      const tasks = getRun(database.db, '20240301-100000-abc123')?.tasks

      expect(tasks).toEqual([
        { role: 'macro', state: 'succeeded', attempts: 1 },
        { role: 'finance', state: 'succeeded', attempts: 2 },
        {
          role: 'market',
          state: 'failed',
          attempts: 1,
          lastError: { errorClass: 'PermanentInferenceError', message: 'bad request' },
        },
      ])
    })

    it('restores results with their metrics', () => {
      insertRun(database.db, makeSummary(), report)
      const results = getRun(database.db, '20240301-100000-abc123')?.results ?? []

      expect(results.map((r) => r.role)).toEqual(['macro', 'finance'])
      expect(results[0].content).toEqual({
        macro_summary: 'GDP growth supports demand.',
        key_insights: ['GDP up 5%'],
      })
      expect(results[0].metrics).toEqual({ latencyMs: 1200, inputTokens: 800, outputTokens: 150, attempts: 1 })
      expect(results[1].metrics).toBeUndefined()
    })

    it('restores failures in insertion order', () => {
      insertRun(database.db, makeSummary(), report)
      const failures = getRun(database.db, '20240301-100000-abc123')?.failures ?? []
      expect(failures.map((f) => `${f.role}#${String(f.attempt)} ${f.errorClass}`)).toEqual([
        'finance#1 TransientInferenceError',
        'market#1 PermanentInferenceError',
      ])
    })

    it('stores the report', () => {
      insertRun(database.db, makeSummary(), report)
      expect(getRun(database.db, '20240301-100000-abc123')?.report).toEqual({
        role: 'report',
        content: '# Report\n\nAll good.',
        unavailable: [{ role: 'market', state: 'failed', errorClass: 'PermanentInferenceError' }],
        createdAt: '2024-03-01T10:00:05.000Z',
      })
    })

    it('stores an aggregation failure for a run without report', () => {
      const summary: RunSummary = makeSummary({
        runId: 'failed-run',
        status: 'failed',
        aggregationError: {
          errorClass: 'AggregationError',
          message: 'Aggregation failed after 3 attempt(s): rate limited',
          attempts: 3,
          cause: { errorClass: 'TransientInferenceError', message: 'rate limited' },
        },
      })
      delete summary.report
      insertRun(database.db, summary)

      const detail = getRun(database.db, 'failed-run')
      expect(detail?.report).toBeUndefined()
      expect(detail?.run.aggregationError?.attempts).toBe(3)
      expect(detail?.run.aggregationError?.cause?.message).toBe('rate limited')
    })

    it('returns undefined for an unknown run', () => {
      expect(getRun(database.db, 'nope')).toBeUndefined()
    })
  })

  describe('listRuns', () => {
    it('lists the most recent runs first, up to the limit', () => {
      insertRun(database.db, makeSummary({ runId: 'a', startedAt: '2024-03-01T09:00:00.000Z' }))
      insertRun(database.db, makeSummary({ runId: 'b', startedAt: '2024-03-01T11:00:00.000Z' }))
      insertRun(database.db, makeSummary({ runId: 'c', startedAt: '2024-03-01T10:00:00.000Z' }))

      expect(listRuns(database.db).map((r) => r.id)).toEqual(['b', 'c', 'a'])
      expect(listRuns(database.db, 2).map((r) => r.id)).toEqual(['b', 'c'])
    })
  })
})
