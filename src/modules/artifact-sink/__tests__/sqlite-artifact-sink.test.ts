/**
 * Unit tests for SqliteArtifactSink
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { DatabaseWrapper, IN_MEMORY } from '../../../persistence/database.js'
import { getRun, listRuns } from '../../../persistence/queries/runs.js'
import { PersistenceError } from '../../../core/errors.js'
import { SqliteArtifactSink } from '../sqlite-artifact-sink.js'
import { makeArtifacts } from '../../../../test/helpers/run-fixtures.js'

describe('SqliteArtifactSink', () => {
  let database: DatabaseWrapper

  beforeEach(() => {
    database = new DatabaseWrapper(IN_MEMORY)
    database.open()
  })

  afterEach(() => {
    database.close()
  })

  it('records the run', async () => {
    const sink = new SqliteArtifactSink(database)
    await sink.emit(makeArtifacts())

    const runs = listRuns(database.db)
    expect(runs.map((r) => r.id)).toEqual(['20240301-100000-abc123'])

    const detail = getRun(database.db, '20240301-100000-abc123')
    expect(detail?.tasks.map((t) => t.state)).toEqual(['succeeded', 'succeeded', 'failed'])
    expect(detail?.report?.content).toBe('# Report\n\nAll good.')
  })

  it('rejects a second write of the same run with PersistenceError', async () => {
    const sink = new SqliteArtifactSink(database)
    await sink.emit(makeArtifacts())
    await expect(sink.emit(makeArtifacts())).rejects.toBeInstanceOf(PersistenceError)
    // The failed write left nothing behind
    expect(getRun(database.db, '20240301-100000-abc123')?.tasks).toHaveLength(3)
  })

  it('rejects with PersistenceError when the database is closed', async () => {
    const sink = new SqliteArtifactSink(database)
    database.close()
    await expect(sink.emit(makeArtifacts())).rejects.toThrow(
      'Failed to record run "20240301-100000-abc123" in run history: DatabaseWrapper: database is not open. Call open() first.',
    )
  })
})
