/**
 * SqliteArtifactSink — records each run in the run history database.
 */

import { PersistenceError } from '../../core/errors.js'
import type { DatabaseWrapper } from '../../persistence/database.js'
import { insertRun } from '../../persistence/queries/runs.js'
import { createLogger } from '../../utils/logger.js'
import type { ArtifactSink, RunArtifacts } from './artifact-sink.js'

const logger = createLogger('artifact-sink:sqlite')

export class SqliteArtifactSink implements ArtifactSink {
  readonly name = 'sqlite'
  private readonly _database: DatabaseWrapper

  constructor(database: DatabaseWrapper) {
    this._database = database
  }

  emit(artifacts: RunArtifacts): Promise<void> {
    const { summary, report } = artifacts
    try {
      insertRun(this._database.db, summary, report)
    } catch (err: unknown) {
      const msg = err instanceof Error ? err.message : String(err)
      return Promise.reject(
        new PersistenceError(`Failed to record run "${summary.runId}" in run history: ${msg}`, {
          path: this._database.path,
        }),
      )
    }
    logger.debug({ runId: summary.runId }, 'Run recorded')
    return Promise.resolve()
  }
}
