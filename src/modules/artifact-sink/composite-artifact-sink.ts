/**
 * CompositeArtifactSink — fans a run out to several sinks. Every sink is
 * tried; failures are collected into one PersistenceError.
 */

import { PersistenceError } from '../../core/errors.js'
import { createLogger } from '../../utils/logger.js'
import type { ArtifactSink, RunArtifacts } from './artifact-sink.js'

const logger = createLogger('artifact-sink')

export class CompositeArtifactSink implements ArtifactSink {
  readonly name: string
  private readonly _sinks: readonly ArtifactSink[]

  constructor(sinks: readonly ArtifactSink[]) {
    this._sinks = sinks
    this.name = sinks.map((s) => s.name).join('+')
  }

  async emit(artifacts: RunArtifacts): Promise<void> {
    const failures: { sink: string; message: string }[] = []
    for (const sink of this._sinks) {
      try {
        await sink.emit(artifacts)
      } catch (err: unknown) {
        const message = err instanceof Error ? err.message : String(err)
        logger.error({ sink: sink.name, runId: artifacts.summary.runId, err }, 'Artifact sink failed')
        failures.push({ sink: sink.name, message })
      }
    }
    if (failures.length > 0) {
      throw new PersistenceError(
        `${String(failures.length)} of ${String(this._sinks.length)} artifact sink(s) failed: ${failures
          .map((f) => `${f.sink}: ${f.message}`)
          .join('; ')}`,
        { failures },
      )
    }
  }
}
