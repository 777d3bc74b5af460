/**
 * ArtifactSink — destination for everything a finished run produced.
 */

import type { AgentResult, ReportArtifact, RunSummary } from '../../core/types.js'
import type { RoleInput } from '../data/data-provider.js'

export interface RunArtifacts {
  summary: RunSummary
  /** Succeeded results in declared order */
  results: AgentResult[]
  report?: ReportArtifact
  /** Dataset summaries loaded by each role, used for chart specs */
  inputs: RoleInput[]
  enableCharts: boolean
}

export interface ArtifactSink {
  readonly name: string
  /** @throws {PersistenceError} when the artifacts could not be written */
  emit(artifacts: RunArtifacts): Promise<void>
}
