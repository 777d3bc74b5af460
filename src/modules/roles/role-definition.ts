/**
 * Role definitions — the declarative description of each analysis agent.
 */

import type {
  AgentResult,
  JsonValue,
  OmittedPrerequisite,
  Prerequisite,
  RoleName,
  UnavailableRole,
} from '../../core/types.js'
import type { DatasetSummary } from '../data/data-provider.js'
import type { InferenceParams } from '../inference/inference-client.js'

// ---------------------------------------------------------------------------
// Payloads
// ---------------------------------------------------------------------------

/** Everything a domain role sees for one attempt */
export interface RolePayload {
  role: RoleName
  attempt: number
  datasets: DatasetSummary[]
  /** Results of succeeded prerequisites, in declared order */
  prerequisites: AgentResult[]
  omitted: OmittedPrerequisite[]
}

/** Input of the synthesis role */
export interface SynthesisPayload {
  role: RoleName
  /** Succeeded domain results, in declared order */
  results: AgentResult[]
  unavailable: UnavailableRole[]
}

// ---------------------------------------------------------------------------
// Definitions
// ---------------------------------------------------------------------------

export interface RoleDefinition {
  role: RoleName
  title: string
  description: string
  /** A bare name is a mandatory prerequisite */
  prerequisites: readonly (RoleName | Prerequisite)[]
  /** Logical dataset names passed to the RawDataProvider */
  dataSources: readonly string[]
  /** Field of the parsed output holding the role's prose summary */
  summaryField?: string
  params: InferenceParams
  buildPrompt(payload: RolePayload): string
  parseOutput(text: string): JsonValue
}

export interface SynthesisRoleDefinition {
  role: RoleName
  title: string
  description: string
  params: InferenceParams
  buildPrompt(payload: SynthesisPayload): string
}

/** Per-role settings that can be layered over a definition */
export interface RoleOverride {
  enabled?: boolean
  /** Prerequisites of this role to treat as optional */
  optionalPrerequisites?: readonly RoleName[]
  temperature?: number
  maxTokens?: number
  model?: string
}
