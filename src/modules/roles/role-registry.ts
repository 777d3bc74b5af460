/**
 * RoleRegistry — ordered table of domain role definitions plus the single
 * synthesis role.
 */

import { ConfigurationError } from '../../core/errors.js'
import type { Prerequisite, RoleName } from '../../core/types.js'
import { DependencyGraph } from '../dependency-graph/dependency-graph.js'
import type { InferenceParams } from '../inference/inference-client.js'
import type { RoleDefinition, RoleOverride, SynthesisRoleDefinition } from './role-definition.js'

export class RoleRegistry {
  private readonly _roles: Map<RoleName, RoleDefinition>
  private readonly _synthesis: SynthesisRoleDefinition

  constructor(roles: readonly RoleDefinition[], synthesis: SynthesisRoleDefinition) {
    const issues: string[] = []
    this._roles = new Map()
    for (const def of roles) {
      if (this._roles.has(def.role)) issues.push(`Role "${def.role}" is registered more than once`)
      else this._roles.set(def.role, def)
    }
    if (this._roles.has(synthesis.role)) {
      issues.push(`Synthesis role "${synthesis.role}" clashes with a domain role`)
    }
    if (issues.length > 0) {
      throw new ConfigurationError('Invalid role registry', issues)
    }
    this._synthesis = synthesis
  }

  /** Domain role names in declaration order */
  get roles(): RoleName[] {
    return [...this._roles.keys()]
  }

  get definitions(): RoleDefinition[] {
    return [...this._roles.values()]
  }

  get synthesis(): SynthesisRoleDefinition {
    return this._synthesis
  }

  has(role: RoleName): boolean {
    return this._roles.has(role)
  }

  /** @throws {ConfigurationError} for an unregistered role */
  get(role: RoleName): RoleDefinition {
    const def = this._roles.get(role)
    if (def === undefined) {
      throw new ConfigurationError(`Unknown role "${role}"`, [], { known: this.roles })
    }
    return def
  }

  /**
   * Validated dependency graph of the domain roles.
   * @throws {ConfigurationError} on cycles or unknown prerequisites
   */
  graph(): DependencyGraph {
    return DependencyGraph.fromDeclarations(
      this.definitions.map((def) => ({ role: def.role, prerequisites: def.prerequisites })),
    )
  }

  /** Logical datasets per role, for the data provider */
  datasetsByRole(): Record<RoleName, string[]> {
    const out: Record<RoleName, string[]> = {}
    for (const def of this._roles.values()) out[def.role] = [...def.dataSources]
    return out
  }

  /**
   * A new registry with per-role settings applied. Disabled roles are
   * removed, and optional edges pointing at them are dropped; a mandatory
   * edge to a disabled role surfaces later as an unknown prerequisite.
   */
  withOverrides(overrides: Readonly<Record<RoleName, RoleOverride>>): RoleRegistry {
    const unknown = Object.keys(overrides).filter(
      (role) => !this.has(role) && role !== this._synthesis.role,
    )
    if (unknown.length > 0) {
      throw new ConfigurationError(
        'Role settings name unknown roles',
        unknown.map((r) => `"${r}" is not a registered role`),
      )
    }

    const disabled = new Set(
      Object.entries(overrides)
        .filter(([, o]) => o.enabled === false)
        .map(([role]) => role),
    )

    const roles = this.definitions
      .filter((def) => !disabled.has(def.role))
      .map((def) => applyOverride(def, overrides[def.role] ?? {}, disabled))

    const synthOverride = overrides[this._synthesis.role]
    const synthesis =
      synthOverride === undefined
        ? this._synthesis
        : { ...this._synthesis, params: mergeParams(this._synthesis.params, synthOverride) }

    return new RoleRegistry(roles, synthesis)
  }
}

function applyOverride(def: RoleDefinition, override: RoleOverride, disabled: ReadonlySet<RoleName>): RoleDefinition {
  const optional = new Set(override.optionalPrerequisites ?? [])
  const prerequisites: Prerequisite[] = def.prerequisites
    .map((p) => (typeof p === 'string' ? { role: p, optional: false } : { ...p }))
    .map((p) => (optional.has(p.role) ? { ...p, optional: true } : p))
    .filter((p) => !(p.optional && disabled.has(p.role)))
  return { ...def, prerequisites, params: mergeParams(def.params, override) }
}

function mergeParams(params: InferenceParams, override: RoleOverride): InferenceParams {
  const merged = { ...params }
  if (override.temperature !== undefined) merged.temperature = override.temperature
  if (override.maxTokens !== undefined) merged.maxTokens = override.maxTokens
  if (override.model !== undefined) merged.model = override.model
  return merged
}
