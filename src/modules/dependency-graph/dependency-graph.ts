/**
 * DependencyGraph — validated, immutable declaration of role prerequisites.
 *
 * Construction rejects duplicate roles, self-dependencies, unknown
 * prerequisites and cycles with a single ConfigurationError listing every
 * problem. All queries are pure functions of the declaration and the
 * task-state map passed in by the scheduler.
 */

import { ConfigurationError } from '../../core/errors.js'
import type { Prerequisite, RoleName, TaskState } from '../../core/types.js'
import { isTerminal } from '../../core/types.js'
import { detectCycle, validatePrerequisites } from './dependency-resolver.js'
import type { PrerequisiteMap } from './dependency-resolver.js'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** One role's entry in a graph declaration; a bare name means mandatory */
export interface RoleDeclaration {
  role: RoleName
  prerequisites: readonly (RoleName | Prerequisite)[]
}

/** Read-only task states keyed by role */
export type TaskStates = ReadonlyMap<RoleName, TaskState>

// ---------------------------------------------------------------------------
// DependencyGraph
// ---------------------------------------------------------------------------

export class DependencyGraph {
  private readonly _order: RoleName[]
  private readonly _prerequisites: Map<RoleName, Prerequisite[]>
  private readonly _dependents: Map<RoleName, RoleName[]>
  private readonly _excludedOptional: Map<RoleName, RoleName[]>
  private readonly _dependentCounts = new Map<RoleName, number>()

  private constructor(
    order: RoleName[],
    prerequisites: Map<RoleName, Prerequisite[]>,
    excludedOptional: Map<RoleName, RoleName[]> = new Map(),
  ) {
    this._order = order
    this._prerequisites = prerequisites
    this._excludedOptional = excludedOptional
    this._dependents = new Map(order.map((role) => [role, []]))
    for (const role of order) {
      for (const prereq of prerequisites.get(role) ?? []) {
        this._dependents.get(prereq.role)?.push(role)
      }
    }
  }

  /**
   * Build and validate a graph from declarations, keeping declaration order.
   * @throws {ConfigurationError} listing every structural problem found
   */
  static fromDeclarations(declarations: readonly RoleDeclaration[]): DependencyGraph {
    const issues: string[] = []
    const order: RoleName[] = []
    const prerequisites = new Map<RoleName, Prerequisite[]>()

    for (const decl of declarations) {
      if (prerequisites.has(decl.role)) {
        issues.push(`Role "${decl.role}" is declared more than once`)
        continue
      }
      order.push(decl.role)
      prerequisites.set(
        decl.role,
        decl.prerequisites.map((p) => (typeof p === 'string' ? { role: p, optional: false } : { ...p })),
      )
    }

    const adjacency: PrerequisiteMap = {}
    for (const role of order) {
      adjacency[role] = (prerequisites.get(role) ?? []).map((p) => p.role)
    }

    issues.push(...validatePrerequisites(adjacency))
    const cycle = detectCycle(adjacency)
    if (cycle !== null) {
      issues.push(`Dependency cycle detected: ${cycle.join(' -> ')}`)
    }

    if (issues.length > 0) {
      throw new ConfigurationError('Invalid role dependency graph', issues)
    }

    return new DependencyGraph(order, prerequisites)
  }

  /** Roles in declaration order */
  get roles(): readonly RoleName[] {
    return this._order
  }

  has(role: RoleName): boolean {
    return this._prerequisites.has(role)
  }

  /** Position of a role in declaration order, or -1 */
  indexOf(role: RoleName): number {
    return this._order.indexOf(role)
  }

  prerequisitesOf(role: RoleName): readonly Prerequisite[] {
    return this._prerequisites.get(role) ?? []
  }

  /** Optional prerequisites declared upstream but left out of this (sub)graph */
  excludedOptionalOf(role: RoleName): readonly RoleName[] {
    return this._excludedOptional.get(role) ?? []
  }

  /** Direct dependents, in declaration order */
  dependentsOf(role: RoleName): readonly RoleName[] {
    return this._dependents.get(role) ?? []
  }

  // -------------------------------------------------------------------------
  // State queries
  // -------------------------------------------------------------------------

  /**
   * Roles still `waiting` whose prerequisites have all reached a terminal
   * state, in declaration order. O(edges).
   */
  readySet(states: TaskStates): RoleName[] {
    const ready: RoleName[] = []
    for (const role of this._order) {
      if (states.get(role) !== 'waiting') continue
      const prereqs = this._prerequisites.get(role) ?? []
      if (prereqs.every((p) => isTerminalState(states.get(p.role)))) {
        ready.push(role)
      }
    }
    return ready
  }

  /** Mandatory prerequisites of `role` that ended `failed` or `skipped` */
  blockedBy(role: RoleName, states: TaskStates): RoleName[] {
    return this.prerequisitesOf(role)
      .filter((p) => !p.optional)
      .filter((p) => {
        const state = states.get(p.role)
        return state === 'failed' || state === 'skipped'
      })
      .map((p) => p.role)
  }

  /** Number of transitive dependents of `role` */
  dependentCount(role: RoleName): number {
    const cached = this._dependentCounts.get(role)
    if (cached !== undefined) return cached

    const seen = new Set<RoleName>()
    const stack = [...this.dependentsOf(role)]
    while (stack.length > 0) {
      const next = stack.pop()
      if (next === undefined || seen.has(next)) continue
      seen.add(next)
      stack.push(...this.dependentsOf(next))
    }
    this._dependentCounts.set(role, seen.size)
    return seen.size
  }

  /**
   * Topological order that is stable with respect to declaration order:
   * at each step the earliest-declared role whose prerequisites are placed goes next.
   */
  topologicalOrder(): RoleName[] {
    const placed = new Set<RoleName>()
    const result: RoleName[] = []
    while (result.length < this._order.length) {
      const next = this._order.find(
        (role) =>
          !placed.has(role) &&
          (this._prerequisites.get(role) ?? []).every((p) => placed.has(p.role)),
      )
      // Unreachable for a validated graph
      if (next === undefined) break
      placed.add(next)
      result.push(next)
    }
    return result
  }

  /**
   * Restrict the graph to `roles` plus the transitive closure of their
   * mandatory prerequisites. Optional prerequisites outside the closure are
   * dropped and reported through {@link excludedOptionalOf}.
   *
   * @throws {ConfigurationError} when a requested role is not declared
   */
  subgraph(roles: Iterable<RoleName>): DependencyGraph {
    const requested = [...roles]
    const unknown = requested.filter((r) => !this.has(r))
    if (unknown.length > 0) {
      throw new ConfigurationError(
        'Unknown role(s) selected',
        unknown.map((r) => `"${r}" is not a declared role (known: ${this._order.join(', ')})`),
      )
    }

    const keep = new Set<RoleName>()
    const stack = [...requested]
    while (stack.length > 0) {
      const role = stack.pop()
      if (role === undefined || keep.has(role)) continue
      keep.add(role)
      for (const p of this.prerequisitesOf(role)) {
        if (!p.optional) stack.push(p.role)
      }
    }

    const order = this._order.filter((r) => keep.has(r))
    const prerequisites = new Map<RoleName, Prerequisite[]>()
    const excluded = new Map<RoleName, RoleName[]>()
    for (const role of order) {
      const all = this.prerequisitesOf(role)
      prerequisites.set(role, all.filter((p) => keep.has(p.role)).map((p) => ({ ...p })))
      const dropped = all.filter((p) => !keep.has(p.role)).map((p) => p.role)
      if (dropped.length > 0) excluded.set(role, dropped)
    }
    return new DependencyGraph(order, prerequisites, excluded)
  }
}

function isTerminalState(state: TaskState | undefined): boolean {
  return state !== undefined && isTerminal(state)
}
