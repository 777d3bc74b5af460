/**
 * Structural checks for role dependency declarations.
 *
 * Provides:
 *  - Cycle detection using DFS with visited/inStack sets
 *  - Dangling reference and self-dependency detection
 */

import type { RoleName } from '../../core/types.js'

/** Adjacency map: role → names of its prerequisites */
export type PrerequisiteMap = Record<RoleName, readonly RoleName[]>

// ---------------------------------------------------------------------------
// detectCycle
// ---------------------------------------------------------------------------

/**
 * Detect a cycle in the dependency graph using depth-first search.
 * Self-edges are ignored here; {@link validatePrerequisites} reports them.
 *
 * @returns The cycle path (e.g. ['a', 'b', 'a']), or null if none exists
 */
export function detectCycle(graph: PrerequisiteMap): RoleName[] | null {
  const visited = new Set<RoleName>()
  const inStack = new Set<RoleName>()

  function dfs(node: RoleName, path: RoleName[]): RoleName[] | null {
    visited.add(node)
    inStack.add(node)

    for (const dep of graph[node] ?? []) {
      if (dep === node) continue
      if (inStack.has(dep)) {
        const cycleStart = path.indexOf(dep)
        return [...path.slice(cycleStart), dep]
      }
      if (!visited.has(dep)) {
        const cycle = dfs(dep, [...path, dep])
        if (cycle) return cycle
      }
    }

    inStack.delete(node)
    return null
  }

  for (const role of Object.keys(graph)) {
    if (!visited.has(role)) {
      const cycle = dfs(role, [role])
      if (cycle) return cycle
    }
  }
  return null
}

// ---------------------------------------------------------------------------
// validatePrerequisites
// ---------------------------------------------------------------------------

/**
 * Validate that every prerequisite names a declared role other than itself.
 *
 * @returns One message per problem (empty if all valid)
 */
export function validatePrerequisites(graph: PrerequisiteMap): string[] {
  const errors: string[] = []
  const roles = new Set(Object.keys(graph))

  for (const [role, prerequisites] of Object.entries(graph)) {
    for (const dep of prerequisites) {
      if (dep === role) {
        errors.push(`Role "${role}" depends on itself`)
      } else if (!roles.has(dep)) {
        errors.push(`Role "${role}" references unknown prerequisite "${dep}"`)
      }
    }
  }

  return errors
}
