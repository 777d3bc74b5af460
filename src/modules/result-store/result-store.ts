/**
 * ResultStore — per-run, append-only map from role to its Agent Result.
 *
 * Writes happen synchronously on the event loop between awaits, so
 * concurrently finishing tasks never interleave inside put(). The snapshot
 * handed to the aggregator is ordered by declared role order, not by
 * completion order.
 */

import { DuplicateWriteError, ResultNotFoundError } from '../../core/errors.js'
import type { AgentResult, RoleName } from '../../core/types.js'

// ---------------------------------------------------------------------------
// ResultStore interface
// ---------------------------------------------------------------------------

export interface PutOptions {
  /** Overwrite an existing entry for the role (explicit retry-replace) */
  retryReplace?: boolean
}

export interface ResultStore {
  /** @throws {DuplicateWriteError} on a second write without `retryReplace` */
  put(role: RoleName, result: AgentResult, options?: PutOptions): void

  /** @throws {ResultNotFoundError} when nothing was written for the role */
  get(role: RoleName): AgentResult

  has(role: RoleName): boolean

  /** Frozen copy of every entry, ordered by declared role order */
  snapshot(): readonly AgentResult[]

  readonly size: number
}

// ---------------------------------------------------------------------------
// InMemoryResultStore
// ---------------------------------------------------------------------------

export class InMemoryResultStore implements ResultStore {
  private readonly _entries = new Map<RoleName, AgentResult>()
  private readonly _rank: Map<RoleName, number>

  /**
   * @param declaredOrder - Role order used to sort snapshots; unknown roles
   *   sort after declared ones in write order
   */
  constructor(declaredOrder: readonly RoleName[] = []) {
    this._rank = new Map(declaredOrder.map((role, index) => [role, index]))
  }

  put(role: RoleName, result: AgentResult, options: PutOptions = {}): void {
    if (this._entries.has(role) && options.retryReplace !== true) {
      throw new DuplicateWriteError(role)
    }
    if (this._entries.has(role)) {
      // Re-insert so write order reflects the replacement
      this._entries.delete(role)
    }
    this._entries.set(role, freezeResult({ ...result, role }))
  }

  get(role: RoleName): AgentResult {
    const result = this._entries.get(role)
    if (result === undefined) {
      throw new ResultNotFoundError(role)
    }
    return result
  }

  has(role: RoleName): boolean {
    return this._entries.has(role)
  }

  snapshot(): readonly AgentResult[] {
    const writeOrder = [...this._entries.keys()]
    const rankOf = (role: RoleName): number =>
      this._rank.get(role) ?? this._rank.size + writeOrder.indexOf(role)
    const ordered = [...this._entries.values()].sort((a, b) => rankOf(a.role) - rankOf(b.role))
    return Object.freeze(ordered)
  }

  get size(): number {
    return this._entries.size
  }
}

/** Deep copy of a result, frozen at every level */
function freezeResult(result: AgentResult): AgentResult {
  return deepFreeze(structuredClone(result))
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    for (const child of Object.values(value)) deepFreeze(child)
    Object.freeze(value)
  }
  return value
}

// ---------------------------------------------------------------------------
// Factory function
// ---------------------------------------------------------------------------

export function createResultStore(declaredOrder: readonly RoleName[] = []): ResultStore {
  return new InMemoryResultStore(declaredOrder)
}
