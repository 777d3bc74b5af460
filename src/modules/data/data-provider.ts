/**
 * RawDataProvider — opaque per-role lookup of input datasets.
 */

import type { RoleName } from '../../core/types.js'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface NumericColumnStats {
  count: number
  mean: number
  std: number
  min: number
  max: number
}

export interface CategoricalColumnStats {
  unique: number
  /** Most frequent values, highest count first (at most five) */
  top: { value: string; count: number }[]
}

/** Condensed view of one dataset, small enough to embed in a prompt */
export interface DatasetSummary {
  /** Logical dataset name, e.g. `gdp` */
  name: string
  file: string
  description?: string
  rowCount: number
  columnCount: number
  columns: string[]
  numeric: Record<string, NumericColumnStats>
  categorical: Record<string, CategoricalColumnStats>
  /** Values of the first non-numeric column, used as chart labels */
  labels: string[]
  /** Values of each numeric column in row order; blanks are null */
  series: Record<string, (number | null)[]>
}

export interface RoleInput {
  role: RoleName
  datasets: DatasetSummary[]
}

export interface DatasetDescription {
  name: string
  file: string
  description?: string
  exists: boolean
}

// ---------------------------------------------------------------------------
// RawDataProvider interface
// ---------------------------------------------------------------------------

export interface RawDataProvider {
  /** @throws {InputNotFoundError} when a dataset the role needs cannot be found */
  loadInput(role: RoleName): Promise<RoleInput>

  /** Every mapped dataset and whether its file exists */
  describe(): Promise<DatasetDescription[]>
}
