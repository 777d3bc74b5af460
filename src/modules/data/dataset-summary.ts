/**
 * Pure helpers that condense a parsed CSV table into a DatasetSummary and
 * render that summary as prompt text.
 */

import type { CategoricalColumnStats, DatasetSummary, NumericColumnStats } from './data-provider.js'

const TOP_VALUES = 5

export interface TableSource {
  name: string
  file: string
  description?: string
  header: string[]
  rows: string[][]
  /** Cap on the number of points kept per series */
  maxSeriesPoints?: number
}

// ---------------------------------------------------------------------------
// summarizeTable
// ---------------------------------------------------------------------------

export function summarizeTable(source: TableSource): DatasetSummary {
  const { header, rows } = source
  const numeric: Record<string, NumericColumnStats> = {}
  const categorical: Record<string, CategoricalColumnStats> = {}
  const series: Record<string, (number | null)[]> = {}
  const limit = source.maxSeriesPoints ?? 200
  let labelColumn: number | undefined

  header.forEach((column, index) => {
    const values = rows.map((row) => (row[index] ?? '').trim())
    const present = values.filter((v) => v !== '')

    if (present.length > 0 && present.every(isNumeric)) {
      const numbers = present.map(Number)
      numeric[column] = numericStats(numbers)
      series[column] = values.slice(0, limit).map((v) => (v === '' ? null : Number(v)))
    } else {
      categorical[column] = categoricalStats(present)
      if (labelColumn === undefined) labelColumn = index
    }
  })

  const labels = rows
    .slice(0, limit)
    .map((row, i) => (labelColumn === undefined ? String(i + 1) : (row[labelColumn] ?? '').trim()))

  const summary: DatasetSummary = {
    name: source.name,
    file: source.file,
    rowCount: rows.length,
    columnCount: header.length,
    columns: [...header],
    numeric,
    categorical,
    labels,
    series,
  }
  if (source.description !== undefined) summary.description = source.description
  return summary
}

function isNumeric(value: string): boolean {
  return value !== '' && Number.isFinite(Number(value))
}

/** Sample standard deviation (n - 1), 0 for a single value */
export function numericStats(values: number[]): NumericColumnStats {
  const count = values.length
  let sum = 0
  let min = Infinity
  let max = -Infinity
  for (const v of values) {
    sum += v
    if (v < min) min = v
    if (v > max) max = v
  }
  const mean = sum / count
  const variance =
    count > 1 ? values.reduce((acc, v) => acc + (v - mean) ** 2, 0) / (count - 1) : 0
  return { count, mean, std: Math.sqrt(variance), min, max }
}

/** Unique count and the most frequent values; ties keep first appearance */
export function categoricalStats(values: string[]): CategoricalColumnStats {
  const counts = new Map<string, number>()
  for (const v of values) counts.set(v, (counts.get(v) ?? 0) + 1)
  const top = [...counts.entries()]
    .map(([value, count], order) => ({ value, count, order }))
    .sort((a, b) => b.count - a.count || a.order - b.order)
    .slice(0, TOP_VALUES)
    .map(({ value, count }) => ({ value, count }))
  return { unique: counts.size, top }
}

// ---------------------------------------------------------------------------
// formatDatasetSummary
// ---------------------------------------------------------------------------

function fmt(n: number): string {
  return Number.isInteger(n) ? String(n) : n.toFixed(2)
}

/** Plain-text rendering used inside prompts */
export function formatDatasetSummary(summary: DatasetSummary): string {
  const lines: string[] = []
  const title = summary.description ? `${summary.name} (${summary.file}): ${summary.description}` : `${summary.name} (${summary.file})`
  lines.push(`Dataset ${title}`)
  lines.push(`Rows: ${String(summary.rowCount)}, columns: ${summary.columns.join(', ')}`)

  const numeric = Object.entries(summary.numeric)
  if (numeric.length > 0) {
    lines.push('Numeric columns:')
    for (const [column, s] of numeric) {
      lines.push(
        `- ${column}: mean ${fmt(s.mean)}, std ${fmt(s.std)}, min ${fmt(s.min)}, max ${fmt(s.max)} (n=${String(s.count)})`,
      )
    }
  }

  const categorical = Object.entries(summary.categorical)
  if (categorical.length > 0) {
    lines.push('Categorical columns:')
    for (const [column, s] of categorical) {
      const top = s.top.map((t) => `${t.value} (${String(t.count)})`).join(', ')
      lines.push(`- ${column}: ${String(s.unique)} unique; top: ${top}`)
    }
  }

  return lines.join('\n')
}
