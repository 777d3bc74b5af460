/**
 * Chart specifications: renderer-neutral line-chart descriptions built from
 * the dataset summaries a role read.
 */

import type { RoleName } from '../../core/types.js'
import type { RoleInput } from '../data/data-provider.js'

export interface LineSeries {
  name: string
  data: (number | null)[]
}

export interface LineChartSpec {
  type: 'line'
  title: string
  dataset: string
  labels: string[]
  series: LineSeries[]
}

export interface RoleCharts {
  role: RoleName
  charts: LineChartSpec[]
}

/** One chart per dataset with numeric columns, one series per column */
export function buildChartSpecs(input: RoleInput): RoleCharts {
  const charts: LineChartSpec[] = []
  for (const dataset of input.datasets) {
    const series = Object.entries(dataset.series).map(([name, data]) => ({ name, data: [...data] }))
    if (series.length === 0) continue
    charts.push({
      type: 'line',
      title: dataset.description ?? dataset.name,
      dataset: dataset.name,
      labels: [...dataset.labels],
      series,
    })
  }
  return { role: input.role, charts }
}
