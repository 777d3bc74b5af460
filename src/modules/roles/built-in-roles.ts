/**
 * Built-in sector analysis roles.
 *
 * Five domain roles read their own datasets; `forecast` also reads the
 * macro and finance results (mandatory) and the market result (optional).
 * The `report` role merges every available result into a Markdown report.
 */

import type { AgentResult, JsonValue, Prerequisite, RoleName } from '../../core/types.js'
import { isPlainObject } from '../../utils/helpers.js'
import { formatDatasetSummary } from '../data/dataset-summary.js'
import type { InferenceParams } from '../inference/inference-client.js'
import { assemblePrompt } from './prompt-assembler.js'
import { parseRoleOutput } from './output-parser.js'
import type { RoleDefinition, RolePayload, SynthesisPayload, SynthesisRoleDefinition } from './role-definition.js'
import { RoleRegistry } from './role-registry.js'

export const DEFAULT_INDUSTRY = 'new energy vehicle'
export const SYNTHESIS_ROLE = 'report'

const DEFAULT_PARAMS: InferenceParams = { temperature: 0.1, maxTokens: 4000 }

export interface BuiltInRoleOptions {
  /** Industry named in every prompt */
  industry?: string
  /** Token ceiling per prompt */
  tokenCeiling?: number
}

// ---------------------------------------------------------------------------
// Domain role factory
// ---------------------------------------------------------------------------

interface AnalysisRoleSpec {
  role: RoleName
  title: string
  description: string
  task: string
  focus: string[]
  /** Output fields; the first is the summary field */
  fields: [string, string][]
  dataSources: string[]
  prerequisites?: (RoleName | Prerequisite)[]
}

const ROLE_TEMPLATE = `You are the {{title}} on a sector research team covering the {{industry}} industry.
{{task}}

Datasets:
{{datasets}}

{{upstream}}Focus on:
{{focus}}

Respond with a single JSON object with these fields:
{{fields}}
- key_insights: list of the most important findings, one sentence each`

function defineAnalysisRole(
  spec: AnalysisRoleSpec,
  summaryFields: ReadonlyMap<RoleName, string>,
  options: Required<BuiltInRoleOptions>,
): RoleDefinition {
  const summaryField = spec.fields[0][0]
  return {
    role: spec.role,
    title: spec.title,
    description: spec.description,
    prerequisites: spec.prerequisites ?? [],
    dataSources: spec.dataSources,
    summaryField,
    params: { ...DEFAULT_PARAMS },
    buildPrompt(payload: RolePayload): string {
      const datasets =
        payload.datasets.length > 0
          ? payload.datasets.map(formatDatasetSummary).join('\n\n')
          : 'No datasets available.'
      const { prompt } = assemblePrompt(
        ROLE_TEMPLATE,
        [
          { name: 'title', content: spec.title, priority: 'required' },
          { name: 'industry', content: options.industry, priority: 'required' },
          { name: 'task', content: spec.task, priority: 'required' },
          { name: 'datasets', content: datasets, priority: 'important' },
          { name: 'upstream', content: renderUpstream(payload, summaryFields), priority: 'optional' },
          { name: 'focus', content: numbered(spec.focus), priority: 'required' },
          { name: 'fields', content: spec.fields.map(([f, d]) => `- ${f}: ${d}`).join('\n'), priority: 'required' },
        ],
        options.tokenCeiling,
      )
      return prompt
    },
    parseOutput: parseRoleOutput,
  }
}

function renderUpstream(payload: RolePayload, summaryFields: ReadonlyMap<RoleName, string>): string {
  if (payload.prerequisites.length === 0 && payload.omitted.length === 0) return ''
  const lines = ['Upstream analyses:']
  for (const result of payload.prerequisites) {
    lines.push(`### ${result.role}`, describeResult(result, summaryFields.get(result.role)))
  }
  for (const o of payload.omitted) {
    lines.push(`### ${o.role}`, `Not available (${o.reason.replace('_', ' ')}).`)
  }
  return `${lines.join('\n')}\n\n`
}

function numbered(items: readonly string[]): string {
  return items.map((item, i) => `${String(i + 1)}. ${item}`).join('\n')
}

/** Prose summary of a result when it has one, else its JSON */
function describeResult(result: AgentResult, summaryField?: string): string {
  const content: JsonValue = result.content
  if (typeof content === 'string') return content
  if (isPlainObject(content)) {
    for (const field of [summaryField, 'summary']) {
      if (field === undefined) continue
      const value = content[field]
      if (typeof value === 'string') return value
    }
  }
  return JSON.stringify(content, null, 2)
}

// ---------------------------------------------------------------------------
// Domain roles
// ---------------------------------------------------------------------------

const ANALYSIS_ROLES: AnalysisRoleSpec[] = [
  {
    role: 'macro',
    title: 'macroeconomic analyst',
    description: 'Relates GDP and CPI trends to industry development',
    task: 'Analyse how the GDP and CPI data below relate to the industry.',
    focus: [
      'Correlation between GDP growth and industry development',
      'Effect of CPI movements on consumer demand',
      'Overall macroeconomic tailwinds and headwinds',
    ],
    fields: [
      ['macro_summary', 'summary of the macroeconomic environment'],
      ['macro_corr_matrix', 'correlation of macro indicators with industry development'],
      ['recommendations', 'recommendations given the macro environment'],
    ],
    dataSources: ['gdp', 'cpi'],
  },
  {
    role: 'finance',
    title: 'financial analyst',
    description: 'Assesses profitability, leverage and growth of listed companies',
    task: 'Analyse the financial performance of listed companies in the industry.',
    focus: [
      'Industry profitability trend',
      'Balance sheet structure and solvency',
      'Growth indicators and investment value',
      'Comparison of the leading companies',
    ],
    fields: [
      ['finance_summary', 'summary of industry financial performance'],
      ['key_metrics', 'analysis of key financial metrics'],
      ['company_comparison', 'comparison of the main companies'],
      ['risk_factors', 'financial risk factors'],
    ],
    dataSources: ['industry_data', 'company_data'],
  },
  {
    role: 'market',
    title: 'market analyst',
    description: 'Tracks production, sales, market structure and penetration',
    task: 'Analyse production and sales trends and the market structure.',
    focus: [
      'Seasonality and long-term trend of production and sales',
      'Market share shifts among manufacturers',
      'Charging infrastructure versus market growth',
      'Penetration rate and remaining headroom',
    ],
    fields: [
      ['market_trend_summary', 'summary of production and sales trends'],
      ['penetration_rate', 'market penetration analysis'],
      ['manufacturer_analysis', 'analysis of the main manufacturers'],
      ['infrastructure_insights', 'charging infrastructure insights'],
    ],
    dataSources: ['production_data', 'charging_data'],
  },
  {
    role: 'policy',
    title: 'policy analyst',
    description: 'Evaluates the effect of policy and market signals',
    task: 'Assess how the policy environment affects the industry.',
    focus: [
      'Alignment of macroeconomic and industrial policy',
      'Industrial policy as a driver of market development',
      'Likely impact of upcoming policy changes',
    ],
    fields: [
      ['policy_insight', 'insight into the policy environment'],
      ['impact_analysis', 'analysis of policy impact'],
      ['regulatory_risks', 'regulatory risk analysis'],
      ['future_outlook', 'policy outlook'],
    ],
    dataSources: ['gdp', 'industry_data'],
  },
  {
    role: 'forecast',
    title: 'forecasting analyst',
    description: 'Projects the next period from historical trends and upstream analyses',
    task: 'Forecast the industry outlook from the historical data and the upstream analyses.',
    focus: [
      'Short- and medium-term growth rate',
      'Likely changes in market structure',
      'Impact of technology development',
      'Risks and uncertainty',
    ],
    fields: [
      ['forecast_summary', 'summary of the forecast'],
      ['growth_forecast', 'growth rate forecast'],
      ['market_structure_changes', 'expected market structure changes'],
      ['risk_factors', 'risks to the forecast'],
    ],
    dataSources: ['industry_data', 'production_data'],
    prerequisites: ['macro', 'finance', { role: 'market', optional: true }],
  },
]

// ---------------------------------------------------------------------------
// Synthesis role
// ---------------------------------------------------------------------------

const REPORT_HEADINGS = [
  'Macroeconomic Environment',
  'Financial Performance',
  'Market Trends',
  'Policy Environment',
  'Outlook and Forecast',
  'Conclusions and Recommendations',
]

const REPORT_TEMPLATE = `Write a complete {{industry}} industry analysis report in Markdown from the analyses below.

{{analyses}}

{{unavailable}}Use this structure:
# {{title}}
{{sections}}

Base every section on the analyses above. Where an analysis is unavailable, say so briefly in its section.`

function defineReportRole(
  summaryFields: ReadonlyMap<RoleName, string>,
  options: Required<BuiltInRoleOptions>,
): SynthesisRoleDefinition {
  return {
    role: SYNTHESIS_ROLE,
    title: 'report writer',
    description: 'Merges every available analysis into the final Markdown report',
    params: { temperature: 0.3, maxTokens: 8000 },
    buildPrompt(payload: SynthesisPayload): string {
      const analyses = payload.results
        .map((r) => `## ${r.role}\n${describeResult(r, summaryFields.get(r.role))}`)
        .join('\n\n')
      const unavailable =
        payload.unavailable.length > 0
          ? `Unavailable analyses: ${payload.unavailable.map((u) => `${u.role} (${u.state})`).join(', ')}\n\n`
          : ''
      const sections = REPORT_HEADINGS.map((heading, i) => `## ${String(i + 1)}. ${heading}`)
        .join('\n')
      const { prompt } = assemblePrompt(
        REPORT_TEMPLATE,
        [
          { name: 'industry', content: options.industry, priority: 'required' },
          { name: 'analyses', content: analyses, priority: 'important' },
          { name: 'unavailable', content: unavailable, priority: 'required' },
          { name: 'title', content: `${capitalize(options.industry)} Industry Analysis Report`, priority: 'required' },
          { name: 'sections', content: sections, priority: 'required' },
        ],
        options.tokenCeiling,
      )
      return prompt
    },
  }
}

function capitalize(text: string): string {
  return text.replace(/\b\w/g, (c) => c.toUpperCase())
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

/** Registry of the five domain roles and the `report` synthesis role */
export function createBuiltInRegistry(options: BuiltInRoleOptions = {}): RoleRegistry {
  const resolved: Required<BuiltInRoleOptions> = {
    industry: options.industry ?? DEFAULT_INDUSTRY,
    tokenCeiling: options.tokenCeiling ?? 6000,
  }
  const summaryFields = new Map<RoleName, string>(
    ANALYSIS_ROLES.map((spec) => [spec.role, spec.fields[0][0]]),
  )
  const roles = ANALYSIS_ROLES.map((spec) => defineAnalysisRole(spec, summaryFields, resolved))
  return new RoleRegistry(roles, defineReportRole(summaryFields, resolved))
}
