/**
 * Parsing of raw model output into structured role content.
 */

import { z } from 'zod'
import type { JsonValue } from '../../core/types.js'
import { isPlainObject } from '../../utils/helpers.js'

export const MAX_KEY_INSIGHTS = 5

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(z.string(), JsonValueSchema),
  ]),
)

const FENCE_RE = /^\s*```[\w-]*\s*\n([\s\S]*?)\n?```\s*$/

/** Remove a single surrounding Markdown code fence, if any */
export function stripCodeFences(text: string): string {
  const match = FENCE_RE.exec(text)
  return match?.[1] !== undefined ? match[1].trim() : text.trim()
}

/**
 * Parse model output as JSON. Objects and arrays are returned as parsed;
 * anything else (prose, a bare scalar, malformed JSON) is wrapped as
 * `{ summary: <text> }`.
 */
export function parseRoleOutput(text: string): JsonValue {
  const body = stripCodeFences(text)
  let parsed: unknown
  try {
    parsed = JSON.parse(body)
  } catch {
    return { summary: body }
  }
  const result = JsonValueSchema.safeParse(parsed)
  if (!result.success || result.data === null || typeof result.data !== 'object') {
    return { summary: body }
  }
  return result.data
}

/**
 * Up to five insights for the run digest: the `key_insights` array when
 * present, else the leading sentences of `summaryField` (or `summary`).
 */
export function extractKeyInsights(content: JsonValue, summaryField?: string): string[] {
  if (!isPlainObject(content)) {
    return typeof content === 'string' ? firstSentences(content) : []
  }

  const listed = content['key_insights']
  if (Array.isArray(listed)) {
    const insights = listed.flatMap((item) => insightText(item)).filter((s) => s.length > 0)
    if (insights.length > 0) return insights.slice(0, MAX_KEY_INSIGHTS)
  }

  for (const field of [summaryField, 'summary']) {
    if (field === undefined) continue
    const value = content[field]
    if (typeof value === 'string' && value.trim().length > 0) return firstSentences(value)
  }
  return []
}

function insightText(item: unknown): string[] {
  if (typeof item === 'string') return [item.trim()]
  if (typeof item === 'number' || typeof item === 'boolean') return [String(item)]
  if (isPlainObject(item)) {
    const text = item['insight'] ?? item['text'] ?? item['title']
    if (typeof text === 'string') return [text.trim()]
  }
  return []
}

/** Sentence split on `.`, `!`, `?` and their full-width forms */
export function firstSentences(text: string, max = MAX_KEY_INSIGHTS): string[] {
  return (text.match(/[^.!?。！？\n]+[.!?。！？]?/g) ?? [])
    .map((s) => s.trim())
    .filter((s) => s.length > 0)
    .slice(0, max)
}
