/**
 * Prompt assembly with a token budget.
 *
 * Templates carry {{placeholder}} markers filled from named sections. When
 * the assembled prompt exceeds the ceiling, `optional` sections are cut
 * first, then `important` ones; `required` sections are never touched.
 *
 * Tokens are estimated at chars/4, plus 10% for text with fenced code blocks.
 */

import { createLogger } from '../../utils/logger.js'

const logger = createLogger('roles:prompt-assembler')

const CHARS_PER_TOKEN = 4
const CODE_BLOCK_ADJUSTMENT = 1.1
const CODE_BLOCK_MARKER = '```'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type SectionPriority = 'required' | 'important' | 'optional'

export interface PromptSection {
  name: string
  content: string
  priority: SectionPriority
}

export interface AssembleResult {
  prompt: string
  tokenCount: number
  truncated: boolean
}

// ---------------------------------------------------------------------------
// Token estimation
// ---------------------------------------------------------------------------

export function countTokens(text: string): number {
  if (text.length === 0) return 0
  const base = text.length / CHARS_PER_TOKEN
  return Math.ceil(text.includes(CODE_BLOCK_MARKER) ? base * CODE_BLOCK_ADJUSTMENT : base)
}

/**
 * Cut `text` down to roughly `maxTokens`, preferring a word boundary within
 * the last 50 characters, and mark the cut with `…`.
 */
export function truncateToTokens(text: string, maxTokens: number): string {
  if (maxTokens <= 0) return ''
  if (countTokens(text) <= maxTokens) return text

  const multiplier = text.includes(CODE_BLOCK_MARKER) ? CODE_BLOCK_ADJUSTMENT : 1
  const targetChars = Math.floor((maxTokens * CHARS_PER_TOKEN) / multiplier)
  if (targetChars <= 0) return ''

  const rough = text.slice(0, targetChars)
  const lastSpace = rough.lastIndexOf(' ')
  const cut = lastSpace > 0 && lastSpace > targetChars - 50 ? rough.slice(0, lastSpace) : rough
  return `${cut}…`
}

// ---------------------------------------------------------------------------
// assemblePrompt
// ---------------------------------------------------------------------------

/**
 * Fill `template` from `sections` and enforce `tokenCeiling`.
 * A prompt whose required sections alone exceed the ceiling is returned
 * over budget, with a warning.
 */
export function assemblePrompt(
  template: string,
  sections: readonly PromptSection[],
  tokenCeiling = 6000,
): AssembleResult {
  const content: Record<string, string> = {}
  for (const section of sections) content[section.name] = section.content

  let prompt = fillTemplate(template, content)
  let tokenCount = countTokens(prompt)
  if (tokenCount <= tokenCeiling) {
    return { prompt, tokenCount, truncated: false }
  }

  logger.debug({ tokenCount, ceiling: tokenCeiling }, 'Prompt over token ceiling, truncating sections')
  let truncated = false

  for (const priority of ['optional', 'important'] as const) {
    for (const section of sections.filter((s) => s.priority === priority)) {
      if (tokenCount <= tokenCeiling) break
      const sectionTokens = countTokens(section.content)
      if (sectionTokens === 0) continue

      const target = Math.max(0, sectionTokens - (tokenCount - tokenCeiling))
      content[section.name] = target === 0 ? '' : truncateToTokens(section.content, target)
      truncated = true
      prompt = fillTemplate(template, content)
      tokenCount = countTokens(prompt)
    }
  }

  if (tokenCount > tokenCeiling) {
    logger.warn({ tokenCount, ceiling: tokenCeiling }, 'Required sections exceed token ceiling')
  }
  return { prompt, tokenCount, truncated }
}

/** Unknown placeholders become empty strings */
export function fillTemplate(template: string, content: Readonly<Record<string, string>>): string {
  return template.replace(/\{\{(\w[\w-]*)\}\}/g, (_match, key: string) => content[key] ?? '')
}
