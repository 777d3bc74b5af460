/**
 * Unit tests for role output parsing and key-insight extraction.
 */

import { describe, it, expect } from 'vitest'
import { extractKeyInsights, parseRoleOutput, stripCodeFences } from '../output-parser.js'

describe('stripCodeFences', () => {
  it('removes a surrounding json fence', () => {
    expect(stripCodeFences('```json\n{"a":1}\n```')).toBe('{"a":1}')
  })

  it('leaves unfenced text alone apart from trimming', () => {
    expect(stripCodeFences('  plain text \n')).toBe('plain text')
  })
})

describe('parseRoleOutput', () => {
  it('parses fenced JSON objects', () => {
    expect(parseRoleOutput('```json\n{"macro_summary":"steady"}\n```')).toEqual({ macro_summary: 'steady' })
  })

  it('keeps JSON arrays', () => {
    expect(parseRoleOutput('[1, 2]')).toEqual([1, 2])
  })

  it('wraps prose as a summary', () => {
    expect(parseRoleOutput('Growth is slowing.')).toEqual({ summary: 'Growth is slowing.' })
  })

  it('wraps bare JSON scalars as a summary', () => {
    expect(parseRoleOutput('42')).toEqual({ summary: '42' })
  })

  it('wraps malformed JSON as a summary', () => {
    expect(parseRoleOutput('{"a": ')).toEqual({ summary: '{"a":' })
  })
})

describe('extractKeyInsights', () => {
  it('reads the key_insights list', () => {
    const content = { key_insights: ['a', 'b', { insight: 'c' }, 3] }
    expect(extractKeyInsights(content)).toEqual(['a', 'b', 'c', '3'])
  })

  it('keeps at most five insights', () => {
    expect(extractKeyInsights({ key_insights: ['1', '2', '3', '4', '5', '6'] })).toEqual(['1', '2', '3', '4', '5'])
  })

  it('falls back to the sentences of the summary field', () => {
    const content = { key_insights: [], macro_summary: 'GDP grew 5%. CPI was flat! Demand rose? Fine' }
    expect(extractKeyInsights(content, 'macro_summary')).toEqual([
      'GDP grew 5%.',
      'CPI was flat!',
      'Demand rose?',
      'Fine',
    ])
  })

  it('falls back to the generic summary field', () => {
    expect(extractKeyInsights({ summary: 'Only text.' }, 'market_trend_summary')).toEqual(['Only text.'])
  })

  it('splits plain string content and ignores other scalars', () => {
    expect(extractKeyInsights('One. Two.')).toEqual(['One.', 'Two.'])
    expect(extractKeyInsights(7)).toEqual([])
  })
})
