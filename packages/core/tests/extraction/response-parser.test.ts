import { describe, it, expect } from 'vitest'
import { extractJsonText, parseOracleResponse } from '../../src/extraction/response-parser.js'

describe('extractJsonText', () => {
  it('prefers a fenced block', () => {
    expect(extractJsonText('Sure:\n```json\n{"a": 1}\n```\nDone')).toBe('{"a": 1}')
  })

  it('takes a bare array as-is', () => {
    expect(extractJsonText('  [1, 2]  ')).toBe('[1, 2]')
  })

  it('falls back to the outermost braces', () => {
    expect(extractJsonText('Here you go: {"requirements": []} thanks')).toBe('{"requirements": []}')
  })
})

describe('parseOracleResponse', () => {
  it('accepts a bare array of candidates', () => {
    const result = parseOracleResponse('[{"title":"Rent Roll"}]')
    expect(result).toEqual({ ok: true, value: { candidates: [{ title: 'Rent Roll' }] } })
  })

  it('reads requirements and usable loan info fields', () => {
    const raw = [
      '```json',
      '{"requirements":[{"title":"A"}],"loan_info":{"borrower_name":"Acme Holdings LLC","loan_amount":5000000,"maturity_date":"not a date"}}',
      '```',
    ].join('\n')
    const result = parseOracleResponse(raw)
    expect(result).toEqual({
      ok: true,
      value: {
        candidates: [{ title: 'A' }],
        loanInfo: { borrowerName: 'Acme Holdings LLC', loanAmount: 5000000 },
      },
    })
  })

  it('treats a missing requirements key as no candidates', () => {
    const result = parseOracleResponse('{"loan_info": null}')
    expect(result).toEqual({ ok: true, value: { candidates: [] } })
  })

  it('reports malformed JSON as a parse error', () => {
    const result = parseOracleResponse('{"requirements": [')
    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error.code).toBe('PARSE_ERROR')
  })

  it('rejects JSON of the wrong shape', () => {
    const result = parseOracleResponse('42')
    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error.code).toBe('PARSE_ERROR')
  })
})
