/**
 * Oracle response parsing: JSON, fenced or bare, into candidates and loan info.
 */

import { z } from 'zod'
import { Ok, Err, ComplianceError, formatIssues } from '../common/index.js'
import type { Result } from '../common/index.js'
import { RawLoanInfoSchema, toLoanInfo, type OracleOutput } from './oracle.js'

const FENCE_RE = /```(?:json)?\s*\n?([\s\S]*?)```/

const OracleResponseSchema = z.union([
  z.array(z.unknown()),
  z.object({
    requirements: z.array(z.unknown()).default([]),
    loan_info: RawLoanInfoSchema.nullable().optional().catch(undefined),
  }),
])

/** The JSON payload of a model reply: a fenced block if present, else the outermost braces. */
export function extractJsonText(raw: string): string {
  const fenced = FENCE_RE.exec(raw)
  if (fenced) return fenced[1].trim()

  const trimmed = raw.trim()
  if (trimmed.startsWith('[')) return trimmed
  const start = trimmed.indexOf('{')
  const end = trimmed.lastIndexOf('}')
  return start !== -1 && end > start ? trimmed.slice(start, end + 1) : trimmed
}

export function parseOracleResponse(raw: string): Result<OracleOutput, ComplianceError> {
  let parsed: unknown
  try {
    parsed = JSON.parse(extractJsonText(raw))
  } catch (e) {
    const snippet = raw.slice(0, 200)
    return Err(ComplianceError.parse(`Failed to parse oracle response: ${e instanceof Error ? e.message : String(e)}; snippet: ${snippet}`))
  }

  const validated = OracleResponseSchema.safeParse(parsed)
  if (!validated.success) {
    return Err(ComplianceError.parse(`Invalid oracle response: ${formatIssues(validated.error)}`))
  }

  const data = validated.data
  if (Array.isArray(data)) return Ok({ candidates: data })
  return Ok({
    candidates: data.requirements,
    ...(data.loan_info ? { loanInfo: toLoanInfo(data.loan_info) } : {}),
  })
}
