/**
 * Domain model constructors and pure helpers.
 *
 * Every constructor validates through the zod schemas and returns a Result;
 * a VALIDATION_ERROR is fatal to the single record only.
 */

import type { z } from 'zod'
import { Ok, Err, ComplianceError, formatIssues } from '../common/index.js'
import type { Result } from '../common/index.js'
import {
  ComplianceStatusSchema,
  CreateLoanProfileInputSchema,
  DeadlineSchema,
  RequirementSchema,
  ThresholdSchema,
  SeveritySchema,
} from './schemas.js'
import type {
  ComplianceStatus,
  Deadline,
  LoanProfile,
  Requirement,
  RequirementCategory,
  Severity,
  Threshold,
} from './schemas.js'

function validate<S extends z.ZodTypeAny>(
  schema: S,
  input: unknown,
  entity: string,
): Result<z.output<S>, ComplianceError> {
  const parsed = schema.safeParse(input)
  if (!parsed.success) {
    return Err(ComplianceError.validation(`Invalid ${entity}: ${formatIssues(parsed.error)}`))
  }
  return Ok(parsed.data)
}

export function createThreshold(input: unknown): Result<Threshold, ComplianceError> {
  return validate(ThresholdSchema, input, 'threshold')
}

export function createDeadline(input: unknown): Result<Deadline, ComplianceError> {
  return validate(DeadlineSchema, input, 'deadline')
}

export function createRequirement(input: unknown): Result<Requirement, ComplianceError> {
  return validate(RequirementSchema, input, 'requirement')
}

export function createLoanProfile(input: unknown): Result<LoanProfile, ComplianceError> {
  const parsed = validate(CreateLoanProfileInputSchema, input, 'loan profile')
  if (!parsed.ok) return parsed

  const data = parsed.value
  return Ok({
    loanId: data.loanId,
    loanName: data.loanName ?? `Loan ${data.loanId}`,
    propertyName: data.propertyName,
    borrowerName: data.borrowerName,
    lenderName: data.lenderName,
    originalLoanAmount: data.originalLoanAmount,
    originationDate: data.originationDate,
    maturityDate: data.maturityDate,
    sourceDocumentName: data.sourceDocumentName,
    createdAt: data.createdAt ?? new Date().toISOString(),
    requirements: data.requirements,
    extraction: data.extraction,
  })
}

// ── Equality ──

function deepSort(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(deepSort)
  if (value !== null && typeof value === 'object') {
    const sorted: Record<string, unknown> = {}
    for (const key of Object.keys(value).sort()) {
      const v: unknown = Reflect.get(value, key)
      if (v !== undefined) sorted[key] = deepSort(v)
    }
    return sorted
  }
  return value
}

/** Structural equality, independent of key order. */
export function requirementsEqual(a: Requirement, b: Requirement): boolean {
  return JSON.stringify(deepSort(a)) === JSON.stringify(deepSort(b))
}

// ── Severity ordering ──

const SEVERITY_RANK: Record<Severity, number> = { low: 0, medium: 1, high: 2, critical: 3 }

export function compareSeverity(a: Severity, b: Severity): number {
  return SEVERITY_RANK[a] - SEVERITY_RANK[b]
}

export function maxSeverity(first: Severity, ...rest: Severity[]): Severity {
  return rest.reduce((max, s) => (compareSeverity(s, max) > 0 ? s : max), first)
}

/** Raise a severity by `steps` levels, capped at critical. */
export function escalateSeverity(severity: Severity, steps = 1): Severity {
  const levels = SeveritySchema.options
  return levels[Math.min(levels.length - 1, SEVERITY_RANK[severity] + steps)]
}

// ── Status updates ──

/**
 * Return a copy of the profile with one requirement's status replaced.
 * Status is the only field that changes after normalization.
 */
export function updateRequirementStatus(
  profile: LoanProfile,
  requirementId: string,
  status: string,
): Result<LoanProfile, ComplianceError> {
  const parsedStatus = ComplianceStatusSchema.safeParse(status)
  if (!parsedStatus.success) {
    return Err(
      ComplianceError.validation(
        `Invalid status "${status}". Must be one of: ${ComplianceStatusSchema.options.join(', ')}`,
      ),
    )
  }

  if (!profile.requirements.some((r) => r.id === requirementId)) {
    return Err(ComplianceError.notFound('Requirement', requirementId))
  }

  return Ok({
    ...profile,
    requirements: profile.requirements.map((r) =>
      r.id === requirementId ? { ...r, status: parsedStatus.data } : r,
    ),
  })
}

// ── Threshold rendering ──

function formatValue(value: number, unit: string | null): string {
  const n = value.toLocaleString('en-US', { maximumFractionDigits: 4 })
  if (unit === null) return n
  if (unit === '$') return `$${n}`
  if (unit === 'x' || unit === '%') return `${n}${unit}`
  return `${n} ${unit}`
}

const OPERATOR_PHRASES: Record<Threshold['operator'], string> = {
  '>=': 'must be at least',
  '<=': 'must not exceed',
  '>': 'must be greater than',
  '<': 'must be less than',
  '==': 'must equal',
}

/** "DSCR must be at least 1.25x" */
export function describeThreshold(threshold: Threshold): string {
  return `${threshold.metric} ${OPERATOR_PHRASES[threshold.operator]} ${formatValue(threshold.value, threshold.unit)}`
}

// ── Summary ──

export interface ComplianceSummary {
  totalRequirements: number
  byStatus: Record<ComplianceStatus, number>
  byCategory: Record<RequirementCategory, number>
  criticalItems: number
  nonCompliantCount: number
  atRiskCount: number
}

export function summarizeCompliance(profile: LoanProfile): ComplianceSummary {
  const byStatus: Record<ComplianceStatus, number> = { unknown: 0, compliant: 0, non_compliant: 0, at_risk: 0 }
  const byCategory: Record<RequirementCategory, number> = {
    financial_reporting: 0,
    covenant_compliance: 0,
    insurance: 0,
    reserve_funding: 0,
    property_management: 0,
    leasing: 0,
    capital_improvements: 0,
    tax_escrow: 0,
    environmental: 0,
    legal_entity: 0,
    other: 0,
  }
  let criticalItems = 0

  for (const r of profile.requirements) {
    byStatus[r.status]++
    byCategory[r.category]++
    if (r.severity === 'critical') criticalItems++
  }

  return {
    totalRequirements: profile.requirements.length,
    byStatus,
    byCategory,
    criticalItems,
    nonCompliantCount: byStatus.non_compliant,
    atRiskCount: byStatus.at_risk,
  }
}

/**
 * 0-100: compliant items earn full credit, at-risk items half, the rest
 * nothing. A profile with no requirements scores 100.
 */
export function computeComplianceScore(profile: LoanProfile): number {
  const total = profile.requirements.length
  if (total === 0) return 100
  let credit = 0
  for (const r of profile.requirements) {
    if (r.status === 'compliant') credit += 1
    else if (r.status === 'at_risk') credit += 0.5
  }
  return Math.floor((credit / total) * 100)
}
