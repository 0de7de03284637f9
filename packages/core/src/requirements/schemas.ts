/**
 * Zod schemas for the requirement domain model.
 */

import { z } from 'zod'
import { DateStringSchema, NonEmptyStringSchema, TimestampSchema } from '../common/index.js'

// ── Enums ──

export const RequirementCategorySchema = z.enum([
  'financial_reporting',
  'covenant_compliance',
  'insurance',
  'reserve_funding',
  'property_management',
  'leasing',
  'capital_improvements',
  'tax_escrow',
  'environmental',
  'legal_entity',
  'other',
])
export type RequirementCategory = z.infer<typeof RequirementCategorySchema>

export const SeveritySchema = z.enum(['low', 'medium', 'high', 'critical'])
export type Severity = z.infer<typeof SeveritySchema>

export const ComplianceStatusSchema = z.enum(['unknown', 'compliant', 'non_compliant', 'at_risk'])
export type ComplianceStatus = z.infer<typeof ComplianceStatusSchema>

export const FrequencySchema = z.enum(['one_time', 'monthly', 'quarterly', 'annually', 'custom'])
export type Frequency = z.infer<typeof FrequencySchema>

export const ComparisonOperatorSchema = z.enum(['>=', '<=', '>', '<', '=='])
export type ComparisonOperator = z.infer<typeof ComparisonOperatorSchema>

export const PeriodSchema = z.enum(['month', 'quarter', 'year'])
export type Period = z.infer<typeof PeriodSchema>

// ── Deadline rule ──

const DaysSchema = z.number().int().min(0).max(3660)

export const DeadlineRuleSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('day_of_month'), day: z.number().int().min(1).max(31) }),
  z.object({ kind: z.literal('days_after_period_end'), period: PeriodSchema, days: DaysSchema }),
  z.object({
    kind: z.literal('fixed_annual_date'),
    month: z.number().int().min(1).max(12),
    day: z.number().int().min(1).max(31),
  }),
  z.object({ kind: z.literal('specific_date'), date: DateStringSchema }),
  z.object({
    kind: z.literal('days_after_event'),
    event: NonEmptyStringSchema,
    days: DaysSchema,
    eventDate: DateStringSchema.nullable(),
  }),
  z.object({
    kind: z.literal('days_before_event'),
    event: NonEmptyStringSchema,
    days: DaysSchema,
    eventDate: DateStringSchema.nullable(),
  }),
  z.object({ kind: z.literal('interval'), days: z.number().int().min(1), anchorDate: DateStringSchema }),
  z.object({
    kind: z.literal('non_computable'),
    reason: z.string(),
    event: z.string().optional(),
    days: DaysSchema.optional(),
  }),
])
export type DeadlineRule = z.infer<typeof DeadlineRuleSchema>
export type DeadlineRuleKind = DeadlineRule['kind']

/** Rule kinds each frequency may carry. */
export const RULE_KINDS_BY_FREQUENCY: Record<Frequency, readonly DeadlineRuleKind[]> = {
  one_time: ['specific_date', 'days_after_event', 'days_before_event', 'non_computable'],
  monthly: ['day_of_month', 'days_after_period_end', 'non_computable'],
  quarterly: ['days_after_period_end', 'non_computable'],
  annually: ['days_after_period_end', 'fixed_annual_date', 'non_computable'],
  custom: ['interval', 'non_computable'],
}

const PERIOD_BY_FREQUENCY: Partial<Record<Frequency, Period>> = {
  monthly: 'month',
  quarterly: 'quarter',
  annually: 'year',
}

export const DeadlineSchema = z
  .object({
    description: NonEmptyStringSchema,
    frequency: FrequencySchema,
    rule: DeadlineRuleSchema,
  })
  .superRefine((d, ctx) => {
    if (!RULE_KINDS_BY_FREQUENCY[d.frequency].includes(d.rule.kind)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['rule'],
        message: `Rule "${d.rule.kind}" is not valid for frequency "${d.frequency}"`,
      })
      return
    }
    if (d.rule.kind === 'days_after_period_end' && PERIOD_BY_FREQUENCY[d.frequency] !== d.rule.period) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['rule', 'period'],
        message: `Period "${d.rule.period}" does not match frequency "${d.frequency}"`,
      })
    }
  })

export type DeadlineInput = z.input<typeof DeadlineSchema>

export interface Deadline {
  readonly description: string
  readonly frequency: Frequency
  readonly rule: DeadlineRule
}

// ── Threshold ──

export const ThresholdSchema = z.object({
  metric: NonEmptyStringSchema,
  operator: ComparisonOperatorSchema,
  value: z.number().finite(),
  unit: z.string().trim().min(1).nullable().default(null),
})

export type ThresholdInput = z.input<typeof ThresholdSchema>

export interface Threshold {
  readonly metric: string
  readonly operator: ComparisonOperator
  readonly value: number
  readonly unit: string | null
}

// ── Requirement ──

export const RequirementIdSchema = z.string().regex(/^REQ-\d{3,}$/, 'Requirement id must look like REQ-001')

export const RequirementSchema = z.object({
  id: RequirementIdSchema,
  title: NonEmptyStringSchema,
  category: RequirementCategorySchema,
  plainLanguageSummary: NonEmptyStringSchema,
  sourceText: z.string().default(''),
  documentReference: z.string().default(''),
  deadline: DeadlineSchema.nullable().default(null),
  threshold: ThresholdSchema.nullable().default(null),
  severity: SeveritySchema,
  status: ComplianceStatusSchema.default('unknown'),
  curePeriodDays: z.number().int().min(0).nullable().default(null),
})

export type RequirementInput = z.input<typeof RequirementSchema>

export interface Requirement {
  readonly id: string
  readonly title: string
  readonly category: RequirementCategory
  readonly plainLanguageSummary: string
  readonly sourceText: string
  readonly documentReference: string
  readonly deadline: Deadline | null
  readonly threshold: Threshold | null
  readonly severity: Severity
  readonly status: ComplianceStatus
  readonly curePeriodDays: number | null
}

// ── Loan profile ──

export const ExtractionModeSchema = z.enum(['live', 'mock'])
export type ExtractionMode = z.infer<typeof ExtractionModeSchema>

export const ExtractionInfoSchema = z.object({
  mode: ExtractionModeSchema,
  incomplete: z.boolean(),
  chunkCount: z.number().int().min(0),
  failedChunks: z.array(z.number().int().min(0)),
})

export interface ExtractionInfo {
  readonly mode: ExtractionMode
  readonly incomplete: boolean
  readonly chunkCount: number
  readonly failedChunks: readonly number[]
}

export const CreateLoanProfileInputSchema = z
  .object({
    loanId: NonEmptyStringSchema,
    loanName: z.string().trim().min(1).optional(),
    propertyName: z.string().trim().min(1).default('Unknown Property'),
    borrowerName: z.string().trim().min(1).default('Unknown Borrower'),
    lenderName: z.string().trim().min(1).default('Unknown Lender'),
    originalLoanAmount: z.number().finite().nonnegative().nullable().default(null),
    originationDate: DateStringSchema.nullable().default(null),
    maturityDate: DateStringSchema.nullable().default(null),
    sourceDocumentName: z.string().default(''),
    createdAt: TimestampSchema.optional(),
    requirements: z.array(RequirementSchema).default([]),
    extraction: ExtractionInfoSchema.default({ mode: 'live', incomplete: false, chunkCount: 0, failedChunks: [] }),
  })
  .superRefine((p, ctx) => {
    const seen = new Set<string>()
    p.requirements.forEach((r, i) => {
      if (seen.has(r.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['requirements', i, 'id'],
          message: `Duplicate requirement id ${r.id}`,
        })
      }
      seen.add(r.id)
    })
  })

export type CreateLoanProfileInput = z.input<typeof CreateLoanProfileInputSchema>

export interface LoanProfile {
  readonly loanId: string
  readonly loanName: string
  readonly propertyName: string
  readonly borrowerName: string
  readonly lenderName: string
  readonly originalLoanAmount: number | null
  readonly originationDate: string | null
  readonly maturityDate: string | null
  readonly sourceDocumentName: string
  readonly createdAt: string
  readonly requirements: readonly Requirement[]
  readonly extraction: ExtractionInfo
}
