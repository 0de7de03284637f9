/**
 * Boundary schema for raw extraction candidates.
 *
 * Deliberately permissive: a field of the wrong type becomes undefined
 * instead of failing the record, so one malformed key never costs a
 * requirement. Only a non-object candidate is rejected outright.
 */

import { z } from 'zod'

const OptionalText = z.string().optional().catch(undefined)

const OptionalNumber = z
  .union([
    z.number().finite(),
    z
      .string()
      .trim()
      .regex(/^-?\d[\d,]*(?:\.\d+)?$/)
      .transform((s) => Number(s.replace(/,/g, ''))),
  ])
  .nullable()
  .optional()
  .catch(undefined)

export const RawDeadlineSchema = z
  .object({
    description: OptionalText,
    frequency: OptionalText,
    day_of_month: OptionalNumber,
    days_after_period_end: OptionalNumber,
  })
  .passthrough()

export const RawThresholdSchema = z
  .object({
    metric: OptionalText,
    operator: OptionalText,
    value: OptionalNumber,
    unit: OptionalText,
  })
  .passthrough()

export const RawCandidateSchema = z
  .object({
    title: OptionalText,
    description: OptionalText,
    plain_language_summary: OptionalText,
    original_text: OptionalText,
    source_text: OptionalText,
    document_reference: OptionalText,
    category: OptionalText,
    severity: OptionalText,
    cure_period_days: OptionalNumber,
    deadline: z.union([z.string(), RawDeadlineSchema]).nullable().optional().catch(undefined),
    threshold: z.union([z.string(), RawThresholdSchema]).nullable().optional().catch(undefined),
  })
  .passthrough()

export type RawDeadline = z.infer<typeof RawDeadlineSchema>
export type RawThreshold = z.infer<typeof RawThresholdSchema>
export type RawCandidate = z.infer<typeof RawCandidateSchema>
