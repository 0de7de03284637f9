/**
 * Shared Zod schemas used across modules.
 */

import { z } from 'zod'

export const TimestampSchema = z.string().datetime()

function isCalendarDate(s: string): boolean {
  const d = new Date(s + 'T00:00:00Z')
  return !Number.isNaN(d.getTime()) && d.toISOString().slice(0, 10) === s
}

export const DateStringSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'Date must be YYYY-MM-DD')
  .refine(isCalendarDate, 'Date is not a calendar date')

export const NonEmptyStringSchema = z.string().trim().min(1)

/** Flatten zod issues into one readable line. */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((i) => (i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message))
    .join('; ')
}
