/**
 * Next-occurrence computation for structured deadline rules.
 */

import { z } from 'zod'
import { DateStringSchema } from '../common/index.js'
import type { DeadlineRule, Period } from '../requirements/index.js'
import { addDays, daysBetween, daysInMonth, makeDate, shiftMonth, yearMonth } from './calendar.js'

// 2001 is not a leap year, so February 29 is rejected.
export const FiscalYearEndSchema = z
  .object({
    month: z.number().int().min(1).max(12),
    day: z.number().int().min(1).max(31),
  })
  .refine((f) => f.day <= daysInMonth(2001, f.month), {
    message: 'Fiscal year end is not a calendar day',
  })

export type FiscalYearEnd = z.infer<typeof FiscalYearEndSchema>

export const DEFAULT_FISCAL_YEAR_END: FiscalYearEnd = { month: 12, day: 31 }

export interface ResolverOptions {
  /** Defaults to December 31. Quarter ends fall every three months from it. */
  fiscalYearEnd?: FiscalYearEnd
  /** Known dates for one-time events, keyed by event text as parsed ("closing"). */
  eventDates?: Readonly<Record<string, string>>
}

/** Fiscal year ends on the 28th or later are treated as month ends. */
function periodEndDay(year: number, month: number, fye: FiscalYearEnd): string {
  return makeDate(year, month, fye.day >= 28 ? 31 : fye.day)
}

/** The period end falling in (year, month), or null when that month closes no period. */
function periodEndIn(year: number, month: number, period: Period, fye: FiscalYearEnd): string | null {
  switch (period) {
    case 'month':
      return makeDate(year, month, daysInMonth(year, month))
    case 'quarter':
      return (((month - fye.month) % 3) + 3) % 3 === 0 ? periodEndDay(year, month, fye) : null
    case 'year':
      return month === fye.month ? periodEndDay(year, month, fye) : null
    default: {
      const _exhaustive: never = period
      throw new Error(`Unknown period: ${String(_exhaustive)}`)
    }
  }
}

function nextAfterPeriodEnd(period: Period, days: number, referenceDate: string, fye: FiscalYearEnd): string | null {
  const { year, month } = yearMonth(referenceDate)
  // Walk back far enough that a period end plus the offset can still land on or after the reference.
  // Every period ends at least once in the thirteen months from the reference month on.
  const lookBack = Math.ceil(days / 28) + 12
  for (let delta = -lookBack; delta <= 13; delta++) {
    const ym = shiftMonth(year, month, delta)
    const end = periodEndIn(ym.year, ym.month, period, fye)
    if (end === null) continue
    const due = addDays(end, days)
    if (due >= referenceDate) return due
  }
  return null
}

function lookupEventDate(event: string, known: string | null, options: ResolverOptions): string | null {
  if (known !== null) return known
  return options.eventDates?.[event] ?? null
}

/**
 * Earliest occurrence on or after `referenceDate` (YYYY-MM-DD).
 *
 * One-time rules return their single date even when it has passed, or null
 * when the triggering event's date is unknown. `non_computable` is always null,
 * and so is every rule when the reference date or fiscal year end is invalid.
 */
export function nextOccurrence(rule: DeadlineRule, referenceDate: string, options: ResolverOptions = {}): string | null {
  if (!DateStringSchema.safeParse(referenceDate).success) return null
  const fyeParsed = FiscalYearEndSchema.safeParse(options.fiscalYearEnd ?? DEFAULT_FISCAL_YEAR_END)
  if (!fyeParsed.success) return null
  const fye = fyeParsed.data

  switch (rule.kind) {
    case 'day_of_month': {
      const { year, month } = yearMonth(referenceDate)
      const thisMonth = makeDate(year, month, rule.day)
      if (thisMonth >= referenceDate) return thisMonth
      const next = shiftMonth(year, month, 1)
      return makeDate(next.year, next.month, rule.day)
    }
    case 'days_after_period_end':
      return nextAfterPeriodEnd(rule.period, rule.days, referenceDate, fye)
    case 'fixed_annual_date': {
      const { year } = yearMonth(referenceDate)
      const thisYear = makeDate(year, rule.month, rule.day)
      return thisYear >= referenceDate ? thisYear : makeDate(year + 1, rule.month, rule.day)
    }
    case 'specific_date':
      return rule.date
    case 'days_after_event': {
      const eventDate = lookupEventDate(rule.event, rule.eventDate, options)
      return eventDate === null ? null : addDays(eventDate, rule.days)
    }
    case 'days_before_event': {
      const eventDate = lookupEventDate(rule.event, rule.eventDate, options)
      return eventDate === null ? null : addDays(eventDate, -rule.days)
    }
    case 'interval': {
      const elapsed = daysBetween(rule.anchorDate, referenceDate)
      const steps = elapsed <= 0 ? 0 : Math.ceil(elapsed / rule.days)
      return addDays(rule.anchorDate, steps * rule.days)
    }
    case 'non_computable':
      return null
    default: {
      const _exhaustive: never = rule
      throw new Error(`Unknown rule kind: ${JSON.stringify(_exhaustive)}`)
    }
  }
}
