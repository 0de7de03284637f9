/**
 * Pure functions for deadline evaluation — no DB access, fully testable.
 */

import type { Deadline } from '../requirements/index.js'
import { daysBetween } from './calendar.js'
import { nextOccurrence, type ResolverOptions } from './recurrence.js'

/** UTC YYYY-MM-DD. Single source of truth for "today". */
export function todayISO(): string {
  return new Date().toISOString().slice(0, 10)
}

export type DueDateCategory = 'overdue' | 'today' | 'this-week' | 'upcoming' | 'future'

/** Positive = future, 0 = today, negative = overdue. */
export function categorizeDays(days: number): DueDateCategory {
  if (days < 0) return 'overdue'
  if (days === 0) return 'today'
  if (days <= 7) return 'this-week'
  if (days <= 30) return 'upcoming'
  return 'future'
}

export interface DeadlineEvaluation {
  nextDue: string | null
  daysUntilDue: number | null
  dueCategory: DueDateCategory | 'non_computable'
}

/**
 * Next due date and urgency bucket relative to `referenceDate` (defaults to today).
 * Only a one-time deadline whose date has passed can come out `overdue`;
 * a malformed reference date comes out `non_computable`.
 */
export function evaluateDeadline(
  deadline: Deadline,
  referenceDate?: string,
  options: ResolverOptions = {},
): DeadlineEvaluation {
  const ref = referenceDate ?? todayISO()
  const nextDue = nextOccurrence(deadline.rule, ref, options)
  if (nextDue === null) return { nextDue: null, daysUntilDue: null, dueCategory: 'non_computable' }
  const days = daysBetween(ref, nextDue)
  return { nextDue, daysUntilDue: days, dueCategory: categorizeDays(days) }
}

/** A deadline is overdue when its next due date is strictly before the reference date. */
export function isOverdue(deadline: Deadline, referenceDate?: string, options: ResolverOptions = {}): boolean {
  return evaluateDeadline(deadline, referenceDate, options).dueCategory === 'overdue'
}
