/**
 * Deadline resolver — description parsing, recurrence and evaluation.
 */

export { parseDeadlineDescription, normalizeDeadlineText } from './parser.js'
export type { ParsedDeadline } from './parser.js'

export { nextOccurrence, DEFAULT_FISCAL_YEAR_END, FiscalYearEndSchema } from './recurrence.js'
export type { FiscalYearEnd, ResolverOptions } from './recurrence.js'

export { resolveDeadline, resolveRequirementDeadline } from './resolver.js'

export { todayISO, categorizeDays, evaluateDeadline, isOverdue } from './evaluation.js'
export type { DueDateCategory, DeadlineEvaluation } from './evaluation.js'

export { addDays, daysBetween, daysInMonth, makeDate } from './calendar.js'
