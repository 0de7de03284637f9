import { DateStringSchema } from '../common/index.js'
import {
  evaluateDeadline,
  FiscalYearEndSchema,
  todayISO,
  type DeadlineEvaluation,
  type ResolverOptions,
} from '../deadlines/index.js'
import { FrequencySchema, type Deadline, type Frequency, type LoanProfile, type Requirement } from '../requirements/index.js'
import { compareRequirementIds } from './filter.js'

export interface DeadlineListOptions extends ResolverOptions {
  /** YYYY-MM-DD; defaults to today (UTC). */
  referenceDate?: string
  frequency?: string
}

export interface DeadlineEntry {
  requirement: Requirement
  deadline: Deadline
  evaluation: DeadlineEvaluation
}

/**
 * Requirements that carry a deadline, soonest first. Non-computable
 * deadlines sort last; ties break on requirement id. An invalid
 * reference date, frequency or fiscal year end yields an empty list.
 */
export function listDeadlines(profile: LoanProfile, options: DeadlineListOptions = {}): DeadlineEntry[] {
  const referenceDate = options.referenceDate ?? todayISO()
  if (!DateStringSchema.safeParse(referenceDate).success) return []
  if (options.fiscalYearEnd !== undefined && !FiscalYearEndSchema.safeParse(options.fiscalYearEnd).success) return []

  let frequency: Frequency | undefined
  if (options.frequency !== undefined) {
    const parsed = FrequencySchema.safeParse(options.frequency)
    if (!parsed.success) return []
    frequency = parsed.data
  }

  const entries: DeadlineEntry[] = []
  for (const requirement of profile.requirements) {
    const deadline = requirement.deadline
    if (deadline === null) continue
    if (frequency !== undefined && deadline.frequency !== frequency) continue
    entries.push({ requirement, deadline, evaluation: evaluateDeadline(deadline, referenceDate, options) })
  }

  return entries.sort((a, b) => {
    const da = a.evaluation.nextDue
    const db = b.evaluation.nextDue
    if (da !== db) {
      if (da === null) return 1
      if (db === null) return -1
      return da < db ? -1 : 1
    }
    return compareRequirementIds(a.requirement, b.requirement)
  })
}
