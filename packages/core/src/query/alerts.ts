import { DateStringSchema } from '../common/index.js'
import { todayISO, type ResolverOptions } from '../deadlines/index.js'
import type { LoanProfile, Requirement, Severity } from '../requirements/index.js'
import { sortById } from './filter.js'
import { listDeadlines } from './deadlines.js'

export type AlertKind = 'deadline_overdue' | 'deadline_upcoming' | 'covenant_at_risk' | 'covenant_breach'

export type AlertPriority = 'high' | 'medium'

export interface ComplianceAlert {
  kind: AlertKind
  priority: AlertPriority
  requirementId: string
  title: string
  severity: Severity
  /** Set for deadline alerts only. */
  nextDue: string | null
  daysUntilDue: number | null
  message: string
}

export interface AlertOptions extends ResolverOptions {
  /** YYYY-MM-DD; defaults to today (UTC). */
  referenceDate?: string
  /** Any deadline due within this many days alerts. Defaults to 7. */
  upcomingDays?: number
  /** Critical deadlines alert from this many days out. Defaults to 30. */
  criticalUpcomingDays?: number
}

export const DEFAULT_UPCOMING_DAYS = 7
export const DEFAULT_CRITICAL_UPCOMING_DAYS = 30

function plural(n: number): string {
  return n === 1 ? `${n} day` : `${n} days`
}

function deadlineAlert(requirement: Requirement, nextDue: string, days: number, options: AlertOptions): ComplianceAlert | null {
  const upcoming = options.upcomingDays ?? DEFAULT_UPCOMING_DAYS
  const criticalUpcoming = options.criticalUpcomingDays ?? DEFAULT_CRITICAL_UPCOMING_DAYS
  const base = {
    requirementId: requirement.id,
    title: requirement.title,
    severity: requirement.severity,
    nextDue,
    daysUntilDue: days,
  }

  if (days < 0) {
    return { ...base, kind: 'deadline_overdue', priority: 'high', message: `${requirement.title} is ${plural(-days)} overdue` }
  }
  if (days <= upcoming) {
    return { ...base, kind: 'deadline_upcoming', priority: 'high', message: `${requirement.title} is due in ${plural(days)}` }
  }
  if (days <= criticalUpcoming && requirement.severity === 'critical') {
    return { ...base, kind: 'deadline_upcoming', priority: 'medium', message: `${requirement.title} is due in ${plural(days)}` }
  }
  return null
}

function covenantAlert(requirement: Requirement): ComplianceAlert | null {
  if (requirement.threshold === null) return null
  if (requirement.status !== 'at_risk' && requirement.status !== 'non_compliant') return null
  const breach = requirement.status === 'non_compliant'
  return {
    kind: breach ? 'covenant_breach' : 'covenant_at_risk',
    priority: 'high',
    requirementId: requirement.id,
    title: requirement.title,
    severity: requirement.severity,
    nextDue: null,
    daysUntilDue: null,
    message: breach ? `${requirement.title} is in breach` : `${requirement.title} is at risk`,
  }
}

/**
 * Alerts a loan needs attention for: overdue and imminent deadlines (soonest
 * first), then covenants whose status is at risk or non-compliant (by id).
 * Statuses are read, never changed. An invalid reference date yields no alerts.
 */
export function checkAlerts(profile: LoanProfile, options: AlertOptions = {}): ComplianceAlert[] {
  const referenceDate = options.referenceDate ?? todayISO()
  if (!DateStringSchema.safeParse(referenceDate).success) return []

  const alerts: ComplianceAlert[] = []
  const deadlineOptions = { fiscalYearEnd: options.fiscalYearEnd, eventDates: options.eventDates, referenceDate }
  for (const { requirement, evaluation } of listDeadlines(profile, deadlineOptions)) {
    if (evaluation.nextDue === null || evaluation.daysUntilDue === null) continue
    const alert = deadlineAlert(requirement, evaluation.nextDue, evaluation.daysUntilDue, options)
    if (alert) alerts.push(alert)
  }
  for (const requirement of sortById(profile.requirements)) {
    const alert = covenantAlert(requirement)
    if (alert) alerts.push(alert)
  }
  return alerts
}
