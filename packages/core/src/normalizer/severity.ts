/**
 * Deterministic severity: a base level per category (and reporting cadence),
 * raised by a numeric threshold, maximized over every category signal and
 * any valid oracle guess.
 */

import {
  escalateSeverity,
  maxSeverity,
  type Frequency,
  type RequirementCategory,
  type Severity,
} from '../requirements/index.js'

const BASE_SEVERITY: Record<RequirementCategory, Severity> = {
  covenant_compliance: 'high',
  insurance: 'critical',
  environmental: 'high',
  financial_reporting: 'medium',
  reserve_funding: 'medium',
  tax_escrow: 'medium',
  legal_entity: 'medium',
  leasing: 'medium',
  capital_improvements: 'medium',
  property_management: 'low',
  other: 'low',
}

export function severityFor(category: RequirementCategory, frequency: Frequency | null, hasThreshold: boolean): Severity {
  let severity = BASE_SEVERITY[category]
  if (category === 'financial_reporting' && (frequency === 'quarterly' || frequency === 'annually')) {
    severity = 'high'
  }
  if (hasThreshold) {
    severity = category === 'covenant_compliance' ? 'critical' : escalateSeverity(severity)
  }
  return severity
}

export interface SeverityInputs {
  category: RequirementCategory
  signals: readonly RequirementCategory[]
  frequency: Frequency | null
  hasThreshold: boolean
  guess: Severity | null
}

export function computeSeverity(inputs: SeverityInputs): Severity {
  const levels = inputs.signals.map((c) => severityFor(c, inputs.frequency, inputs.hasThreshold))
  if (inputs.guess !== null) levels.push(inputs.guess)
  return maxSeverity(severityFor(inputs.category, inputs.frequency, inputs.hasThreshold), ...levels)
}
