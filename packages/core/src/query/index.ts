/**
 * Query engine: filters, deadline listings, alerts and question answering over a LoanProfile.
 */

export { filterRequirements, getRequirement, sortById, compareRequirementIds } from './filter.js'
export type { RequirementFilter } from './filter.js'

export { listDeadlines } from './deadlines.js'
export type { DeadlineListOptions, DeadlineEntry } from './deadlines.js'

export { checkAlerts, DEFAULT_UPCOMING_DAYS, DEFAULT_CRITICAL_UPCOMING_DAYS } from './alerts.js'
export type { AlertKind, AlertPriority, AlertOptions, ComplianceAlert } from './alerts.js'

export { askQuestion, lexicalOverlapScore, tokenize, DEFAULT_TOP_K, DEFAULT_MIN_SCORE } from './ask.js'
export type { AskOptions, RequirementScorer, ScoredRequirement } from './ask.js'
