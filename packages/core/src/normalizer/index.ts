/**
 * Normalizer — raw oracle candidates to domain requirements.
 */

export { normalizeCandidates, formatRequirementId } from './normalize.js'
export type { NormalizationResult, NormalizationWarning, NormalizerOptions } from './normalize.js'

export { RawCandidateSchema } from './candidate.js'
export type { RawCandidate, RawDeadline, RawThreshold } from './candidate.js'

export { DEFAULT_CATEGORY_RULES, matchCategories } from './categories.js'
export type { CategoryRule } from './categories.js'

export { normalizeEnum, normalizeCategory, normalizeSeverity, normalizeFrequency } from './enums.js'
export { severityFor, computeSeverity } from './severity.js'
export { parseThreshold, detectMetric } from './threshold.js'
