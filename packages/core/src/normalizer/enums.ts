/**
 * Enum coercion for oracle guesses. Each returns null for values it cannot place;
 * the caller decides the fallback.
 */

import {
  FrequencySchema,
  RequirementCategorySchema,
  SeveritySchema,
  type Frequency,
  type RequirementCategory,
  type Severity,
} from '../requirements/index.js'

/**
 * Base enum normalizer: trim, lowercase, replace hyphens/spaces with underscores.
 */
export function normalizeEnum(raw: string): string {
  return raw.trim().toLowerCase().replace(/[\s-]+/g, '_')
}

const CATEGORY_ALIASES: Record<string, RequirementCategory> = {
  financial: 'financial_reporting',
  reporting: 'financial_reporting',
  financial_statements: 'financial_reporting',
  covenant: 'covenant_compliance',
  covenants: 'covenant_compliance',
  financial_covenant: 'covenant_compliance',
  reserve: 'reserve_funding',
  reserves: 'reserve_funding',
  tax: 'tax_escrow',
  taxes: 'tax_escrow',
  escrow: 'tax_escrow',
  capital: 'capital_improvements',
  capex: 'capital_improvements',
  management: 'property_management',
  lease: 'leasing',
  leases: 'leasing',
  legal: 'legal_entity',
  entity: 'legal_entity',
}

export function normalizeCategory(raw: string | undefined): RequirementCategory | null {
  if (raw === undefined) return null
  const normalized = normalizeEnum(raw)
  const direct = RequirementCategorySchema.safeParse(normalized)
  if (direct.success) return direct.data
  return Object.hasOwn(CATEGORY_ALIASES, normalized) ? CATEGORY_ALIASES[normalized] : null
}

const SEVERITY_ALIASES: Record<string, Severity> = {
  minor: 'low',
  moderate: 'medium',
  normal: 'medium',
  major: 'high',
  severe: 'critical',
}

export function normalizeSeverity(raw: string | undefined): Severity | null {
  if (raw === undefined) return null
  const normalized = normalizeEnum(raw)
  const direct = SeveritySchema.safeParse(normalized)
  if (direct.success) return direct.data
  return Object.hasOwn(SEVERITY_ALIASES, normalized) ? SEVERITY_ALIASES[normalized] : null
}

/** Frequencies the enum has no slot for (semi-annual, on request) land in `custom`. */
const FREQUENCY_ALIASES: Record<string, Frequency> = {
  annual: 'annually',
  yearly: 'annually',
  month: 'monthly',
  quarter: 'quarterly',
  once: 'one_time',
  onetime: 'one_time',
  semi_annual: 'custom',
  semiannual: 'custom',
  semi_annually: 'custom',
  as_needed: 'custom',
  upon_request: 'custom',
  on_demand: 'custom',
  ongoing: 'custom',
}

export function normalizeFrequency(raw: string | undefined): Frequency | null {
  if (raw === undefined) return null
  const normalized = normalizeEnum(raw)
  const direct = FrequencySchema.safeParse(normalized)
  if (direct.success) return direct.data
  return Object.hasOwn(FREQUENCY_ALIASES, normalized) ? FREQUENCY_ALIASES[normalized] : null
}
