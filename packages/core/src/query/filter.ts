/**
 * Structured requirement filters. Read-only; never fails.
 */

import {
  ComplianceStatusSchema,
  RequirementCategorySchema,
  SeveritySchema,
  type ComplianceStatus,
  type LoanProfile,
  type Requirement,
  type RequirementCategory,
  type Severity,
} from '../requirements/index.js'

/** Query-surface parameters; enum values arrive as plain strings. */
export interface RequirementFilter {
  category?: string
  severity?: string
  status?: string
  /** Case-insensitive substring of title or plain-language summary. */
  search?: string
}

function idNumber(id: string): number {
  return Number(id.slice(id.indexOf('-') + 1))
}

export function compareRequirementIds(a: Requirement, b: Requirement): number {
  return idNumber(a.id) - idNumber(b.id) || a.id.localeCompare(b.id)
}

/** Requirements in stable id order. */
export function sortById(requirements: readonly Requirement[]): Requirement[] {
  return [...requirements].sort(compareRequirementIds)
}

interface ParsedFilter {
  category?: RequirementCategory
  severity?: Severity
  status?: ComplianceStatus
  needle: string
}

/** null when an enum value is not recognized. */
function parseFilter(filter: RequirementFilter): ParsedFilter | null {
  const parsed: ParsedFilter = { needle: filter.search?.trim().toLowerCase() ?? '' }
  if (filter.category !== undefined) {
    const category = RequirementCategorySchema.safeParse(filter.category)
    if (!category.success) return null
    parsed.category = category.data
  }
  if (filter.severity !== undefined) {
    const severity = SeveritySchema.safeParse(filter.severity)
    if (!severity.success) return null
    parsed.severity = severity.data
  }
  if (filter.status !== undefined) {
    const status = ComplianceStatusSchema.safeParse(filter.status)
    if (!status.success) return null
    parsed.status = status.data
  }
  return parsed
}

/**
 * Conjunction of the given criteria. An empty filter returns everything;
 * an unknown enum value matches nothing.
 */
export function filterRequirements(profile: LoanProfile, filter: RequirementFilter = {}): Requirement[] {
  const parsed = parseFilter(filter)
  if (parsed === null) return []
  const { category, severity, status, needle } = parsed

  return sortById(profile.requirements).filter((r) => {
    if (category !== undefined && r.category !== category) return false
    if (severity !== undefined && r.severity !== severity) return false
    if (status !== undefined && r.status !== status) return false
    if (needle.length > 0) {
      return r.title.toLowerCase().includes(needle) || r.plainLanguageSummary.toLowerCase().includes(needle)
    }
    return true
  })
}

export function getRequirement(profile: LoanProfile, id: string): Requirement | null {
  return profile.requirements.find((r) => r.id === id) ?? null
}
