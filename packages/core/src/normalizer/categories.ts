/**
 * Keyword classification of requirements into categories.
 */

import type { RequirementCategory } from '../requirements/index.js'

export interface CategoryRule {
  category: RequirementCategory
  /** Matched at a word start, so "insur" covers insure, insurance and insurer. */
  keywords: readonly string[]
}

/** Priority order: the first matching rule decides the category. */
export const DEFAULT_CATEGORY_RULES: readonly CategoryRule[] = [
  {
    category: 'covenant_compliance',
    keywords: ['dscr', 'debt service coverage', 'ltv', 'loan-to-value', 'loan to value', 'debt yield', 'covenant', 'net worth', 'liquidity'],
  },
  { category: 'insurance', keywords: ['insur', 'casualty', 'hazard coverage'] },
  { category: 'tax_escrow', keywords: ['tax', 'escrow', 'impound'] },
  { category: 'reserve_funding', keywords: ['reserve', 'sinking fund'] },
  { category: 'environmental', keywords: ['environmental', 'hazardous', 'asbestos', 'remediation'] },
  {
    category: 'financial_reporting',
    keywords: ['financial statement', 'rent roll', 'budget', 'audit', 'report', 'compliance certificate', 'operating statement'],
  },
  { category: 'leasing', keywords: ['lease', 'leasing', 'tenant'] },
  { category: 'capital_improvements', keywords: ['capital improvement', 'capex', 'renovation', 'repair'] },
  { category: 'property_management', keywords: ['property manage', 'management agreement', 'manager'] },
  {
    category: 'legal_entity',
    keywords: ['single purpose', 'special purpose', 'organizational document', 'change of control', 'transfer of interest'],
  },
]

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}

interface CompiledRule {
  category: RequirementCategory
  patterns: RegExp[]
}

const compiledCache = new WeakMap<readonly CategoryRule[], CompiledRule[]>()

function compile(rules: readonly CategoryRule[]): CompiledRule[] {
  const cached = compiledCache.get(rules)
  if (cached) return cached
  const compiled = rules.map((rule) => ({
    category: rule.category,
    patterns: rule.keywords.map((k) => new RegExp(`\\b${escapeRegExp(k.toLowerCase())}`)),
  }))
  compiledCache.set(rules, compiled)
  return compiled
}

/** Every category whose keywords occur in `text`, in rule priority order. */
export function matchCategories(text: string, rules: readonly CategoryRule[] = DEFAULT_CATEGORY_RULES): RequirementCategory[] {
  const lower = text.toLowerCase()
  const matched: RequirementCategory[] = []
  for (const rule of compile(rules)) {
    if (!matched.includes(rule.category) && rule.patterns.some((p) => p.test(lower))) {
      matched.push(rule.category)
    }
  }
  return matched
}
