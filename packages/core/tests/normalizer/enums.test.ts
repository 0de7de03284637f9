import { describe, it, expect } from 'vitest'
import {
  normalizeEnum,
  normalizeCategory,
  normalizeSeverity,
  normalizeFrequency,
} from '../../src/normalizer/enums.js'
import { matchCategories, type CategoryRule } from '../../src/normalizer/categories.js'
import { computeSeverity, severityFor } from '../../src/normalizer/severity.js'

describe('normalizeEnum', () => {
  it('trims, lowercases and joins words with underscores', () => {
    expect(normalizeEnum('  Financial Reporting ')).toBe('financial_reporting')
    expect(normalizeEnum('semi-annual')).toBe('semi_annual')
  })
})

describe('enum coercion', () => {
  it('maps categories directly and through aliases', () => {
    expect(normalizeCategory('Financial Reporting')).toBe('financial_reporting')
    expect(normalizeCategory('covenants')).toBe('covenant_compliance')
    expect(normalizeCategory('Taxes')).toBe('tax_escrow')
    expect(normalizeCategory('marketing')).toBeNull()
    expect(normalizeCategory(undefined)).toBeNull()
  })

  it('does not treat prototype keys as aliases', () => {
    expect(normalizeCategory('constructor')).toBeNull()
  })

  it('maps severities', () => {
    expect(normalizeSeverity('HIGH')).toBe('high')
    expect(normalizeSeverity('moderate')).toBe('medium')
    expect(normalizeSeverity('urgent')).toBeNull()
  })

  it('maps frequencies without a slot onto custom', () => {
    expect(normalizeFrequency('Annual')).toBe('annually')
    expect(normalizeFrequency('semi-annual')).toBe('custom')
    expect(normalizeFrequency('upon request')).toBe('custom')
    expect(normalizeFrequency('quarterly')).toBe('quarterly')
    expect(normalizeFrequency('fortnightly')).toBeNull()
  })
})

describe('matchCategories', () => {
  it('returns every matching category in priority order', () => {
    expect(matchCategories('Deliver a compliance certificate showing DSCR')).toEqual([
      'covenant_compliance',
      'financial_reporting',
    ])
  })

  it('matches keywords at word starts only', () => {
    expect(matchCategories('Notify the lender')).toEqual([])
    expect(matchCategories('Maintain insurance')).toEqual(['insurance'])
  })

  it('accepts a custom rule table', () => {
    const rules: CategoryRule[] = [{ category: 'environmental', keywords: ['mold'] }]
    expect(matchCategories('Mold inspection report', rules)).toEqual(['environmental'])
  })
})

describe('severity', () => {
  it('uses the category base level', () => {
    expect(severityFor('insurance', null, false)).toBe('critical')
    expect(severityFor('property_management', null, false)).toBe('low')
  })

  it('raises periodic financial reporting', () => {
    expect(severityFor('financial_reporting', 'monthly', false)).toBe('medium')
    expect(severityFor('financial_reporting', 'quarterly', false)).toBe('high')
  })

  it('escalates on a threshold', () => {
    expect(severityFor('covenant_compliance', null, true)).toBe('critical')
    expect(severityFor('reserve_funding', 'monthly', true)).toBe('high')
  })

  it('takes the maximum across signals and the guess', () => {
    expect(
      computeSeverity({ category: 'leasing', signals: ['leasing'], frequency: null, hasThreshold: false, guess: null }),
    ).toBe('medium')
    expect(
      computeSeverity({ category: 'leasing', signals: ['leasing', 'environmental'], frequency: null, hasThreshold: false, guess: null }),
    ).toBe('high')
    expect(
      computeSeverity({ category: 'other', signals: [], frequency: null, hasThreshold: false, guess: 'critical' }),
    ).toBe('critical')
  })
})
