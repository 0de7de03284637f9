import { describe, it, expect } from 'vitest'
import { resolveDeadline, resolveRequirementDeadline } from '../../src/deadlines/resolver.js'
import type { Deadline, Requirement } from '../../src/requirements/index.js'

describe('resolveDeadline', () => {
  it('replaces hints with a computable parse of the description', () => {
    const d: Deadline = {
      description: 'Within 45 days after each quarter ends',
      frequency: 'custom',
      rule: { kind: 'non_computable', reason: 'unrecognized' },
    }
    expect(resolveDeadline(d)).toEqual({
      description: 'Within 45 days after each quarter ends',
      frequency: 'quarterly',
      rule: { kind: 'days_after_period_end', period: 'quarter', days: 45 },
    })
  })

  it('keeps a computable hint when the description does not parse', () => {
    const d: Deadline = {
      description: 'Monthly, with each payment',
      frequency: 'monthly',
      rule: { kind: 'day_of_month', day: 1 },
    }
    expect(resolveDeadline(d)).toBe(d)
  })

  it('keeps the hinted frequency when neither side is computable', () => {
    const d: Deadline = {
      description: 'As requested by Lender',
      frequency: 'annually',
      rule: { kind: 'non_computable', reason: 'hint' },
    }
    expect(resolveDeadline(d)).toEqual({
      description: 'As requested by Lender',
      frequency: 'annually',
      rule: { kind: 'non_computable', reason: 'unrecognized' },
    })
  })

  it('is idempotent', () => {
    const inputs: Deadline[] = [
      { description: 'Quarterly', frequency: 'custom', rule: { kind: 'non_computable', reason: 'x' } },
      { description: 'Monthly', frequency: 'monthly', rule: { kind: 'day_of_month', day: 10 } },
      { description: 'Upon demand', frequency: 'one_time', rule: { kind: 'non_computable', reason: 'x' } },
    ]
    for (const d of inputs) {
      const once = resolveDeadline(d)
      expect(resolveDeadline(once)).toEqual(once)
    }
  })
})

describe('resolveRequirementDeadline', () => {
  const base: Requirement = {
    id: 'REQ-001',
    title: 'Rent roll',
    category: 'financial_reporting',
    plainLanguageSummary: 'Send the rent roll.',
    sourceText: '',
    documentReference: '',
    deadline: null,
    threshold: null,
    severity: 'medium',
    status: 'unknown',
    curePeriodDays: null,
  }

  it('leaves requirements without a deadline untouched', () => {
    expect(resolveRequirementDeadline(base)).toBe(base)
  })

  it('resolves the deadline of a requirement', () => {
    const req: Requirement = {
      ...base,
      deadline: { description: 'By the 15th of each month', frequency: 'custom', rule: { kind: 'non_computable', reason: 'x' } },
    }
    expect(resolveRequirementDeadline(req).deadline).toEqual({
      description: 'By the 15th of each month',
      frequency: 'monthly',
      rule: { kind: 'day_of_month', day: 15 },
    })
  })
})
