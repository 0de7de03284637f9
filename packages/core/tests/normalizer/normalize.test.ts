import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { normalizeCandidates, formatRequirementId } from '../../src/normalizer/normalize.js'

beforeEach(() => {
  vi.spyOn(console, 'warn').mockImplementation(() => {})
})

afterEach(() => {
  vi.restoreAllMocks()
})

describe('formatRequirementId', () => {
  it('pads to three digits', () => {
    expect(formatRequirementId(0)).toBe('REQ-001')
    expect(formatRequirementId(41)).toBe('REQ-042')
    expect(formatRequirementId(999)).toBe('REQ-1000')
  })
})

describe('normalizeCandidates', () => {
  it('normalizes a quarterly reporting obligation', () => {
    const text = 'Send your quarterly financial statements to the lender within 45 days after each quarter ends'
    const { requirements, warnings } = normalizeCandidates([
      { title: 'Quarterly Financial Statements', description: text },
    ])

    expect(warnings).toEqual([])
    expect(requirements).toEqual([
      {
        id: 'REQ-001',
        title: 'Quarterly Financial Statements',
        category: 'financial_reporting',
        plainLanguageSummary: text,
        sourceText: '',
        documentReference: '',
        deadline: {
          description: text,
          frequency: 'quarterly',
          rule: { kind: 'days_after_period_end', period: 'quarter', days: 45 },
        },
        threshold: null,
        severity: 'high',
        status: 'unknown',
        curePeriodDays: null,
      },
    ])
  })

  it('reads timing from the description or summary when no deadline is given', () => {
    const { requirements } = normalizeCandidates([
      { title: 'Rent Roll', description: 'Deliver rent roll by the 15th of each month' },
      { title: 'Operating Statement', description: 'Provide the operating statement', plain_language_summary: 'Due within 20 days after each month ends' },
      { title: 'Annual Budget', description: 'Submit the annual operating budget for approval' },
    ])
    expect(requirements.map((r) => r.deadline)).toEqual([
      {
        description: 'Deliver rent roll by the 15th of each month',
        frequency: 'monthly',
        rule: { kind: 'day_of_month', day: 15 },
      },
      {
        description: 'Due within 20 days after each month ends',
        frequency: 'monthly',
        rule: { kind: 'days_after_period_end', period: 'month', days: 20 },
      },
      null,
    ])
  })

  it('drops unusable candidates with warnings and keeps the rest', () => {
    const { requirements, warnings } = normalizeCandidates([
      42,
      {},
      { title: 'Rent Roll', description: 'Deliver rent roll by the 15th of each month' },
    ])

    expect(warnings).toEqual([
      { candidateIndex: 0, message: 'Candidate is not an object' },
      { candidateIndex: 1, message: 'Candidate has neither a title nor a description' },
    ])
    expect(requirements.map((r) => r.id)).toEqual(['REQ-001'])
    expect(requirements[0].title).toBe('Rent Roll')
    expect(console.warn).toHaveBeenCalledTimes(2)
  })

  it('synthesizes a missing title from the description', () => {
    const { requirements } = normalizeCandidates([
      { title: 123, description: 'Borrower must maintain flood insurance. Evidence is due annually.' },
    ])
    expect(requirements[0].title).toBe('Borrower must maintain flood insurance')
    expect(requirements[0].category).toBe('insurance')
    expect(requirements[0].plainLanguageSummary).toBe('Borrower must maintain flood insurance. Evidence is due annually.')
  })

  it('prefers a valid explicit category over keywords', () => {
    const { requirements } = normalizeCandidates([
      { title: 'Budget approval', description: 'Submit the annual budget', category: 'Property Management' },
    ])
    expect(requirements[0].category).toBe('property_management')
  })

  it('classifies by keyword priority when the category is unusable', () => {
    const { requirements } = normalizeCandidates([
      { title: 'DSCR certificate', description: 'Deliver a compliance certificate showing DSCR', category: 'misc' },
    ])
    expect(requirements[0].category).toBe('covenant_compliance')
    expect(requirements[0].severity).toBe('high')
  })

  it('falls back to other', () => {
    const { requirements } = normalizeCandidates([{ title: 'Notify lender of address change' }])
    expect(requirements[0].category).toBe('other')
    expect(requirements[0].severity).toBe('low')
  })

  it('parses a threshold from the description and escalates a covenant', () => {
    const { requirements } = normalizeCandidates([
      {
        title: 'DSCR Covenant',
        description: 'Maintain a debt service coverage ratio of not less than 1.25:1.00',
        category: 'covenant_compliance',
        cure_period_days: '30',
      },
    ])
    expect(requirements[0].threshold).toEqual({ metric: 'DSCR', operator: '>=', value: 1.25, unit: 'x' })
    expect(requirements[0].severity).toBe('critical')
    expect(requirements[0].curePeriodDays).toBe(30)
  })

  it('keeps a structured threshold and deadline hint', () => {
    const { requirements } = normalizeCandidates([
      {
        title: 'Replacement Reserve Deposits',
        description: 'Monthly deposits to replacement reserve',
        category: 'reserve_funding',
        severity: 'medium',
        threshold: { metric: 'Monthly Deposit', operator: '>=', value: 2500, unit: '$' },
        deadline: { description: 'Monthly with mortgage payment', frequency: 'monthly', day_of_month: 1 },
      },
    ])
    const [r] = requirements
    expect(r.threshold).toEqual({ metric: 'Monthly Deposit', operator: '>=', value: 2500, unit: '$' })
    expect(r.deadline).toEqual({
      description: 'Monthly with mortgage payment',
      frequency: 'monthly',
      rule: { kind: 'day_of_month', day: 1 },
    })
    expect(r.severity).toBe('high')
  })

  it('parses a threshold given as a string', () => {
    const { requirements } = normalizeCandidates([
      { title: 'Loan to value covenant', description: 'Keep leverage in check', threshold: 'LTV <= 75%' },
    ])
    expect(requirements[0].threshold).toEqual({ metric: 'LTV', operator: '<=', value: 75, unit: '%' })
  })

  it('never fabricates a threshold', () => {
    const { requirements } = normalizeCandidates([
      {
        title: 'Major Lease Approval',
        description: 'Lender approval required for major leases',
        original_text: 'Borrower shall not enter into any lease for more than 10,000 square feet',
      },
    ])
    expect(requirements[0].threshold).toBeNull()
    expect(requirements[0].sourceText).toBe('Borrower shall not enter into any lease for more than 10,000 square feet')
  })

  it('keeps a higher severity guess and ignores an invalid one', () => {
    const { requirements } = normalizeCandidates([
      { title: 'Lease approval', description: 'Approve leases', category: 'leasing', severity: 'high' },
      { title: 'Lease filing', description: 'File leases', category: 'leasing', severity: 'urgent' },
    ])
    expect(requirements.map((r) => r.severity)).toEqual(['high', 'medium'])
  })

  it('maps unsupported frequencies to a non-computable custom deadline', () => {
    const { requirements } = normalizeCandidates([
      { title: 'Inspection access', description: 'Allow inspections', deadline: { description: 'As needed', frequency: 'as_needed' } },
    ])
    expect(requirements[0].deadline).toEqual({
      description: 'As needed',
      frequency: 'custom',
      rule: { kind: 'non_computable', reason: 'unrecognized' },
    })
  })

  it('rejects negative cure periods', () => {
    const { requirements } = normalizeCandidates([{ title: 'Cure', description: 'Cure defaults', cure_period_days: -5 }])
    expect(requirements[0].curePeriodDays).toBeNull()
  })

  it('deduplicates on title and category, keeping the longer source text in the first slot', () => {
    const { requirements } = normalizeCandidates([
      { title: 'Annual Budget', description: 'Submit the annual operating budget', original_text: 'short' },
      { title: 'Rent Roll', description: 'Deliver the rent roll' },
      { title: '  annual   budget ', description: 'Submit the annual operating budget', original_text: 'a much longer excerpt' },
    ])
    expect(requirements.map((r) => [r.id, r.title, r.sourceText])).toEqual([
      ['REQ-001', 'annual   budget', 'a much longer excerpt'],
      ['REQ-002', 'Rent Roll', ''],
    ])
  })

  it('returns nothing for an empty batch', () => {
    expect(normalizeCandidates([])).toEqual({ requirements: [], warnings: [] })
  })
})
