import { describe, it, expect } from 'vitest'
import { listDeadlines } from '../../src/query/deadlines.js'
import { buildQueryProfile } from './fixtures.js'

const profile = buildQueryProfile()

describe('listDeadlines', () => {
  it('lists soonest first with non-computable deadlines last and ties by id', () => {
    const entries = listDeadlines(profile, { referenceDate: '2025-03-10' })
    expect(entries.map((e) => [e.requirement.id, e.evaluation.nextDue])).toEqual([
      ['REQ-004', '2025-03-15'],
      ['REQ-007', '2025-03-15'],
      ['REQ-002', '2025-03-31'],
      ['REQ-001', '2025-05-15'],
      ['REQ-005', '2025-11-15'],
      ['REQ-003', null],
    ])
  })

  it('orders the same way whatever the input order', () => {
    const reversed = { ...profile, requirements: [...profile.requirements].reverse() }
    const ids = (p: typeof profile) => listDeadlines(p, { referenceDate: '2025-03-10' }).map((e) => e.requirement.id)
    expect(ids(reversed)).toEqual(ids(profile))
  })

  it('evaluates urgency relative to the reference date', () => {
    const [first] = listDeadlines(profile, { referenceDate: '2025-03-10' })
    expect(first.evaluation).toEqual({ nextDue: '2025-03-15', daysUntilDue: 5, dueCategory: 'this-week' })
  })

  it('skips requirements without a deadline', () => {
    const entries = listDeadlines(profile, { referenceDate: '2025-03-10' })
    expect(entries.map((e) => e.requirement.id)).not.toContain('REQ-006')
  })

  it('returns nothing for an out-of-range fiscal year end', () => {
    expect(listDeadlines(profile, { referenceDate: '2025-01-01', fiscalYearEnd: { month: 13, day: 31 } })).toEqual([])
  })

  it('filters by frequency', () => {
    const entries = listDeadlines(profile, { referenceDate: '2025-03-10', frequency: 'monthly' })
    expect(entries.map((e) => e.requirement.id)).toEqual(['REQ-004', 'REQ-007'])
  })

  it('computes event deadlines once the event date is known', () => {
    const entries = listDeadlines(profile, {
      referenceDate: '2025-03-10',
      eventDates: { 'policy expiration': '2025-06-30' },
    })
    const insurance = entries.find((e) => e.requirement.id === 'REQ-003')
    expect(insurance?.evaluation.nextDue).toBe('2025-05-31')
  })

  it('returns an empty list for an unknown frequency or a malformed date', () => {
    expect(listDeadlines(profile, { referenceDate: '2025-03-10', frequency: 'weekly' })).toEqual([])
    expect(listDeadlines(profile, { referenceDate: 'March 10' })).toEqual([])
  })
})
