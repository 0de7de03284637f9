import { unwrap } from '../../src/common/index.js'
import { createLoanProfile, type LoanProfile, type RequirementInput } from '../../src/requirements/index.js'

const REQUIREMENTS: RequirementInput[] = [
  {
    id: 'REQ-001',
    title: 'Quarterly Financial Statements',
    category: 'financial_reporting',
    plainLanguageSummary: 'Send quarterly financial statements within 45 days after quarter end',
    severity: 'high',
    deadline: {
      description: '45 days after quarter end',
      frequency: 'quarterly',
      rule: { kind: 'days_after_period_end', period: 'quarter', days: 45 },
    },
  },
  {
    id: 'REQ-002',
    title: 'DSCR Covenant',
    category: 'covenant_compliance',
    plainLanguageSummary: 'Keep debt service coverage at or above 1.25x',
    severity: 'critical',
    status: 'at_risk',
    threshold: { metric: 'DSCR', operator: '>=', value: 1.25, unit: 'x' },
    deadline: {
      description: 'Tested quarterly',
      frequency: 'quarterly',
      rule: { kind: 'days_after_period_end', period: 'quarter', days: 0 },
    },
  },
  {
    id: 'REQ-003',
    title: 'Property Insurance',
    category: 'insurance',
    plainLanguageSummary: 'Keep the property insured and send proof before each renewal',
    severity: 'critical',
    deadline: {
      description: '30 days before policy expiration',
      frequency: 'one_time',
      rule: { kind: 'days_before_event', event: 'policy expiration', days: 30, eventDate: null },
    },
  },
  {
    id: 'REQ-004',
    title: 'Monthly Rent Roll',
    category: 'financial_reporting',
    plainLanguageSummary: 'Send the rent roll by the 15th of each month',
    severity: 'medium',
    deadline: { description: 'By the 15th of each month', frequency: 'monthly', rule: { kind: 'day_of_month', day: 15 } },
  },
  {
    id: 'REQ-005',
    title: 'Annual Budget',
    category: 'financial_reporting',
    plainLanguageSummary: 'Submit the operating budget by November 15',
    severity: 'medium',
    deadline: {
      description: 'November 15 annually',
      frequency: 'annually',
      rule: { kind: 'fixed_annual_date', month: 11, day: 15 },
    },
  },
  {
    id: 'REQ-006',
    title: 'Lease Approval',
    category: 'leasing',
    plainLanguageSummary: 'Get lender approval before signing a major lease',
    severity: 'high',
  },
  {
    id: 'REQ-007',
    title: 'Monthly Operating Statement',
    category: 'financial_reporting',
    plainLanguageSummary: 'Send the monthly operating statement by the 15th',
    severity: 'low',
    deadline: { description: 'By the 15th of each month', frequency: 'monthly', rule: { kind: 'day_of_month', day: 15 } },
  },
]

export function buildQueryProfile(): LoanProfile {
  return unwrap(
    createLoanProfile({
      loanId: 'LOAN-QUERY',
      createdAt: '2025-01-01T00:00:00.000Z',
      requirements: REQUIREMENTS,
    }),
  )
}
