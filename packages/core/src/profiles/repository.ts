import type Database from 'better-sqlite3'
import { z } from 'zod'
import { ComplianceError, Err, Ok, errorMessage } from '../common/index.js'
import type { Result } from '../common/index.js'
import { createLoanProfile, updateRequirementStatus, type LoanProfile } from '../requirements/index.js'

const ProfileRowSchema = z.object({
  loan_id: z.string(),
  profile_json: z.string(),
})

const SummaryRowSchema = z.object({
  loan_id: z.string(),
  loan_name: z.string(),
  borrower_name: z.string(),
  requirement_count: z.number().int(),
  created_at: z.string(),
  updated_at: z.string(),
})

export interface LoanProfileSummary {
  loanId: string
  loanName: string
  borrowerName: string
  requirementCount: number
  createdAt: string
  updatedAt: string
}

/**
 * LoanProfile store. Profiles are validated on the way in and on the way
 * out; the store owns cross-request state, the core holds none.
 */
export class LoanProfileRepository {
  constructor(
    private db: Database.Database,
    private now: () => Date = () => new Date(),
  ) {}

  /** Insert or replace by loanId. */
  save(profile: LoanProfile): Result<LoanProfile, ComplianceError> {
    const validated = createLoanProfile(profile)
    if (!validated.ok) return validated
    const p = validated.value
    const now = this.now().toISOString()

    try {
      this.db
        .prepare(
          `INSERT INTO loan_profiles (loan_id, loan_name, borrower_name, requirement_count, profile_json, created_at, updated_at)
           VALUES (?, ?, ?, ?, ?, ?, ?)
           ON CONFLICT(loan_id) DO UPDATE SET
             loan_name = excluded.loan_name,
             borrower_name = excluded.borrower_name,
             requirement_count = excluded.requirement_count,
             profile_json = excluded.profile_json,
             updated_at = excluded.updated_at`,
        )
        .run(p.loanId, p.loanName, p.borrowerName, p.requirements.length, JSON.stringify(p), now, now)
      return Ok(p)
    } catch (e) {
      return Err(ComplianceError.db(errorMessage(e)))
    }
  }

  getById(loanId: string): Result<LoanProfile, ComplianceError> {
    let raw: unknown
    try {
      raw = this.db.prepare('SELECT loan_id, profile_json FROM loan_profiles WHERE loan_id = ?').get(loanId)
    } catch (e) {
      return Err(ComplianceError.db(errorMessage(e)))
    }
    if (raw === undefined) return Err(ComplianceError.notFound('Loan profile', loanId))

    const row = ProfileRowSchema.safeParse(raw)
    if (!row.success) return Err(ComplianceError.db(`Malformed row for loan ${loanId}`))

    let json: unknown
    try {
      json = JSON.parse(row.data.profile_json)
    } catch (e) {
      return Err(ComplianceError.db(`Stored profile for loan ${loanId} is not valid JSON: ${errorMessage(e)}`))
    }
    const profile = createLoanProfile(json)
    if (!profile.ok) return Err(ComplianceError.db(`Stored profile for loan ${loanId} failed validation: ${profile.error.message}`))
    return profile
  }

  /** Most recently updated first. */
  list(): Result<LoanProfileSummary[], ComplianceError> {
    try {
      const rows = z
        .array(SummaryRowSchema)
        .parse(
          this.db
            .prepare(
              'SELECT loan_id, loan_name, borrower_name, requirement_count, created_at, updated_at FROM loan_profiles ORDER BY updated_at DESC, loan_id ASC',
            )
            .all(),
        )
      return Ok(
        rows.map((r) => ({
          loanId: r.loan_id,
          loanName: r.loan_name,
          borrowerName: r.borrower_name,
          requirementCount: r.requirement_count,
          createdAt: r.created_at,
          updatedAt: r.updated_at,
        })),
      )
    } catch (e) {
      return Err(ComplianceError.db(errorMessage(e)))
    }
  }

  delete(loanId: string): Result<void, ComplianceError> {
    try {
      const info = this.db.prepare('DELETE FROM loan_profiles WHERE loan_id = ?').run(loanId)
      if (info.changes === 0) return Err(ComplianceError.notFound('Loan profile', loanId))
      return Ok(undefined)
    } catch (e) {
      return Err(ComplianceError.db(errorMessage(e)))
    }
  }

  /** Status is owned by callers; this is the only mutation after analysis. */
  updateRequirementStatus(loanId: string, requirementId: string, status: string): Result<LoanProfile, ComplianceError> {
    const current = this.getById(loanId)
    if (!current.ok) return current
    const updated = updateRequirementStatus(current.value, requirementId, status)
    if (!updated.ok) return updated
    return this.save(updated.value)
  }
}
