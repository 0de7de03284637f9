/**
 * Extraction oracle contract.
 *
 * An oracle turns one chunk of document text into raw requirement
 * candidates. Implementations throw a ComplianceError on failure:
 * ORACLE_TRANSIENT (worth a retry), ORACLE_FATAL or CANCELLED. Anything
 * else thrown is treated as transient by the orchestrator.
 */

import { z } from 'zod'
import { DateStringSchema } from '../common/index.js'

export interface OracleCallOptions {
  signal: AbortSignal
}

/** Loan metadata an oracle may report alongside candidates. */
export interface LoanInfo {
  borrowerName?: string
  lenderName?: string
  propertyName?: string
  loanAmount?: number
  originationDate?: string
  maturityDate?: string
}

export interface OracleOutput {
  /** Unvalidated candidates; the normalizer validates them. */
  candidates: unknown[]
  loanInfo?: LoanInfo
}

export interface ExtractionOracle {
  extractCandidates(chunkText: string, options: OracleCallOptions): Promise<OracleOutput>
}

const OptionalName = z.string().trim().min(1).optional().catch(undefined)

/** Permissive: unusable fields are dropped, never fatal. */
export const RawLoanInfoSchema = z
  .object({
    borrower_name: OptionalName,
    lender_name: OptionalName,
    property_name: OptionalName,
    loan_amount: z.number().positive().finite().optional().catch(undefined),
    origination_date: DateStringSchema.optional().catch(undefined),
    maturity_date: DateStringSchema.optional().catch(undefined),
  })
  .passthrough()

export function toLoanInfo(raw: z.infer<typeof RawLoanInfoSchema>): LoanInfo {
  const info: LoanInfo = {}
  if (raw.borrower_name !== undefined) info.borrowerName = raw.borrower_name
  if (raw.lender_name !== undefined) info.lenderName = raw.lender_name
  if (raw.property_name !== undefined) info.propertyName = raw.property_name
  if (raw.loan_amount !== undefined) info.loanAmount = raw.loan_amount
  if (raw.origination_date !== undefined) info.originationDate = raw.origination_date
  if (raw.maturity_date !== undefined) info.maturityDate = raw.maturity_date
  return info
}

/** Field-wise merge in chunk order: the first chunk to report a field wins. */
export function mergeLoanInfo(infos: ReadonlyArray<LoanInfo | undefined>): LoanInfo {
  const merged: LoanInfo = {}
  for (const info of infos) {
    if (info === undefined) continue
    merged.borrowerName ??= info.borrowerName
    merged.lenderName ??= info.lenderName
    merged.propertyName ??= info.propertyName
    merged.loanAmount ??= info.loanAmount
    merged.originationDate ??= info.originationDate
    merged.maturityDate ??= info.maturityDate
  }
  return merged
}
