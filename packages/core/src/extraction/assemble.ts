import { ComplianceError, Err, Ok } from '../common/index.js'
import type { Result } from '../common/index.js'
import { normalizeCandidates, type NormalizationWarning, type NormalizerOptions } from '../normalizer/index.js'
import { createLoanProfile, type ExtractionInfo, type LoanProfile } from '../requirements/index.js'
import type { LoanInfo } from './oracle.js'

export interface AnalysisResult {
  profile: LoanProfile
  /** Candidates the normalizer dropped. */
  warnings: NormalizationWarning[]
}

export interface AssembleParams {
  loanId: string
  loanName?: string
  sourceDocumentName: string
  candidates: readonly unknown[]
  loanInfo: LoanInfo
  extraction: ExtractionInfo
  createdAt: string
  normalizerOptions?: NormalizerOptions
}

/** Normalize merged candidates and wrap them, with loan metadata, in a LoanProfile. */
export function assembleProfile(params: AssembleParams): Result<AnalysisResult, ComplianceError> {
  const { requirements, warnings } = normalizeCandidates(params.candidates, params.normalizerOptions)

  const profile = createLoanProfile({
    loanId: params.loanId,
    loanName: params.loanName,
    propertyName: params.loanInfo.propertyName,
    borrowerName: params.loanInfo.borrowerName,
    lenderName: params.loanInfo.lenderName,
    originalLoanAmount: params.loanInfo.loanAmount ?? null,
    originationDate: params.loanInfo.originationDate ?? null,
    maturityDate: params.loanInfo.maturityDate ?? null,
    sourceDocumentName: params.sourceDocumentName,
    createdAt: params.createdAt,
    requirements,
    extraction: params.extraction,
  })
  if (!profile.ok) return Err(ComplianceError.analysisFailed(profile.error.message))

  return Ok({ profile: profile.value, warnings })
}
