/**
 * Requirement domain model — schemas, constructors, pure helpers.
 */

export {
  RequirementCategorySchema,
  SeveritySchema,
  ComplianceStatusSchema,
  FrequencySchema,
  ComparisonOperatorSchema,
  PeriodSchema,
  DeadlineRuleSchema,
  DeadlineSchema,
  ThresholdSchema,
  RequirementIdSchema,
  RequirementSchema,
  ExtractionModeSchema,
  ExtractionInfoSchema,
  CreateLoanProfileInputSchema,
  RULE_KINDS_BY_FREQUENCY,
} from './schemas.js'

export type {
  RequirementCategory,
  Severity,
  ComplianceStatus,
  Frequency,
  ComparisonOperator,
  Period,
  DeadlineRule,
  DeadlineRuleKind,
  DeadlineInput,
  Deadline,
  ThresholdInput,
  Threshold,
  RequirementInput,
  Requirement,
  ExtractionMode,
  ExtractionInfo,
  CreateLoanProfileInput,
  LoanProfile,
} from './schemas.js'

export {
  createThreshold,
  createDeadline,
  createRequirement,
  createLoanProfile,
  requirementsEqual,
  compareSeverity,
  maxSeverity,
  escalateSeverity,
  updateRequirementStatus,
  describeThreshold,
  summarizeCompliance,
  computeComplianceScore,
} from './model.js'

export type { ComplianceSummary } from './model.js'
