/**
 * Common utilities — shared types, Result pattern, error handling.
 */

export { Ok, Err, unwrap, isOk, isErr } from './result.js'
export type { Result } from './result.js'

export { ComplianceError, isComplianceError, isRetryable, errorMessage } from './errors.js'
export type { ErrorCode } from './errors.js'

export { TimestampSchema, DateStringSchema, NonEmptyStringSchema, formatIssues } from './schemas.js'
