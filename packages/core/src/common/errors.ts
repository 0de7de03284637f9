/**
 * Typed error class for loan obligation operations.
 */

export type ErrorCode =
  | 'VALIDATION_ERROR'
  | 'NORMALIZATION_ERROR'
  | 'ORACLE_TRANSIENT'
  | 'ORACLE_FATAL'
  | 'ANALYSIS_FAILED'
  | 'CANCELLED'
  | 'NOT_FOUND'
  | 'DB_ERROR'
  | 'PARSE_ERROR'
  | 'CONFIG_ERROR'

export class ComplianceError extends Error {
  readonly code: ErrorCode

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'ComplianceError'
    this.code = code
  }

  /** Malformed domain model construction. Fatal to the record, not the batch. */
  static validation(message: string): ComplianceError {
    return new ComplianceError('VALIDATION_ERROR', message)
  }

  /** Unusable extraction candidate. Dropped with a warning. */
  static normalization(message: string): ComplianceError {
    return new ComplianceError('NORMALIZATION_ERROR', message)
  }

  /** Retryable oracle failure: timeout, rate limit, malformed response. */
  static oracleTransient(message: string, cause?: unknown): ComplianceError {
    return new ComplianceError('ORACLE_TRANSIENT', message, { cause })
  }

  /** Non-retryable oracle failure, e.g. bad credentials. */
  static oracleFatal(message: string, cause?: unknown): ComplianceError {
    return new ComplianceError('ORACLE_FATAL', message, { cause })
  }

  static analysisFailed(message: string): ComplianceError {
    return new ComplianceError('ANALYSIS_FAILED', message)
  }

  static cancelled(message = 'Analysis cancelled'): ComplianceError {
    return new ComplianceError('CANCELLED', message)
  }

  static notFound(entity: string, id: string): ComplianceError {
    return new ComplianceError('NOT_FOUND', `${entity} not found: ${id}`)
  }

  static db(message: string): ComplianceError {
    return new ComplianceError('DB_ERROR', message)
  }

  static parse(message: string): ComplianceError {
    return new ComplianceError('PARSE_ERROR', message)
  }

  static config(message: string): ComplianceError {
    return new ComplianceError('CONFIG_ERROR', message)
  }
}

export function isComplianceError(err: unknown): err is ComplianceError {
  return err instanceof ComplianceError
}

/** Only ORACLE_TRANSIENT failures are worth another attempt. */
export function isRetryable(err: unknown): boolean {
  return isComplianceError(err) && err.code === 'ORACLE_TRANSIENT'
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
