/**
 * LLM provider interface and shared types.
 *
 * Providers never throw: every failure comes back as a ComplianceError
 * already sorted into retryable (ORACLE_TRANSIENT), permanent (ORACLE_FATAL)
 * or CANCELLED, so callers decide on retries without knowing the SDK.
 */

import { ComplianceError } from '../common/index.js'
import type { Result } from '../common/index.js'

export interface ChatMessage {
  role: 'user' | 'assistant'
  content: string
}

export interface ChatOptions {
  /** Aborts the in-flight request; the result is then a CANCELLED error. */
  signal?: AbortSignal
}

export interface LLMProvider {
  name: string
  chatComplete(
    messages: ChatMessage[],
    systemPrompt: string,
    options?: ChatOptions,
  ): Promise<Result<string, ComplianceError>>
}

/**
 * Map an HTTP status from a provider API onto an oracle error.
 * 401/403 and other 4xx (bad model, bad request) are fatal; 408, 409, 429,
 * 5xx and status-less network failures are transient.
 */
export function providerFailure(provider: string, status: number | undefined, message: string, cause: unknown): ComplianceError {
  const text = `${provider}: ${message}`
  if (status === undefined) return ComplianceError.oracleTransient(text, cause)
  if (status === 408 || status === 409 || status === 429 || status >= 500) {
    return ComplianceError.oracleTransient(text, cause)
  }
  return ComplianceError.oracleFatal(text, cause)
}
