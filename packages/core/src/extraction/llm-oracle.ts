/**
 * ExtractionOracle backed by an LLMProvider.
 */

import type { LLMProvider } from '../agents/index.js'
import { ComplianceError } from '../common/index.js'
import type { ExtractionOracle, OracleCallOptions, OracleOutput } from './oracle.js'
import { EXTRACTION_SYSTEM_PROMPT, buildExtractionMessage } from './prompt.js'
import { parseOracleResponse } from './response-parser.js'

export class LLMExtractionOracle implements ExtractionOracle {
  constructor(private readonly provider: LLMProvider) {}

  get providerName(): string {
    return this.provider.name
  }

  /** Malformed JSON is ORACLE_TRANSIENT, the same as a provider outage. */
  async extractCandidates(chunkText: string, options: OracleCallOptions): Promise<OracleOutput> {
    const response = await this.provider.chatComplete(
      [{ role: 'user', content: buildExtractionMessage(chunkText) }],
      EXTRACTION_SYSTEM_PROMPT,
      { signal: options.signal },
    )
    if (!response.ok) throw response.error

    const parsed = parseOracleResponse(response.value)
    if (!parsed.ok) throw ComplianceError.oracleTransient(parsed.error.message, parsed.error)
    return parsed.value
  }
}
