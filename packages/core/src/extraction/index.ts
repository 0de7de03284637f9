/**
 * Extraction — document chunking, oracle calls, and profile assembly.
 */

export { chunkDocument, DEFAULT_MAX_CHUNK_CHARS } from './chunker.js'
export type { ChunkerOptions, DocumentChunk } from './chunker.js'

export { RawLoanInfoSchema, toLoanInfo, mergeLoanInfo } from './oracle.js'
export type { ExtractionOracle, OracleCallOptions, OracleOutput, LoanInfo } from './oracle.js'

export { EXTRACTION_SYSTEM_PROMPT, buildExtractionMessage } from './prompt.js'
export { extractJsonText, parseOracleResponse } from './response-parser.js'
export { LLMExtractionOracle } from './llm-oracle.js'
export { Semaphore } from './semaphore.js'
export { assembleProfile } from './assemble.js'
export type { AnalysisResult, AssembleParams } from './assemble.js'

export {
  analyzeDocument,
  abortableSleep,
  generateLoanId,
  resolveAnalysisSettings,
  DEFAULT_ANALYSIS_SETTINGS,
} from './orchestrator.js'
export type { AnalysisSettings, AnalyzeDocumentInput, AnalyzeDocumentDeps, SleepFn } from './orchestrator.js'

export { DEMO_LOAN_ID, DEMO_LOAN_INFO, DEMO_CANDIDATES, buildDemoProfile } from './demo.js'
