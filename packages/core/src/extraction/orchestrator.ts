/**
 * Document analysis: chunk, extract per chunk with bounded concurrency,
 * merge, normalize, and assemble a LoanProfile.
 *
 * Each analysis owns its semaphore and abort controller. Chunk failures
 * degrade the result (extraction.incomplete) instead of failing it,
 * unless every chunk fails.
 */

import { v4 as uuidv4 } from 'uuid'
import { z } from 'zod'
import { ComplianceError, Err, Ok, errorMessage, formatIssues, isComplianceError, isRetryable } from '../common/index.js'
import type { Result } from '../common/index.js'
import type { NormalizerOptions } from '../normalizer/index.js'
import { assembleProfile, type AnalysisResult } from './assemble.js'
import { chunkDocument, DEFAULT_MAX_CHUNK_CHARS, type DocumentChunk } from './chunker.js'
import { DEMO_CANDIDATES, DEMO_LOAN_INFO } from './demo.js'
import { mergeLoanInfo, type ExtractionOracle, type OracleOutput } from './oracle.js'
import { Semaphore } from './semaphore.js'

export interface AnalysisSettings {
  maxChunkChars: number
  overlapChars: number
  concurrency: number
  /** Additional attempts after the first, for transient failures only. */
  maxRetries: number
  callTimeoutMs: number
  /** Delay before retry n is retryBackoffMs[min(n, length - 1)]. */
  retryBackoffMs: readonly number[]
}

export const DEFAULT_ANALYSIS_SETTINGS: AnalysisSettings = {
  maxChunkChars: DEFAULT_MAX_CHUNK_CHARS,
  overlapChars: 200,
  concurrency: 4,
  maxRetries: 2,
  callTimeoutMs: 120_000,
  retryBackoffMs: [1_000, 4_000, 15_000],
}

const DEFAULTS = DEFAULT_ANALYSIS_SETTINGS

/** Keys left undefined take their defaults. */
const AnalysisSettingsSchema = z.object({
  maxChunkChars: z.number().int().positive().default(DEFAULTS.maxChunkChars),
  overlapChars: z.number().int().nonnegative().default(DEFAULTS.overlapChars),
  concurrency: z.number().int().positive().default(DEFAULTS.concurrency),
  maxRetries: z.number().int().nonnegative().default(DEFAULTS.maxRetries),
  callTimeoutMs: z.number().int().positive().default(DEFAULTS.callTimeoutMs),
  retryBackoffMs: z.array(z.number().nonnegative()).default([...DEFAULTS.retryBackoffMs]),
})

export function resolveAnalysisSettings(
  overrides: Partial<AnalysisSettings> = {},
): Result<AnalysisSettings, ComplianceError> {
  const parsed = AnalysisSettingsSchema.safeParse(overrides)
  return parsed.success
    ? Ok(parsed.data)
    : Err(ComplianceError.validation(`Invalid analysis settings: ${formatIssues(parsed.error)}`))
}

export interface AnalyzeDocumentInput {
  text: string
  loanId?: string
  loanName?: string
  sourceDocumentName?: string
}

export type SleepFn = (ms: number, signal: AbortSignal) => Promise<void>

export interface AnalyzeDocumentDeps {
  /** null selects mock mode: the demo dataset stands in for the oracle. */
  oracle: ExtractionOracle | null
  settings?: Partial<AnalysisSettings>
  signal?: AbortSignal
  sleep?: SleepFn
  now?: () => Date
  normalizerOptions?: NormalizerOptions
}

export type { AnalysisResult } from './assemble.js'

type ChunkOutcome =
  | { ok: true; chunkIndex: number; output: OracleOutput }
  | { ok: false; chunkIndex: number; error: ComplianceError }

interface ChunkContext {
  oracle: ExtractionOracle
  settings: AnalysisSettings
  signal: AbortSignal
  sleep: SleepFn
}

export function generateLoanId(): string {
  return `LOAN-${uuidv4().replace(/-/g, '').slice(0, 8).toUpperCase()}`
}

/** Abortable delay; rejects with CANCELLED when the signal fires. */
export const abortableSleep: SleepFn = (ms, signal) =>
  new Promise((resolve, reject) => {
    if (signal.aborted) {
      reject(ComplianceError.cancelled())
      return
    }
    const onAbort = (): void => {
      clearTimeout(timer)
      reject(ComplianceError.cancelled())
    }
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort)
      resolve()
    }, ms)
    signal.addEventListener('abort', onAbort, { once: true })
  })

/**
 * One oracle call under its own controller. The controller aborts on
 * analysis cancellation (CANCELLED) or on timeout (ORACLE_TRANSIENT); the
 * abort reason replaces whatever the oracle rejects with.
 */
async function callOracle(chunk: DocumentChunk, ctx: ChunkContext): Promise<OracleOutput> {
  const controller = new AbortController()
  const onCancel = (): void => controller.abort(ComplianceError.cancelled())
  ctx.signal.addEventListener('abort', onCancel, { once: true })
  const timer = setTimeout(
    () => controller.abort(ComplianceError.oracleTransient(`Oracle call timed out after ${ctx.settings.callTimeoutMs}ms`)),
    ctx.settings.callTimeoutMs,
  )

  try {
    return await ctx.oracle.extractCandidates(chunk.content, { signal: controller.signal })
  } catch (err) {
    if (controller.signal.aborted) throw controller.signal.reason
    throw err
  } finally {
    clearTimeout(timer)
    ctx.signal.removeEventListener('abort', onCancel)
  }
}

function backoffFor(attempt: number, backoff: readonly number[]): number {
  if (backoff.length === 0) return 0
  return backoff[Math.min(attempt, backoff.length - 1)] ?? 0
}

/** Never rejects except with CANCELLED. */
async function extractChunk(chunk: DocumentChunk, ctx: ChunkContext): Promise<ChunkOutcome> {
  for (let attempt = 0; ; attempt++) {
    if (ctx.signal.aborted) throw ComplianceError.cancelled()
    try {
      const output = await callOracle(chunk, ctx)
      return { ok: true, chunkIndex: chunk.chunkIndex, output }
    } catch (err) {
      if (ctx.signal.aborted) throw ComplianceError.cancelled()
      // A CANCELLED from the oracle without our own cancellation is a provider hiccup.
      const error =
        isComplianceError(err) && err.code !== 'CANCELLED'
          ? err
          : ComplianceError.oracleTransient(errorMessage(err), err)

      console.warn(`[extraction] Chunk ${chunk.chunkIndex} attempt ${attempt + 1} failed: ${error.message}`)
      if (!isRetryable(error) || attempt >= ctx.settings.maxRetries) {
        return { ok: false, chunkIndex: chunk.chunkIndex, error }
      }
      await ctx.sleep(backoffFor(attempt, ctx.settings.retryBackoffMs), ctx.signal)
    }
  }
}

/**
 * Analyze one loan document into a LoanProfile.
 * Never throws; every failure comes back as a ComplianceError.
 */
export async function analyzeDocument(
  input: AnalyzeDocumentInput,
  deps: AnalyzeDocumentDeps,
): Promise<Result<AnalysisResult, ComplianceError>> {
  if (deps.signal?.aborted) return Err(ComplianceError.cancelled())

  const now = deps.now ?? (() => new Date())
  const loanId = input.loanId?.trim() || generateLoanId()
  const sourceDocumentName = input.sourceDocumentName ?? ''

  if (deps.oracle === null) {
    console.info(`[extraction] No oracle configured; building mock profile for ${loanId}`)
    return assembleProfile({
      loanId,
      loanName: input.loanName ?? `Sample Loan ${loanId}`,
      sourceDocumentName,
      candidates: DEMO_CANDIDATES,
      loanInfo: DEMO_LOAN_INFO,
      extraction: { mode: 'mock', incomplete: false, chunkCount: 0, failedChunks: [] },
      createdAt: now().toISOString(),
      normalizerOptions: deps.normalizerOptions,
    })
  }

  const resolved = resolveAnalysisSettings(deps.settings)
  if (!resolved.ok) return resolved
  const settings = resolved.value

  const chunks = chunkDocument(input.text, {
    maxChunkChars: settings.maxChunkChars,
    overlapChars: settings.overlapChars,
  })
  if (chunks.length === 0) return Err(ComplianceError.validation('Document text is empty'))

  const controller = new AbortController()
  const onExternalAbort = (): void => controller.abort()
  deps.signal?.addEventListener('abort', onExternalAbort, { once: true })

  const semaphore = new Semaphore(settings.concurrency)
  const ctx: ChunkContext = {
    oracle: deps.oracle,
    settings,
    signal: controller.signal,
    sleep: deps.sleep ?? abortableSleep,
  }

  console.info(`[extraction] Analyzing ${chunks.length} chunk(s) for ${loanId}`)

  let outcomes: ChunkOutcome[]
  try {
    outcomes = await Promise.all(chunks.map((chunk) => semaphore.run(() => extractChunk(chunk, ctx))))
  } catch (err) {
    controller.abort()
    return Err(isComplianceError(err) ? err : ComplianceError.analysisFailed(errorMessage(err)))
  } finally {
    deps.signal?.removeEventListener('abort', onExternalAbort)
  }
  if (controller.signal.aborted) return Err(ComplianceError.cancelled())

  const failedChunks: number[] = []
  const candidates: unknown[] = []
  const loanInfos: OracleOutput['loanInfo'][] = []
  for (const outcome of outcomes) {
    if (outcome.ok) {
      candidates.push(...outcome.output.candidates)
      loanInfos.push(outcome.output.loanInfo)
    } else {
      failedChunks.push(outcome.chunkIndex)
    }
  }

  if (failedChunks.length === chunks.length) {
    const last = outcomes[outcomes.length - 1]
    const reason = last !== undefined && !last.ok ? `: ${last.error.message}` : ''
    return Err(ComplianceError.analysisFailed(`All ${chunks.length} chunk(s) failed${reason}`))
  }
  if (failedChunks.length > 0) {
    console.warn(`[extraction] ${failedChunks.length} of ${chunks.length} chunk(s) failed: ${failedChunks.join(', ')}`)
  }

  const result = assembleProfile({
    loanId,
    loanName: input.loanName,
    sourceDocumentName,
    candidates,
    loanInfo: mergeLoanInfo(loanInfos),
    extraction: { mode: 'live', incomplete: failedChunks.length > 0, chunkCount: chunks.length, failedChunks },
    createdAt: now().toISOString(),
    normalizerOptions: deps.normalizerOptions,
  })
  if (result.ok) {
    console.info(`[extraction] ${loanId}: ${result.value.profile.requirements.length} requirement(s)`)
  }
  return result
}
