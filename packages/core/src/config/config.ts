/**
 * Environment configuration, validated with zod.
 *
 * A missing API key is not an error: analysis then runs in mock mode on
 * the demo dataset.
 */

import type Database from 'better-sqlite3'
import { z } from 'zod'
import { ComplianceError, Err, Ok, formatIssues } from '../common/index.js'
import type { Result } from '../common/index.js'
import { DEFAULT_MODELS, createProvider, type ProviderName } from '../agents/index.js'
import { FiscalYearEndSchema, type FiscalYearEnd, type ResolverOptions } from '../deadlines/index.js'
import { DEFAULT_ANALYSIS_SETTINGS, LLMExtractionOracle, type AnalysisSettings } from '../extraction/index.js'
import { openDatabase } from '../storage/index.js'

export type Env = Readonly<Record<string, string | undefined>>

const FiscalYearEndEnvSchema = z
  .string()
  .regex(/^\d{2}-\d{2}$/, 'Fiscal year end must be MM-DD')
  .transform((s) => ({ month: Number(s.slice(0, 2)), day: Number(s.slice(3, 5)) }))
  .pipe(FiscalYearEndSchema)

const EnvSchema = z.object({
  LOAN_OBLIGATIONS_PROVIDER: z.enum(['anthropic', 'openai']).default('anthropic'),
  LOAN_OBLIGATIONS_MODEL: z.string().optional(),
  ANTHROPIC_API_KEY: z.string().optional(),
  OPENAI_API_KEY: z.string().optional(),
  LOAN_OBLIGATIONS_CHUNK_CHARS: z.coerce.number().int().min(500).default(DEFAULT_ANALYSIS_SETTINGS.maxChunkChars),
  LOAN_OBLIGATIONS_CONCURRENCY: z.coerce.number().int().min(1).max(32).default(DEFAULT_ANALYSIS_SETTINGS.concurrency),
  LOAN_OBLIGATIONS_MAX_RETRIES: z.coerce.number().int().min(0).max(10).default(DEFAULT_ANALYSIS_SETTINGS.maxRetries),
  LOAN_OBLIGATIONS_CALL_TIMEOUT_MS: z.coerce
    .number()
    .int()
    .min(1000)
    .default(DEFAULT_ANALYSIS_SETTINGS.callTimeoutMs),
  LOAN_OBLIGATIONS_FISCAL_YEAR_END: FiscalYearEndEnvSchema.default('12-31'),
  LOAN_OBLIGATIONS_DB_PATH: z.string().default('loan-obligations.db'),
})

export interface AppConfig {
  provider: ProviderName
  model: string
  /** null selects mock mode. */
  apiKey: string | null
  analysis: Pick<AnalysisSettings, 'maxChunkChars' | 'concurrency' | 'maxRetries' | 'callTimeoutMs'>
  fiscalYearEnd: FiscalYearEnd
  dbPath: string
}

/** Blank variables count as unset. */
function present(env: Env): Record<string, string> {
  const out: Record<string, string> = {}
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim().length > 0) out[key] = value.trim()
  }
  return out
}

export function loadConfig(env: Env = process.env): Result<AppConfig, ComplianceError> {
  const parsed = EnvSchema.safeParse(present(env))
  if (!parsed.success) return Err(ComplianceError.config(`Invalid configuration: ${formatIssues(parsed.error)}`))

  const e = parsed.data
  const provider = e.LOAN_OBLIGATIONS_PROVIDER
  const apiKey = provider === 'anthropic' ? e.ANTHROPIC_API_KEY : e.OPENAI_API_KEY

  return Ok({
    provider,
    model: e.LOAN_OBLIGATIONS_MODEL ?? DEFAULT_MODELS[provider],
    apiKey: apiKey ?? null,
    analysis: {
      maxChunkChars: e.LOAN_OBLIGATIONS_CHUNK_CHARS,
      concurrency: e.LOAN_OBLIGATIONS_CONCURRENCY,
      maxRetries: e.LOAN_OBLIGATIONS_MAX_RETRIES,
      callTimeoutMs: e.LOAN_OBLIGATIONS_CALL_TIMEOUT_MS,
    },
    fiscalYearEnd: e.LOAN_OBLIGATIONS_FISCAL_YEAR_END,
    dbPath: e.LOAN_OBLIGATIONS_DB_PATH,
  })
}

/** The configured LLM-backed oracle, or null (mock mode) when no API key is set. */
export function createOracleFromConfig(config: AppConfig): LLMExtractionOracle | null {
  if (config.apiKey === null) {
    console.info(`[config] No API key for ${config.provider}; analysis runs in mock mode`)
    return null
  }
  return new LLMExtractionOracle(createProvider({ provider: config.provider, model: config.model, apiKey: config.apiKey }))
}

/** Deadline options carrying the configured fiscal year end; spread into listDeadlines or checkAlerts. */
export function resolverOptionsFromConfig(config: AppConfig): ResolverOptions {
  return { fiscalYearEnd: config.fiscalYearEnd }
}

export function openDatabaseFromConfig(config: AppConfig): Database.Database {
  return openDatabase(config.dbPath)
}
