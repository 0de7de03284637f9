import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import {
  createOracleFromConfig,
  loadConfig,
  openDatabaseFromConfig,
  resolverOptionsFromConfig,
} from '../../src/config/config.js'
import { currentSchemaVersion, LATEST_SCHEMA_VERSION } from '../../src/storage/index.js'
import { unwrap } from '../../src/common/index.js'
import { LLMExtractionOracle } from '../../src/extraction/llm-oracle.js'

beforeEach(() => {
  vi.spyOn(console, 'info').mockImplementation(() => {})
})

afterEach(() => {
  vi.restoreAllMocks()
})

describe('loadConfig', () => {
  it('applies defaults to an empty environment', () => {
    expect(loadConfig({})).toEqual({
      ok: true,
      value: {
        provider: 'anthropic',
        model: 'claude-sonnet-4-20250514',
        apiKey: null,
        analysis: { maxChunkChars: 12000, concurrency: 4, maxRetries: 2, callTimeoutMs: 120000 },
        fiscalYearEnd: { month: 12, day: 31 },
        dbPath: 'loan-obligations.db',
      },
    })
  })

  it('reads the key for the selected provider and coerces numbers', () => {
    const result = loadConfig({
      LOAN_OBLIGATIONS_PROVIDER: 'openai',
      ANTHROPIC_API_KEY: 'test-anthropic-key',
      OPENAI_API_KEY: 'test-openai-key',
      LOAN_OBLIGATIONS_CONCURRENCY: '2',
      LOAN_OBLIGATIONS_FISCAL_YEAR_END: '06-30',
    })
    expect(result.ok).toBe(true)
    if (!result.ok) return
    expect(result.value.provider).toBe('openai')
    expect(result.value.model).toBe('gpt-4o')
    expect(result.value.apiKey).toBe('test-openai-key')
    expect(result.value.analysis.concurrency).toBe(2)
    expect(result.value.fiscalYearEnd).toEqual({ month: 6, day: 30 })
  })

  it('treats blank variables as unset', () => {
    const result = loadConfig({ ANTHROPIC_API_KEY: '  ', LOAN_OBLIGATIONS_MODEL: '' })
    expect(result.ok).toBe(true)
    if (!result.ok) return
    expect(result.value.apiKey).toBeNull()
    expect(result.value.model).toBe('claude-sonnet-4-20250514')
  })

  it('rejects out-of-range values', () => {
    const result = loadConfig({ LOAN_OBLIGATIONS_CONCURRENCY: '0' })
    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error.code).toBe('CONFIG_ERROR')
    expect(result.error.message).toContain('LOAN_OBLIGATIONS_CONCURRENCY')
  })

  it('rejects a fiscal year end that is not a calendar day', () => {
    expect(loadConfig({ LOAN_OBLIGATIONS_FISCAL_YEAR_END: '02-30' }).ok).toBe(false)
    expect(loadConfig({ LOAN_OBLIGATIONS_FISCAL_YEAR_END: '2-28' }).ok).toBe(false)
    expect(loadConfig({ LOAN_OBLIGATIONS_PROVIDER: 'ollama' }).ok).toBe(false)
  })
})

describe('createOracleFromConfig', () => {
  it('returns null in mock mode', () => {
    const result = loadConfig({})
    expect(result.ok).toBe(true)
    if (result.ok) expect(createOracleFromConfig(result.value)).toBeNull()
  })

  it('wraps the configured provider', () => {
    const result = loadConfig({ ANTHROPIC_API_KEY: 'test-secret' })
    expect(result.ok).toBe(true)
    if (!result.ok) return
    const oracle = createOracleFromConfig(result.value)
    expect(oracle).toBeInstanceOf(LLMExtractionOracle)
    expect(oracle?.providerName).toBe('anthropic')
  })
})

describe('config consumers', () => {
  it('passes the fiscal year end to deadline resolution', () => {
    const config = unwrap(loadConfig({ LOAN_OBLIGATIONS_FISCAL_YEAR_END: '06-30' }))
    expect(resolverOptionsFromConfig(config)).toEqual({ fiscalYearEnd: { month: 6, day: 30 } })
  })

  it('opens and migrates the configured database', () => {
    const config = unwrap(loadConfig({ LOAN_OBLIGATIONS_DB_PATH: ':memory:' }))
    const db = openDatabaseFromConfig(config)
    try {
      expect(currentSchemaVersion(db)).toBe(LATEST_SCHEMA_VERSION)
    } finally {
      db.close()
    }
  })
})
