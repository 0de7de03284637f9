/**
 * Tests for provider.ts — mapping of API failures onto oracle errors.
 */
import { describe, it, expect } from 'vitest'
import { providerFailure } from '../../src/agents/provider.js'

describe('providerFailure', () => {
  it('treats authentication and request errors as fatal', () => {
    for (const status of [400, 401, 403, 404]) {
      expect(providerFailure('anthropic', status, 'nope', null).code).toBe('ORACLE_FATAL')
    }
  })

  it('treats rate limits, timeouts and server errors as transient', () => {
    for (const status of [408, 409, 429, 500, 529]) {
      expect(providerFailure('openai', status, 'later', null).code).toBe('ORACLE_TRANSIENT')
    }
  })

  it('treats status-less network failures as transient', () => {
    expect(providerFailure('openai', undefined, 'socket hang up', null).code).toBe('ORACLE_TRANSIENT')
  })

  it('prefixes the provider name and keeps the cause', () => {
    const cause = new Error('underlying')
    const err = providerFailure('anthropic', 401, 'invalid x-api-key', cause)
    expect(err.message).toBe('anthropic: invalid x-api-key')
    expect(err.cause).toBe(cause)
  })
})
