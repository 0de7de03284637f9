import { describe, it, expect } from 'vitest'

describe('@loan-obligations/core', () => {
  it('exposes the pipeline entry points', async () => {
    const core = await import('../src/index.js')
    expect(typeof core.analyzeDocument).toBe('function')
    expect(typeof core.normalizeCandidates).toBe('function')
    expect(typeof core.filterRequirements).toBe('function')
    expect(typeof core.askQuestion).toBe('function')
    expect(typeof core.LoanProfileRepository).toBe('function')
  })
})
