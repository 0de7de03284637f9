import { describe, it, expect } from 'vitest'
import { LLMExtractionOracle } from '../../src/extraction/llm-oracle.js'
import { EXTRACTION_SYSTEM_PROMPT } from '../../src/extraction/prompt.js'
import type { ChatMessage, ChatOptions, LLMProvider } from '../../src/agents/provider.js'
import { ComplianceError, Err, Ok } from '../../src/common/index.js'
import type { Result } from '../../src/common/index.js'

class FakeProvider implements LLMProvider {
  name = 'fake'
  received: Array<{ messages: ChatMessage[]; systemPrompt: string; options?: ChatOptions }> = []

  constructor(private readonly reply: Result<string, ComplianceError>) {}

  async chatComplete(messages: ChatMessage[], systemPrompt: string, options?: ChatOptions): Promise<Result<string, ComplianceError>> {
    this.received.push({ messages, systemPrompt, options })
    return this.reply
  }
}

describe('LLMExtractionOracle', () => {
  it('sends the chunk wrapped in document tags and parses the reply', async () => {
    const provider = new FakeProvider(Ok('{"requirements":[{"title":"Rent Roll"}]}'))
    const oracle = new LLMExtractionOracle(provider)
    const controller = new AbortController()

    const output = await oracle.extractCandidates('Borrower shall deliver a rent roll.', { signal: controller.signal })

    expect(output).toEqual({ candidates: [{ title: 'Rent Roll' }] })
    expect(oracle.providerName).toBe('fake')
    expect(provider.received).toHaveLength(1)
    expect(provider.received[0].messages).toEqual([
      { role: 'user', content: '<document>\nBorrower shall deliver a rent roll.\n</document>' },
    ])
    expect(provider.received[0].systemPrompt).toBe(EXTRACTION_SYSTEM_PROMPT)
    expect(provider.received[0].options?.signal).toBe(controller.signal)
  })

  it('rethrows the provider error unchanged', async () => {
    const error = ComplianceError.oracleFatal('fake: invalid api key')
    const oracle = new LLMExtractionOracle(new FakeProvider(Err(error)))
    await expect(oracle.extractCandidates('text', { signal: new AbortController().signal })).rejects.toBe(error)
  })

  it('turns an unparseable reply into a transient error', async () => {
    const oracle = new LLMExtractionOracle(new FakeProvider(Ok('I could not find any obligations.')))
    await expect(
      oracle.extractCandidates('text', { signal: new AbortController().signal }),
    ).rejects.toMatchObject({ code: 'ORACLE_TRANSIENT' })
  })
})
