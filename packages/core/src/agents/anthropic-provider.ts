/**
 * Anthropic (Claude) implementation of the LLM provider interface.
 */

import Anthropic from '@anthropic-ai/sdk'
import { Ok, Err, ComplianceError, errorMessage } from '../common/index.js'
import type { Result } from '../common/index.js'
import type { ChatMessage, ChatOptions, LLMProvider } from './provider.js'
import { providerFailure } from './provider.js'

export interface AnthropicProviderOptions {
  apiKey: string
  model?: string
  maxTokens?: number
}

export class AnthropicProvider implements LLMProvider {
  readonly name = 'anthropic'
  private readonly client: Anthropic
  private readonly model: string
  private readonly maxTokens: number

  constructor(options: AnthropicProviderOptions) {
    // Retries belong to the extraction orchestrator, not the SDK.
    this.client = new Anthropic({ apiKey: options.apiKey, maxRetries: 0 })
    this.model = options.model ?? 'claude-sonnet-4-20250514'
    this.maxTokens = options.maxTokens ?? 8192
  }

  async chatComplete(
    messages: ChatMessage[],
    systemPrompt: string,
    options: ChatOptions = {},
  ): Promise<Result<string, ComplianceError>> {
    try {
      const response = await this.client.messages.create(
        {
          model: this.model,
          max_tokens: this.maxTokens,
          system: systemPrompt,
          messages: messages.map((m) => ({ role: m.role, content: m.content })),
        },
        { signal: options.signal },
      )

      const text = response.content
        .filter((block): block is Anthropic.Messages.TextBlock => block.type === 'text')
        .map((block) => block.text)
        .join('')
      if (!text) {
        return Err(ComplianceError.oracleTransient('anthropic: No text content in response'))
      }

      return Ok(text)
    } catch (error) {
      if (error instanceof Anthropic.APIUserAbortError) return Err(ComplianceError.cancelled())
      if (error instanceof Anthropic.APIError) {
        return Err(providerFailure(this.name, error.status, error.message, error))
      }
      return Err(ComplianceError.oracleTransient(`anthropic: ${errorMessage(error)}`, error))
    }
  }
}
