/**
 * OpenAI implementation of the LLM provider interface.
 */

import OpenAI from 'openai'
import { Ok, Err, ComplianceError, errorMessage } from '../common/index.js'
import type { Result } from '../common/index.js'
import type { ChatMessage, ChatOptions, LLMProvider } from './provider.js'
import { providerFailure } from './provider.js'

export interface OpenAIProviderOptions {
  apiKey: string
  model?: string
  maxTokens?: number
  baseUrl?: string
}

export class OpenAIProvider implements LLMProvider {
  readonly name = 'openai'
  private readonly client: OpenAI
  private readonly model: string
  private readonly maxTokens: number

  constructor(options: OpenAIProviderOptions) {
    this.client = new OpenAI({
      apiKey: options.apiKey,
      maxRetries: 0,
      ...(options.baseUrl ? { baseURL: options.baseUrl } : {}),
    })
    this.model = options.model ?? 'gpt-4o'
    this.maxTokens = options.maxTokens ?? 8192
  }

  async chatComplete(
    messages: ChatMessage[],
    systemPrompt: string,
    options: ChatOptions = {},
  ): Promise<Result<string, ComplianceError>> {
    try {
      const response = await this.client.chat.completions.create(
        {
          model: this.model,
          max_tokens: this.maxTokens,
          messages: [
            { role: 'system', content: systemPrompt },
            ...messages.map((m) => ({ role: m.role, content: m.content })),
          ],
        },
        { signal: options.signal },
      )

      const content = response.choices[0]?.message?.content
      if (!content) {
        return Err(ComplianceError.oracleTransient('openai: No text content in response'))
      }

      return Ok(content)
    } catch (error) {
      if (error instanceof OpenAI.APIUserAbortError) return Err(ComplianceError.cancelled())
      if (error instanceof OpenAI.APIError) {
        return Err(providerFailure(this.name, error.status, error.message, error))
      }
      return Err(ComplianceError.oracleTransient(`openai: ${errorMessage(error)}`, error))
    }
  }
}
