/**
 * Provider factory — creates LLM provider instances from configuration.
 *
 * Custom model strings are always accepted; the lists below are the ones
 * extraction has been run against.
 */

import type { LLMProvider } from './provider.js'
import { AnthropicProvider } from './anthropic-provider.js'
import { OpenAIProvider } from './openai-provider.js'

export type ProviderName = 'anthropic' | 'openai'

export interface ProviderConfig {
  provider: ProviderName
  model: string
  apiKey?: string
  maxTokens?: number
}

export const KNOWN_MODELS: Record<ProviderName, string[]> = {
  anthropic: ['claude-sonnet-4-20250514', 'claude-haiku-4-5-20251001'],
  openai: ['gpt-4o', 'gpt-4o-mini', 'gpt-4-turbo'],
}

/** Default model per provider, used when no model is configured. */
export const DEFAULT_MODELS: Record<ProviderName, string> = {
  anthropic: 'claude-sonnet-4-20250514',
  openai: 'gpt-4o',
}

/**
 * Create a provider instance from configuration.
 * Throws if the API key is missing.
 */
export function createProvider(config: ProviderConfig): LLMProvider {
  switch (config.provider) {
    case 'anthropic': {
      if (!config.apiKey) throw new Error('Anthropic API key is required')
      return new AnthropicProvider({
        apiKey: config.apiKey,
        model: config.model,
        maxTokens: config.maxTokens,
      })
    }
    case 'openai': {
      if (!config.apiKey) throw new Error('OpenAI API key is required')
      return new OpenAIProvider({
        apiKey: config.apiKey,
        model: config.model,
        maxTokens: config.maxTokens,
      })
    }
    default: {
      const _exhaustive: never = config.provider
      throw new Error(`Unknown provider: ${_exhaustive}`)
    }
  }
}
