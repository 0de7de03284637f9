/**
 * Agents — LLM providers used by the extraction oracle.
 */

export type { ChatMessage, ChatOptions, LLMProvider } from './provider.js'
export { providerFailure } from './provider.js'

export { AnthropicProvider } from './anthropic-provider.js'
export type { AnthropicProviderOptions } from './anthropic-provider.js'
export { OpenAIProvider } from './openai-provider.js'
export type { OpenAIProviderOptions } from './openai-provider.js'

export { createProvider, KNOWN_MODELS, DEFAULT_MODELS } from './provider-factory.js'
export type { ProviderName, ProviderConfig } from './provider-factory.js'
