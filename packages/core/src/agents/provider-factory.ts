/**
 * Creates generator instances from configuration.
 */

import type { LLMProvider } from './provider.js'
import { AnthropicProvider } from './anthropic-provider.js'
import { OpenAIProvider } from './openai-provider.js'

export type ProviderName = 'anthropic' | 'openai'

export interface ProviderConfig {
  provider: ProviderName
  model?: string
  apiKey?: string
  maxTokens?: number
}

/** Default model per provider, used when the config names none. */
export const DEFAULT_MODELS: Record<ProviderName, string> = {
  anthropic: 'claude-3-5-haiku-latest',
  openai: 'gpt-4o-mini',
}

/**
 * Create a provider instance from configuration.
 * Throws if the API key is missing.
 */
export function createProvider(config: ProviderConfig): LLMProvider {
  const model = config.model ?? DEFAULT_MODELS[config.provider]
  switch (config.provider) {
    case 'anthropic': {
      if (!config.apiKey) throw new Error('Anthropic API key is required')
      return new AnthropicProvider({ apiKey: config.apiKey, model, maxTokens: config.maxTokens })
    }
    case 'openai': {
      if (!config.apiKey) throw new Error('OpenAI API key is required')
      return new OpenAIProvider({ apiKey: config.apiKey, model, maxTokens: config.maxTokens })
    }
    default: {
      const _exhaustive: never = config.provider
      throw new Error(`Unknown provider: ${_exhaustive}`)
    }
  }
}
