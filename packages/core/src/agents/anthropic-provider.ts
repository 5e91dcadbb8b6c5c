/**
 * Anthropic (Claude) implementation of the LLM provider interface.
 */

import Anthropic from '@anthropic-ai/sdk'
import { Ok, Err, TutorDeskError, errorMessage } from '../common/index.js'
import type { Result } from '../common/index.js'
import type { GenerationSettings, LLMProvider, PromptMessage } from './provider.js'

export interface AnthropicProviderOptions {
  apiKey: string
  model?: string
  maxTokens?: number
}

/** The Messages API requires the first message to come from the user. */
export function dropLeadingAssistant(messages: PromptMessage[]): PromptMessage[] {
  const first = messages.findIndex((m) => m.role === 'user')
  return first === -1 ? [] : messages.slice(first)
}

export class AnthropicProvider implements LLMProvider {
  readonly name = 'anthropic'
  private readonly client: Anthropic
  private readonly model: string
  private readonly maxTokens: number

  constructor(options: AnthropicProviderOptions) {
    this.client = new Anthropic({ apiKey: options.apiKey })
    this.model = options.model ?? 'claude-3-5-haiku-latest'
    this.maxTokens = options.maxTokens ?? 600
  }

  async chatComplete(
    messages: PromptMessage[],
    systemPrompt: string,
    settings: GenerationSettings = {},
  ): Promise<Result<string, TutorDeskError>> {
    try {
      const response = await this.client.messages.create({
        model: this.model,
        max_tokens: settings.maxTokens ?? this.maxTokens,
        system: systemPrompt,
        ...(settings.temperature !== undefined ? { temperature: settings.temperature } : {}),
        ...(settings.topP !== undefined ? { top_p: settings.topP } : {}),
        ...(settings.stopSequences?.length ? { stop_sequences: settings.stopSequences } : {}),
        messages: dropLeadingAssistant(messages).map((m) => ({ role: m.role, content: m.content })),
      })

      const textBlock = response.content.find((block) => block.type === 'text')
      if (!textBlock || textBlock.type !== 'text') {
        return Err(TutorDeskError.llm('No text content in response'))
      }

      return Ok(textBlock.text)
    } catch (error) {
      return Err(TutorDeskError.llm(errorMessage(error)))
    }
  }
}
