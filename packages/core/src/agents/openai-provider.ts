/**
 * OpenAI implementation of the LLM provider interface.
 */

import OpenAI from 'openai'
import { Ok, Err, TutorDeskError, errorMessage } from '../common/index.js'
import type { Result } from '../common/index.js'
import type { GenerationSettings, LLMProvider, PromptMessage } from './provider.js'

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
      ...(options.baseUrl ? { baseURL: options.baseUrl } : {}),
    })
    this.model = options.model ?? 'gpt-4o-mini'
    this.maxTokens = options.maxTokens ?? 600
  }

  async chatComplete(
    messages: PromptMessage[],
    systemPrompt: string,
    settings: GenerationSettings = {},
  ): Promise<Result<string, TutorDeskError>> {
    try {
      const response = await this.client.chat.completions.create({
        model: this.model,
        max_tokens: settings.maxTokens ?? this.maxTokens,
        ...(settings.temperature !== undefined ? { temperature: settings.temperature } : {}),
        ...(settings.topP !== undefined ? { top_p: settings.topP } : {}),
        ...(settings.stopSequences?.length ? { stop: settings.stopSequences.slice(0, 4) } : {}),
        messages: [
          { role: 'system', content: systemPrompt },
          ...messages.map((m) => ({ role: m.role, content: m.content })),
        ],
      })

      const content = response.choices?.[0]?.message?.content
      if (!content) {
        return Err(TutorDeskError.llm('No text content in response'))
      }

      return Ok(content)
    } catch (error) {
      return Err(TutorDeskError.llm(errorMessage(error)))
    }
  }
}
