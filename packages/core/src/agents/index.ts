/**
 * Agents — confidence gating, conversation windowing, context assembly, and the generator
 * contract with its OpenAI and Anthropic implementations.
 */

export type {
  ChatRole,
  ConversationTurn,
  PromptMessage,
  GenerationSettings,
  LLMProvider,
} from './provider.js'
export { isRateLimitError } from './provider.js'

export { AnthropicProvider, dropLeadingAssistant } from './anthropic-provider.js'
export type { AnthropicProviderOptions } from './anthropic-provider.js'
export { OpenAIProvider } from './openai-provider.js'
export type { OpenAIProviderOptions } from './openai-provider.js'
export { createProvider, DEFAULT_MODELS } from './provider-factory.js'
export type { ProviderName, ProviderConfig } from './provider-factory.js'

export { needsClarification, CONFIDENCE_THRESHOLD } from './confidence-gate.js'
export { windowTurns, priorTurnsWindow, DEFAULT_HISTORY_TURNS } from './conversation-window.js'
export {
  assembleContext,
  buildContext,
  renderChunk,
  renderHeader,
  renderInstructions,
  renderAugmentedMessage,
  NO_CONTENT_CONTEXT,
  NO_CONTENT_NOTE,
} from './context-assembler.js'
export type { AssembleInput } from './context-assembler.js'

export {
  SYSTEM_PROMPT,
  CLARIFICATION_RESPONSE,
  SAFE_RESPONSE,
  LEAKAGE_BLOCK_RESPONSE,
  GENERATION_SETTINGS,
} from './prompts.js'
export { validateResponse } from './response-guard.js'
export type { GuardedResponse } from './response-guard.js'
export { generateAnswer } from './generation.js'
export type { GenerateOptions, GeneratedAnswer } from './generation.js'
