/**
 * @tutordesk/core
 *
 * Knowledge-base answering core: corpus loading, embedding index, category-aware retrieval,
 * confidence gating, conversation windowing and prompt assembly, plus the session
 * orchestrator and its collaborators (intent classification, generators, interaction log).
 */

export * from './common/index.js'
export * from './config/index.js'
export * from './corpus/index.js'
export * from './retrieval/index.js'
export * from './agents/index.js'
export * from './safety/index.js'
export * from './audit/index.js'
export * from './storage/index.js'
export * from './chat/index.js'
