/**
 * Process-wide application context. Created once at startup; owns the single IndexHandle
 * and hands it to every session explicitly.
 */

import type Database from 'better-sqlite3'
import { v4 as uuidv4 } from 'uuid'
import type { Result } from '../common/index.js'
import type { TutorDeskError } from '../common/index.js'
import type { AppConfig } from '../config/index.js'
import { loadCorpusFile } from '../corpus/index.js'
import type { CorpusEntry } from '../corpus/index.js'
import {
  createEmbeddingClient,
  EmbeddingIndex,
  IndexHandle,
  Retriever,
} from '../retrieval/index.js'
import type { EmbeddingClient } from '../retrieval/index.js'
import { createProvider, GENERATION_SETTINGS } from '../agents/index.js'
import type { GenerateOptions, LLMProvider } from '../agents/index.js'
import { InteractionLogRepository, SqliteInteractionSink } from '../audit/index.js'
import type { InteractionSink } from '../audit/index.js'
import { openDatabase } from '../storage/index.js'
import { ChatSession } from './session.js'
import { FixedWindowRateLimiter } from './rate-limiter.js'

export interface AppDependencies {
  embeddingClient?: EmbeddingClient
  /** Null disables generation explicitly. */
  provider?: LLMProvider | null
  sink?: InteractionSink
  /** Corpus source; defaults to reading `config.corpusPath`. */
  loadEntries?: () => Promise<Result<CorpusEntry[], TutorDeskError>>
  generateOptions?: GenerateOptions
  now?: () => number
}

function resolveProvider(config: AppConfig): LLMProvider | null {
  if (!config.generator.apiKey) {
    console.warn(`[app] no API key for ${config.generator.provider}; generation disabled`)
    return null
  }
  return createProvider({
    provider: config.generator.provider,
    model: config.generator.model,
    apiKey: config.generator.apiKey,
    maxTokens: config.generator.maxTokens,
  })
}

export class AppContext {
  private constructor(
    readonly config: AppConfig,
    readonly embeddingClient: EmbeddingClient,
    readonly indexHandle: IndexHandle,
    readonly retriever: Retriever,
    readonly provider: LLMProvider | null,
    readonly sink: InteractionSink,
    readonly interactionLog: InteractionLogRepository | null,
    private readonly db: Database.Database | null,
    private readonly deps: AppDependencies,
  ) {}

  static create(config: AppConfig, deps: AppDependencies = {}): AppContext {
    const embeddingClient = deps.embeddingClient ?? createEmbeddingClient(config.embedding)
    const loadEntries = deps.loadEntries ?? (() => loadCorpusFile(config.corpusPath))

    const indexHandle = new IndexHandle(async () => {
      const entries = await loadEntries()
      if (!entries.ok) return entries
      return EmbeddingIndex.build(entries.value, embeddingClient)
    })

    const retriever = new Retriever(indexHandle, embeddingClient, {
      pool: config.pool,
      ranking: { categoryScoreFloor: config.categoryScoreFloor },
    })

    const provider = deps.provider !== undefined ? deps.provider : resolveProvider(config)

    let db: Database.Database | null = null
    let interactionLog: InteractionLogRepository | null = null
    let sink = deps.sink
    if (!sink) {
      db = openDatabase(config.databasePath)
      interactionLog = new InteractionLogRepository(db)
      sink = new SqliteInteractionSink(interactionLog)
    }

    return new AppContext(config, embeddingClient, indexHandle, retriever, provider, sink, interactionLog, db, deps)
  }

  /** Build the index now instead of on the first question. Rejects with the load error. */
  async warmUp(): Promise<void> {
    await this.indexHandle.get()
  }

  createSession(sessionId: string = uuidv4()): ChatSession {
    return new ChatSession({
      retriever: this.retriever,
      provider: this.provider,
      sink: this.sink,
      sessionId,
      topK: this.config.topK,
      confidenceThreshold: this.config.confidenceThreshold,
      historyTurns: this.config.historyTurns,
      rateLimiter: new FixedWindowRateLimiter(
        this.config.rateLimit.maxRequests,
        this.config.rateLimit.windowMs,
        this.deps.now,
      ),
      generateOptions: {
        settings: { ...GENERATION_SETTINGS, maxTokens: this.config.generator.maxTokens },
        ...this.deps.generateOptions,
      },
      now: this.deps.now,
    })
  }

  close(): void {
    this.db?.close()
  }
}
