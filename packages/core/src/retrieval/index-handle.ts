/**
 * Guarded, lazily-built handle to the shared embedding index.
 *
 * The first caller of get() starts the build and every concurrent caller awaits the same
 * in-flight promise, so at most one build runs. A failed build is not cached: the next
 * get() starts over.
 */

import type { Result } from '../common/index.js'
import type { TutorDeskError } from '../common/index.js'
import type { EmbeddingIndex } from './embedding-index.js'

export type IndexLoader = () => Promise<Result<EmbeddingIndex, TutorDeskError>>

export class IndexHandle {
  private index: EmbeddingIndex | null = null
  private pending: Promise<EmbeddingIndex> | null = null
  private builds = 0
  private generation = 0

  constructor(private readonly loader: IndexLoader) {}

  /** Resolves to the built index; rejects with the load error if the build fails. */
  get(): Promise<EmbeddingIndex> {
    if (this.index) return Promise.resolve(this.index)
    if (this.pending) return this.pending

    this.builds++
    const generation = this.generation
    const build: Promise<EmbeddingIndex> = Promise.resolve()
      .then(() => this.loader())
      .then((result) => {
        if (!result.ok) throw result.error
        // Invalidated while loading: this index is stale, hand waiters the rebuilt one.
        if (generation !== this.generation) return this.get()
        this.index = result.value
        return result.value
      })
      .finally(() => {
        if (this.pending === build) this.pending = null
      })

    this.pending = build
    return build
  }

  /** The built index, or null if get() has not completed yet. */
  peek(): EmbeddingIndex | null {
    return this.index
  }

  get isReady(): boolean {
    return this.index !== null
  }

  /** Number of builds started (successful or not). */
  get buildCount(): number {
    return this.builds
  }

  /**
   * Drop the built index so the next get() rebuilds it (full corpus reload). A build already
   * in flight is discarded when it finishes; its callers receive the rebuilt index.
   */
  invalidate(): void {
    this.generation++
    this.index = null
    this.pending = null
  }
}
