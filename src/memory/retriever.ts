import { degraded, ok } from '../butler/outcome.js'
import type { Outcome } from '../butler/outcome.js'
import type { LanguageService } from '../providers/llm.js'
import type { ButlerStore, UserId } from '../storage/types.js'

export interface RetrieverOptions {
  matchThreshold: number
  matchCount: number
}

export class MemoryRetriever {
  private store: ButlerStore
  private language: LanguageService
  private options: RetrieverOptions

  constructor(params: { store: ButlerStore; language: LanguageService; options: RetrieverOptions }) {
    this.store = params.store
    this.language = params.language
    this.options = params.options
  }

  /**
   * Past messages from this user that resemble `text`, one per line in the
   * order the search returns them. Empty when nothing matches or the lookup
   * fails.
   */
  async recall(userId: UserId, text: string): Promise<Outcome<string>> {
    try {
      const embedding = await this.language.embed(text)
      const matches = await this.store.matchMemories({
        embedding,
        threshold: this.options.matchThreshold,
        count: this.options.matchCount,
        userId
      })
      console.log(`[memory] Recalled ${matches.length} memories for user ${userId}`)
      return ok(matches.map(m => m.content).join('\n'))
    } catch (e) {
      console.error('[memory] Memory search failed:', e)
      return degraded('', 'memory_search_failed', e)
    }
  }
}
