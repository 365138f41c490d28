import type { LanguageService } from '../providers/llm.js'
import type { ButlerStore, UserId } from '../storage/types.js'
import { buildReflectionPrompt } from './prompts.js'

export interface EvolutionJob {
  userId: UserId
  userMessage: string
  botReply: string
  previousSummary: string
}

export interface EvolutionReport {
  chatLogged: boolean
  memoryStored: boolean
  personality: 'updated' | 'reflection_failed' | 'update_failed'
}

/**
 * Runs after a reply has gone out: records the exchange, stores the message
 * as a long-term memory, and asks the reflection model for a new personality
 * summary. Each step stands alone; a failure is logged and the next step runs.
 */
export class EvolutionWorker {
  private store: ButlerStore
  private language: LanguageService
  private reflectionModel: string

  constructor(params: { store: ButlerStore; language: LanguageService; reflectionModel: string }) {
    this.store = params.store
    this.language = params.language
    this.reflectionModel = params.reflectionModel
  }

  async evolve(job: EvolutionJob): Promise<EvolutionReport> {
    const chatLogged = await this.logExchange(job)
    const memoryStored = await this.storeMemory(job)
    const personality = await this.reflect(job)

    console.log(`[evolution] user=${job.userId} log=${chatLogged} memory=${memoryStored} personality=${personality}`)
    return { chatLogged, memoryStored, personality }
  }

  private async logExchange(job: EvolutionJob): Promise<boolean> {
    try {
      await this.store.insertChatLog({
        userId: job.userId,
        userMessage: job.userMessage,
        botReply: job.botReply
      })
      return true
    } catch (e) {
      console.error('[evolution] Chat log insert failed:', e)
      return false
    }
  }

  private async storeMemory(job: EvolutionJob): Promise<boolean> {
    try {
      const embedding = await this.language.embed(job.userMessage)
      await this.store.insertMemory({ userId: job.userId, content: job.userMessage, embedding })
      return true
    } catch (e) {
      console.error('[evolution] Memory insert failed:', e)
      return false
    }
  }

  private async reflect(job: EvolutionJob): Promise<EvolutionReport['personality']> {
    let summary: string
    try {
      summary = await this.language.generate(
        buildReflectionPrompt(job.userMessage, job.previousSummary),
        this.reflectionModel
      )
    } catch (e) {
      console.warn('[evolution] Reflection paused (quota?):', e)
      return 'reflection_failed'
    }

    // Overwrites whatever was there, as returned.
    try {
      await this.store.updatePersonality(job.userId, summary)
      return 'updated'
    } catch (e) {
      console.error('[evolution] Personality update failed:', e)
      return 'update_failed'
    }
  }
}
