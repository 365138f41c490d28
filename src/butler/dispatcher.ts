import type { ContextEnricher } from '../enrichment/types.js'
import type { MemoryRetriever } from '../memory/retriever.js'
import type { ProfileAccessor } from '../memory/profiles.js'
import type { UserId, UserProfile } from '../storage/types.js'
import type { EvolutionWorker } from './evolution.js'
import type { Outcome } from './outcome.js'
import { APOLOGY_REPLY } from './prompts.js'
import type { ResponseGenerator } from './responder.js'
import type { BackgroundTasks } from './tasks.js'

export interface InboundMessage {
  userId: UserId
  chatId: string
  text: string
}

export type ReplyFn = (text: string) => Promise<void>

export type DispatchResult =
  | {
      status: 'replied'
      reply: string
      profile: Outcome<UserProfile>
      memories: Outcome<string>
      enrichment: string
    }
  | { status: 'apologized'; error: unknown }

export class MessageDispatcher {
  private profiles: ProfileAccessor
  private retriever: MemoryRetriever
  private enrichers: ContextEnricher[]
  private responder: ResponseGenerator
  private evolution: EvolutionWorker
  private tasks: BackgroundTasks

  constructor(params: {
    profiles: ProfileAccessor
    retriever: MemoryRetriever
    enrichers: ContextEnricher[]
    responder: ResponseGenerator
    evolution: EvolutionWorker
    tasks: BackgroundTasks
  }) {
    this.profiles = params.profiles
    this.retriever = params.retriever
    this.enrichers = params.enrichers
    this.responder = params.responder
    this.evolution = params.evolution
    this.tasks = params.tasks
  }

  /**
   * Answers one message. Evolution is spawned only once the reply has been
   * sent; any failure before that point is answered with the apology instead.
   */
  async handle(message: InboundMessage, reply: ReplyFn): Promise<DispatchResult> {
    const { userId, text } = message

    try {
      // 1. Who we are talking to, and what we remember of them
      const profile = await this.profiles.getOrCreate(userId)
      const memories = await this.retriever.recall(userId, text)

      // 2. Optional outside facts
      const enrichment = await this.enrich(text)

      // 3. Generate and send
      const personalitySummary = profile.value.personalitySummary
      const answer = await this.responder.reply({
        personalitySummary,
        memories,
        enrichment,
        message: text
      })
      await reply(answer)

      // 4. Learn from the exchange in the background
      this.tasks.spawn(`evolution:${userId}`, () => this.evolution.evolve({
        userId,
        userMessage: text,
        botReply: answer,
        previousSummary: personalitySummary
      }))

      return { status: 'replied', reply: answer, profile, memories, enrichment }
    } catch (e) {
      console.error(`[dispatch] Message from user ${userId} failed:`, e)
      try {
        await reply(APOLOGY_REPLY)
      } catch (sendError) {
        console.error(`[dispatch] Could not send apology to user ${userId}:`, sendError)
      }
      return { status: 'apologized', error: e }
    }
  }

  private async enrich(text: string): Promise<string> {
    const blocks: string[] = []
    for (const enricher of this.enrichers) {
      const outcome = await enricher.enrich(text)
      if (outcome.value) blocks.push(outcome.value)
    }
    return blocks.join('\n')
  }
}
