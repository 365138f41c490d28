import { Bot, webhookCallback } from 'grammy'
import type { FastifyInstance } from 'fastify'
import type { InboundMessage, ReplyFn } from '../butler/dispatcher.js'

export interface TelegramConfig {
  token: string
  webhookUrl?: string
  webhookPath: string
  webhookSecret?: string
  dropPendingUpdates: boolean
}

export type MessageHandler = (message: InboundMessage, reply: ReplyFn) => Promise<unknown>

export type FatalHandler = (error: unknown) => void

interface EntityLike {
  type: string
  offset: number
}

export function isCommand(entities: readonly EntityLike[] | undefined): boolean {
  return entities?.some(e => e.type === 'bot_command' && e.offset === 0) ?? false
}

/**
 * Plain-text messages in, one reply out. Commands and non-text updates never
 * reach the handler.
 */
export class TelegramChannel {
  private bot: Bot
  private config: TelegramConfig
  private messageHandler: MessageHandler | null = null
  private fatalHandler: FatalHandler | null = null
  private polling: Promise<void> | null = null

  constructor(config: TelegramConfig) {
    this.config = config
    this.bot = new Bot(config.token)

    this.bot.on('message:text', async (ctx) => {
      if (!this.messageHandler) return

      const userId = ctx.from?.id
      if (!userId || isCommand(ctx.message.entities)) return

      const inbound: InboundMessage = {
        userId: String(userId),
        chatId: String(ctx.chat.id),
        text: ctx.message.text
      }

      await this.messageHandler(inbound, async (text) => {
        await ctx.reply(text)
      })
    })

    this.bot.catch((err) => {
      console.error('[telegram] Update handling failed:', err.error)
    })
  }

  get mode(): 'webhook' | 'polling' {
    return this.config.webhookUrl ? 'webhook' : 'polling'
  }

  onMessage(handler: MessageHandler): void {
    this.messageHandler = handler
  }

  /**
   * Called when long polling dies on its own (bad token, another instance
   * polling the same bot). Not called for a stop() we asked for.
   */
  onFatal(handler: FatalHandler): void {
    this.fatalHandler = handler
  }

  mountWebhook(app: FastifyInstance): void {
    app.post(this.config.webhookPath, webhookCallback(this.bot, 'fastify', {
      secretToken: this.config.webhookSecret,
      onTimeout: 'return'
    }))
  }

  async start(): Promise<void> {
    if (this.config.webhookUrl) {
      const url = `${this.config.webhookUrl}${this.config.webhookPath}`
      await this.bot.init()
      await this.bot.api.setWebhook(url, {
        drop_pending_updates: this.config.dropPendingUpdates,
        secret_token: this.config.webhookSecret
      })
      console.log(`[telegram] Webhook registered for @${this.bot.botInfo.username}`)
      return
    }

    // bot.start() resolves only once polling stops.
    this.polling = this.bot.start({
      drop_pending_updates: this.config.dropPendingUpdates,
      onStart: (me) => console.log(`[telegram] Polling as @${me.username}`)
    }).catch((e: unknown) => {
      console.error('[telegram] Polling stopped with an error:', e)
      if (this.fatalHandler) {
        this.fatalHandler(e)
      } else {
        throw e
      }
    })
  }

  async stop(): Promise<void> {
    if (!this.polling) return
    await this.bot.stop()
    await this.polling
    this.polling = null
  }
}
