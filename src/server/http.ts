import Fastify from 'fastify'
import type { FastifyInstance } from 'fastify'

export const LIVENESS_TEXT = "I'm alive!"

export interface WebhookMount {
  mountWebhook(app: FastifyInstance): void
}

/**
 * Liveness endpoint for the hosting platform, plus the Telegram webhook
 * route when the bot runs in webhook mode.
 */
export function buildServer(options: { webhook?: WebhookMount } = {}): FastifyInstance {
  const app = Fastify({ logger: false })

  app.get('/', async () => LIVENESS_TEXT)

  if (options.webhook) {
    options.webhook.mountWebhook(app)
  }

  return app
}
