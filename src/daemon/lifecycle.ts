import type { FastifyInstance } from 'fastify'
import { loadConfig, validateConfig } from '../config.js'
import type { ButlerConfig } from '../config.js'
import { MessageDispatcher } from '../butler/dispatcher.js'
import { EvolutionWorker } from '../butler/evolution.js'
import { ResponseGenerator } from '../butler/responder.js'
import { BackgroundTasks } from '../butler/tasks.js'
import { TelegramChannel } from '../channel/telegram.js'
import type { FatalHandler } from '../channel/telegram.js'
import { WeatherEnricher } from '../enrichment/weather.js'
import type { ContextEnricher } from '../enrichment/types.js'
import { ProfileAccessor } from '../memory/profiles.js'
import { MemoryRetriever } from '../memory/retriever.js'
import { createLanguageService } from '../providers/llm.js'
import type { LanguageService } from '../providers/llm.js'
import { buildServer } from '../server/http.js'
import { openStore } from '../storage/index.js'
import type { ButlerStore } from '../storage/types.js'

export function buildDispatcher(params: {
  config: ButlerConfig
  store: ButlerStore
  language: LanguageService
  tasks: BackgroundTasks
}): MessageDispatcher {
  const { config, store, language, tasks } = params

  const enrichers: ContextEnricher[] = []
  if (config.weather.enabled) {
    enrichers.push(new WeatherEnricher(config.weather))
  }

  return new MessageDispatcher({
    profiles: new ProfileAccessor(store),
    retriever: new MemoryRetriever({ store, language, options: config.memory }),
    enrichers,
    responder: new ResponseGenerator({ language, model: config.llm.replyModel }),
    evolution: new EvolutionWorker({ store, language, reflectionModel: config.llm.reflectionModel }),
    tasks
  })
}

/**
 * Owns every long-lived handle: built once in wake(), released in sleep().
 */
export class ButlerLifecycle {
  public config!: ButlerConfig
  public store!: ButlerStore
  public language!: LanguageService
  public tasks!: BackgroundTasks
  public dispatcher!: MessageDispatcher
  public channel!: TelegramChannel
  public server!: FastifyInstance

  async wake(options: { forcePolling?: boolean; onFatal?: FatalHandler } = {}): Promise<void> {
    // 1. Load and validate config
    this.config = loadConfig()
    if (options.forcePolling) {
      this.config.telegram.webhookUrl = undefined
    }

    const configErrors = validateConfig(this.config)
    const token = this.config.telegram.token
    if (configErrors.length > 0 || !token) {
      const details = configErrors.map(e => e.message).join('\n')
      throw new Error(`Missing configuration:\n${details}`)
    }

    // 2. Service handles
    this.store = openStore(this.config.storage)
    this.language = createLanguageService(this.config.llm)
    this.tasks = new BackgroundTasks()
    console.log(`[startup] Storage: ${this.config.storage.driver}, provider: ${this.config.llm.provider}`)
    console.log(`[startup] Models: reply=${this.config.llm.replyModel}, reflection=${this.config.llm.reflectionModel}`)

    // 3. Pipeline
    this.dispatcher = buildDispatcher({
      config: this.config,
      store: this.store,
      language: this.language,
      tasks: this.tasks
    })

    // 4. Transport
    this.channel = new TelegramChannel({ ...this.config.telegram, token })
    this.channel.onMessage((message, reply) => this.dispatcher.handle(message, reply))
    if (options.onFatal) {
      this.channel.onFatal(options.onFatal)
    }

    // 5. HTTP: liveness always, webhook route only in webhook mode
    this.server = buildServer({
      webhook: this.channel.mode === 'webhook' ? this.channel : undefined
    })
    await this.server.listen({ host: this.config.server.host, port: this.config.server.port })
    console.log(`[startup] HTTP listening on ${this.config.server.host}:${this.config.server.port}`)

    // 6. Start receiving
    await this.channel.start()
    console.log(`[startup] Butler is awake (${this.channel.mode})`)
  }

  async sleep(): Promise<void> {
    // 1. Stop taking messages
    await this.channel.stop()
    await this.server.close()

    // 2. Let in-flight evolution finish
    if (this.tasks.size > 0) {
      console.log(`[shutdown] Waiting for ${this.tasks.size} background task(s)`)
    }
    await this.tasks.drain()

    // 3. Release storage
    await this.store.close()
  }
}
