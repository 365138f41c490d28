import { loadConfig, validateConfig } from '../config.js'
import type { ButlerConfig } from '../config.js'
import { ButlerLifecycle } from '../daemon/lifecycle.js'
import { MemoryRetriever } from '../memory/retriever.js'
import { createLanguageService } from '../providers/llm.js'
import { openStore } from '../storage/index.js'
import type { ButlerStore } from '../storage/types.js'

function printConfigErrors(config: ButlerConfig): boolean {
  const errors = validateConfig(config)
  if (errors.length === 0) return false

  console.error('Cannot start butler, missing configuration:\n')
  for (const err of errors) {
    console.error(`  ${err.message}\n`)
  }
  return true
}

async function withStore(run: (store: ButlerStore, config: ButlerConfig) => Promise<void>): Promise<void> {
  const config = loadConfig()
  const store = openStore(config.storage)
  try {
    await run(store, config)
  } finally {
    await store.close()
  }
}

export async function startCommand(options: { polling?: boolean }): Promise<void> {
  if (printConfigErrors(loadConfig())) {
    process.exit(1)
  }

  const lifecycle = new ButlerLifecycle()

  let stopping = false
  const shutdown = async (exitCode: number) => {
    if (stopping) return
    stopping = true
    console.log('\n[shutdown] Butler is going to sleep...')
    await lifecycle.sleep()
    process.exit(exitCode)
  }

  const shutdownOrDie = (exitCode: number) => {
    shutdown(exitCode).catch((e) => { console.error('[shutdown] Failed:', e); process.exit(1) })
  }

  // Polling that dies on its own exits 1.
  await lifecycle.wake({
    forcePolling: options.polling,
    onFatal: () => shutdownOrDie(1)
  })

  process.on('SIGTERM', () => shutdownOrDie(0))
  process.on('SIGINT', () => shutdownOrDie(0))
}

export async function checkConfigCommand(): Promise<void> {
  const config = loadConfig()
  if (printConfigErrors(config)) {
    process.exit(1)
  }

  const mode = config.telegram.webhookUrl
    ? `webhook (${config.telegram.webhookUrl}${config.telegram.webhookPath})`
    : 'polling'
  console.log('')
  console.log('  Butler Configuration')
  console.log('  --------------------')
  console.log(`  Inbound mode:      ${mode}`)
  console.log(`  Storage:           ${config.storage.driver}`)
  console.log(`  Provider:          ${config.llm.provider}`)
  console.log(`  Reply model:       ${config.llm.replyModel}`)
  console.log(`  Reflection model:  ${config.llm.reflectionModel}`)
  console.log(`  Embedding model:   ${config.llm.embeddingModel}`)
  console.log(`  HTTP:              ${config.server.host}:${config.server.port}`)
  console.log('')
}

export async function profileCommand(userId: string): Promise<void> {
  await withStore(async (store) => {
    const profile = await store.findProfile(userId)
    if (!profile) {
      console.log(`No profile for user ${userId}.`)
      return
    }
    console.log(`\n  Profile: ${profile.userId}`)
    console.log('  ' + '-'.repeat(40))
    console.log(`  ${profile.personalitySummary}\n`)
  })
}

export async function historyCommand(userId: string, options: { limit?: string }): Promise<void> {
  const limit = Number.parseInt(options.limit ?? '10', 10)
  if (!Number.isInteger(limit) || limit <= 0) {
    console.log(`Invalid limit: ${options.limit}`)
    return
  }

  await withStore(async (store) => {
    const logs = await store.recentChatLogs(userId, limit)
    if (logs.length === 0) {
      console.log('No chat history found.')
      return
    }

    // Oldest first reads like a transcript
    for (const log of [...logs].reverse()) {
      console.log(`\n--- ${log.createdAt.toISOString()} ---`)
      console.log(`User:   ${log.userMessage}`)
      console.log(`Butler: ${log.botReply}`)
    }
    console.log('')
  })
}

export async function recallCommand(userId: string, query: string): Promise<void> {
  await withStore(async (store, config) => {
    const retriever = new MemoryRetriever({
      store,
      language: createLanguageService(config.llm),
      options: config.memory
    })
    const outcome = await retriever.recall(userId, query)

    if (outcome.status === 'degraded') {
      console.log(`Memory search failed: ${outcome.reason}`)
      return
    }
    if (!outcome.value) {
      console.log('No related memories.')
      return
    }
    console.log(`\n${outcome.value}\n`)
  })
}
