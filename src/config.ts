import { readFileSync, existsSync } from 'node:fs'
import { homedir } from 'node:os'
import path from 'node:path'

export type LLMProviderName = 'google' | 'openai' | 'openrouter' | 'ollama'
export type StorageDriver = 'supabase' | 'sqlite'

export interface ButlerConfig {
  telegram: {
    token?: string
    webhookUrl?: string
    webhookPath: string
    webhookSecret?: string
    dropPendingUpdates: boolean
  }
  llm: {
    provider: LLMProviderName
    apiKey?: string
    baseUrl?: string
    replyModel: string
    reflectionModel: string
    embeddingModel: string
  }
  storage: {
    driver: StorageDriver
    supabaseUrl?: string
    supabaseKey?: string
    dbPath: string
  }
  memory: {
    matchThreshold: number
    matchCount: number
  }
  weather: {
    enabled: boolean
    endpoint: string
    timeoutMs: number
    defaultLocation: string
  }
  server: {
    host: string
    port: number
  }
}

export interface ConfigError {
  field: string
  message: string
}

export const DEFAULT_CONFIG: ButlerConfig = {
  telegram: {
    webhookPath: '/telegram/webhook',
    dropPendingUpdates: true
  },
  llm: {
    provider: 'google',
    replyModel: 'gemini-2.5-flash',
    reflectionModel: 'gemini-3-flash-preview',
    embeddingModel: 'text-embedding-004'
  },
  storage: {
    driver: 'supabase',
    dbPath: '~/.butler/butler.db'
  },
  memory: {
    matchThreshold: 0.4,
    matchCount: 3
  },
  weather: {
    enabled: true,
    endpoint: 'https://wttr.in',
    timeoutMs: 3000,
    defaultLocation: 'Taipei'
  },
  server: {
    host: '0.0.0.0',
    port: 8080
  }
}

export const CONFIG_PATH = path.join(homedir(), '.butler', 'config.json')

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target }
  for (const key of Object.keys(source)) {
    const incoming = source[key]
    const existing = target[key]
    if (isRecord(incoming)) {
      result[key] = deepMerge(isRecord(existing) ? existing : {}, incoming)
    } else {
      result[key] = incoming
    }
  }
  return result
}

function readConfigFile(configPath: string): Record<string, unknown> {
  if (!existsSync(configPath)) return {}

  try {
    const parsed: unknown = JSON.parse(readFileSync(configPath, 'utf-8'))
    if (isRecord(parsed)) return parsed
    console.error(`[config] Ignoring ${configPath}: expected a JSON object`)
  } catch (e) {
    console.error('[config] Failed to load config file:', e)
  }
  return {}
}

/**
 * Layers the defaults, the optional JSON file and the environment, in that
 * order. The file path comes from BUTLER_CONFIG when set.
 */
export function loadConfig(options: { env?: NodeJS.ProcessEnv; configPath?: string } = {}): ButlerConfig {
  const env = options.env ?? process.env
  const configPath = options.configPath ?? env.BUTLER_CONFIG ?? CONFIG_PATH

  const merged = deepMerge(
    structuredClone(DEFAULT_CONFIG) as unknown as Record<string, unknown>,
    readConfigFile(configPath)
  ) as unknown as ButlerConfig

  const webhookUrl = env.WEBHOOK_URL || env.RENDER_EXTERNAL_URL
  if (env.TELEGRAM_TOKEN) merged.telegram.token = env.TELEGRAM_TOKEN
  if (webhookUrl) merged.telegram.webhookUrl = webhookUrl.replace(/\/+$/, '')
  if (env.TELEGRAM_WEBHOOK_SECRET) merged.telegram.webhookSecret = env.TELEGRAM_WEBHOOK_SECRET

  const apiKey = merged.llm.provider === 'google'
    ? env.GEMINI_API_KEY
    : env.OPENAI_API_KEY
  if (apiKey) merged.llm.apiKey = apiKey

  if (env.BUTLER_STORAGE === 'sqlite' || env.BUTLER_STORAGE === 'supabase') {
    merged.storage.driver = env.BUTLER_STORAGE
  }
  if (env.SUPABASE_URL) merged.storage.supabaseUrl = env.SUPABASE_URL
  if (env.SUPABASE_KEY) merged.storage.supabaseKey = env.SUPABASE_KEY
  if (env.BUTLER_DB_PATH) merged.storage.dbPath = env.BUTLER_DB_PATH

  if (env.PORT) {
    const port = Number.parseInt(env.PORT, 10)
    if (Number.isInteger(port) && port > 0) merged.server.port = port
  }

  return merged
}

export function validateConfig(config: ButlerConfig): ConfigError[] {
  const errors: ConfigError[] = []

  if (!config.telegram.token) {
    errors.push({
      field: 'telegram.token',
      message: 'TELEGRAM_TOKEN is not set. Create a bot with @BotFather and export its token.'
    })
  }

  if (!config.llm.apiKey && config.llm.provider !== 'ollama') {
    const variable = config.llm.provider === 'google' ? 'GEMINI_API_KEY' : 'OPENAI_API_KEY'
    errors.push({
      field: 'llm.apiKey',
      message: `${variable} is not set. The ${config.llm.provider} provider needs an API key.`
    })
  }

  if (config.storage.driver === 'supabase') {
    if (!config.storage.supabaseUrl) {
      errors.push({ field: 'storage.supabaseUrl', message: 'SUPABASE_URL is not set.' })
    }
    if (!config.storage.supabaseKey) {
      errors.push({ field: 'storage.supabaseKey', message: 'SUPABASE_KEY is not set.' })
    }
  }

  return errors
}

export function resolveDbPath(dbPath: string): string {
  return dbPath.startsWith('~') ? path.join(homedir(), dbPath.slice(1)) : dbPath
}
