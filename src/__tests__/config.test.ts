import { describe, it, expect, afterEach } from 'vitest'
import { writeFileSync, unlinkSync, existsSync } from 'fs'
import { DEFAULT_CONFIG, loadConfig, validateConfig } from '../config.js'

const TEST_CONFIG = '/tmp/butler-config-test.json'
const MISSING_CONFIG = '/tmp/butler-config-does-not-exist.json'

describe('loadConfig', () => {
  afterEach(() => {
    if (existsSync(TEST_CONFIG)) unlinkSync(TEST_CONFIG)
  })

  it('falls back to defaults with an empty environment', () => {
    const config = loadConfig({ env: {}, configPath: MISSING_CONFIG })

    expect(config.telegram.token).toBeUndefined()
    expect(config.telegram.webhookUrl).toBeUndefined()
    expect(config.llm.provider).toBe('google')
    expect(config.llm.replyModel).toBe('gemini-2.5-flash')
    expect(config.llm.reflectionModel).toBe('gemini-3-flash-preview')
    expect(config.memory).toEqual({ matchThreshold: 0.4, matchCount: 3 })
    expect(config.weather.timeoutMs).toBe(3000)
    expect(config.server.port).toBe(8080)
  })

  it('reads secrets and endpoints from the environment', () => {
    const config = loadConfig({
      env: {
        TELEGRAM_TOKEN: 'test-token',
        GEMINI_API_KEY: 'test-key',
        SUPABASE_URL: 'http://supabase.test',
        SUPABASE_KEY: 'test-secret',
        WEBHOOK_URL: 'https://butler.example.com/',
        PORT: '10000'
      },
      configPath: MISSING_CONFIG
    })

    expect(config.telegram.token).toBe('test-token')
    expect(config.telegram.webhookUrl).toBe('https://butler.example.com')
    expect(config.llm.apiKey).toBe('test-key')
    expect(config.storage.supabaseUrl).toBe('http://supabase.test')
    expect(config.storage.supabaseKey).toBe('test-secret')
    expect(config.server.port).toBe(10000)
  })

  it('uses the hosting platform URL when no webhook URL is given', () => {
    const config = loadConfig({
      env: { RENDER_EXTERNAL_URL: 'https://butler.onrender.example' },
      configPath: MISSING_CONFIG
    })
    expect(config.telegram.webhookUrl).toBe('https://butler.onrender.example')
  })

  it('merges the config file over the defaults', () => {
    writeFileSync(TEST_CONFIG, JSON.stringify({
      llm: { provider: 'openai', replyModel: 'gpt-4o-mini' },
      storage: { driver: 'sqlite' }
    }))

    const config = loadConfig({ env: { OPENAI_API_KEY: 'test-key' }, configPath: TEST_CONFIG })

    expect(config.llm.provider).toBe('openai')
    expect(config.llm.replyModel).toBe('gpt-4o-mini')
    expect(config.llm.reflectionModel).toBe('gemini-3-flash-preview')
    expect(config.llm.apiKey).toBe('test-key')
    expect(config.storage.driver).toBe('sqlite')
    expect(config.storage.dbPath).toBe('~/.butler/butler.db')
  })

  it('ignores a config file that is not valid JSON', () => {
    writeFileSync(TEST_CONFIG, '{ not json')
    const config = loadConfig({ env: {}, configPath: TEST_CONFIG })
    expect(config.llm.provider).toBe('google')
  })

  it('does not leak overrides into the defaults', () => {
    loadConfig({ env: { TELEGRAM_TOKEN: 'test-token' }, configPath: MISSING_CONFIG })
    expect(DEFAULT_CONFIG.telegram.token).toBeUndefined()
  })
})

describe('validateConfig', () => {
  it('reports every missing secret', () => {
    const config = loadConfig({ env: {}, configPath: MISSING_CONFIG })
    const fields = validateConfig(config).map(e => e.field)
    expect(fields).toEqual(['telegram.token', 'llm.apiKey', 'storage.supabaseUrl', 'storage.supabaseKey'])
  })

  it('accepts a complete configuration', () => {
    const config = loadConfig({
      env: {
        TELEGRAM_TOKEN: 'test-token',
        GEMINI_API_KEY: 'test-key',
        SUPABASE_URL: 'http://supabase.test',
        SUPABASE_KEY: 'test-secret'
      },
      configPath: MISSING_CONFIG
    })
    expect(validateConfig(config)).toEqual([])
  })

  it('needs only the bot token for local storage with ollama', () => {
    const config = loadConfig({
      env: { TELEGRAM_TOKEN: 'test-token', BUTLER_STORAGE: 'sqlite' },
      configPath: MISSING_CONFIG
    })
    config.llm.provider = 'ollama'
    expect(validateConfig(config)).toEqual([])
  })
})
