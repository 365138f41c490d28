import { describe, it, expect, vi, beforeEach } from 'vitest'

vi.mock('ai', () => ({
  generateText: vi.fn(async () => ({ text: 'Good evening.' })),
  embed: vi.fn(async () => ({ embedding: [0.1, 0.2, 0.3] }))
}))

import { embed, generateText } from 'ai'
import { createLLMProvider, createLanguageService } from '../llm.js'
import { DEFAULT_CONFIG } from '../../config.js'

describe('LLM Provider', () => {
  it('creates Gemini models by default', () => {
    const provider = createLLMProvider({ ...DEFAULT_CONFIG.llm, apiKey: 'test-key' })

    expect(provider.languageModel('gemini-2.5-flash')).toMatchObject({ modelId: 'gemini-2.5-flash' })
    expect(provider.embeddingModel('text-embedding-004')).toMatchObject({ modelId: 'text-embedding-004' })
  })

  it('creates an OpenAI-compatible provider for ollama', () => {
    const provider = createLLMProvider({
      ...DEFAULT_CONFIG.llm,
      provider: 'ollama',
      baseUrl: 'http://localhost:11434/v1'
    })

    expect(provider.languageModel('llama3.1')).toMatchObject({ modelId: 'llama3.1' })
  })
})

describe('LanguageService', () => {
  beforeEach(() => {
    vi.mocked(generateText).mockClear()
    vi.mocked(embed).mockClear()
  })

  it('generates text with the requested model', async () => {
    const language = createLanguageService({ ...DEFAULT_CONFIG.llm, apiKey: 'test-key' })

    const text = await language.generate('hello', 'gemini-3-flash-preview')

    expect(text).toBe('Good evening.')
    expect(generateText).toHaveBeenCalledWith(expect.objectContaining({
      prompt: 'hello',
      model: expect.objectContaining({ modelId: 'gemini-3-flash-preview' })
    }))
  })

  it('embeds with the configured embedding model', async () => {
    const language = createLanguageService({ ...DEFAULT_CONFIG.llm, apiKey: 'test-key' })

    const vector = await language.embed('你好')

    expect(vector).toEqual([0.1, 0.2, 0.3])
    expect(embed).toHaveBeenCalledWith(expect.objectContaining({
      value: '你好',
      model: expect.objectContaining({ modelId: 'text-embedding-004' })
    }))
  })
})
