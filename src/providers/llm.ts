import { createGoogleGenerativeAI } from '@ai-sdk/google'
import { createOpenAI } from '@ai-sdk/openai'
import { generateText } from 'ai'
import type { EmbeddingModel, LanguageModel } from 'ai'
import type { ButlerConfig } from '../config.js'
import { generateEmbedding } from './embeddings.js'

export interface LLMProvider {
  languageModel: (modelId: string) => LanguageModel
  embeddingModel: (modelId: string) => EmbeddingModel<string>
}

/**
 * The text side of the bot: one embedding model shared by recall and memory
 * writes, and text generation against whichever model the caller names.
 */
export interface LanguageService {
  embed(text: string): Promise<number[]>
  generate(prompt: string, modelId: string): Promise<string>
}

export function createLLMProvider(config: ButlerConfig['llm']): LLMProvider {
  if (config.provider === 'google') {
    const google = createGoogleGenerativeAI({
      apiKey: config.apiKey,
      baseURL: config.baseUrl
    })
    return {
      languageModel: (modelId) => google(modelId),
      embeddingModel: (modelId) => google.textEmbeddingModel(modelId)
    }
  }

  // OpenAI, OpenRouter and Ollama all speak the OpenAI wire format.
  // chat() rather than the default Responses API, which only OpenAI serves.
  const openai = createOpenAI({
    apiKey: config.apiKey,
    baseURL: config.baseUrl,
    name: config.provider
  })
  return {
    languageModel: (modelId) => openai.chat(modelId),
    embeddingModel: (modelId) => openai.textEmbeddingModel(modelId)
  }
}

export function createLanguageService(config: ButlerConfig['llm']): LanguageService {
  const provider = createLLMProvider(config)
  const embeddingModel = provider.embeddingModel(config.embeddingModel)

  return {
    embed: (text) => generateEmbedding(embeddingModel, text),
    async generate(prompt, modelId) {
      const { text } = await generateText({
        model: provider.languageModel(modelId),
        prompt
      })
      return text
    }
  }
}
