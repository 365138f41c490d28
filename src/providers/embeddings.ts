import { embed } from 'ai'
import type { EmbeddingModel } from 'ai'

export async function generateEmbedding(
  model: EmbeddingModel<string>,
  text: string
): Promise<number[]> {
  const result = await embed({ model, value: text })
  return result.embedding
}
