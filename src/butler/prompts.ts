import type { Outcome } from './outcome.js'

export const DEFAULT_PERSONALITY_SUMMARY = '觀察中'
export const NO_MEMORIES = '尚無相關回憶。'
export const APOLOGY_REPLY = '抱歉，我現在有點短路，請稍後再試。'

export interface ReplyPromptInput {
  personalitySummary: string
  memories: Outcome<string>
  enrichment: string
  message: string
}

// A failed search leaves the memory line blank; only a search that ran and
// matched nothing says so.
function renderMemories(memories: Outcome<string>): string {
  if (memories.status === 'degraded') return ''
  return memories.value || NO_MEMORIES
}

export function buildReplyPrompt(input: ReplyPromptInput): string {
  const lines = [
    `你是一位專業管家。當前認知：${input.personalitySummary}`,
    `記憶：${renderMemories(input.memories)}`
  ]
  if (input.enrichment) {
    lines.push(input.enrichment)
  }

  return `${lines.join('\n')}\n\n主人說：${input.message}`
}

export function buildReflectionPrompt(message: string, previousSummary: string): string {
  return `分析此對話並更新描述：${message}。目前認知：${previousSummary}`
}
