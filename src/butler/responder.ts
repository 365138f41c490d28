import type { LanguageService } from '../providers/llm.js'
import { buildReplyPrompt } from './prompts.js'
import type { ReplyPromptInput } from './prompts.js'

export class ResponseGenerator {
  private language: LanguageService
  private model: string

  constructor(params: { language: LanguageService; model: string }) {
    this.language = params.language
    this.model = params.model
  }

  // Single attempt; the dispatcher owns the failure path.
  async reply(input: ReplyPromptInput): Promise<string> {
    return this.language.generate(buildReplyPrompt(input), this.model)
  }
}
