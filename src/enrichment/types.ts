import type { Outcome } from '../butler/outcome.js'

/**
 * Optional prompt context pulled from outside the conversation. An enricher
 * that is not triggered by the message returns an empty string.
 */
export interface ContextEnricher {
  readonly name: string
  enrich(text: string): Promise<Outcome<string>>
}
