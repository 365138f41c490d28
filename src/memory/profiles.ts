import { DEFAULT_PERSONALITY_SUMMARY } from '../butler/prompts.js'
import { degraded, ok } from '../butler/outcome.js'
import type { Outcome } from '../butler/outcome.js'
import type { ButlerStore, UserId, UserProfile } from '../storage/types.js'

export class ProfileAccessor {
  private store: ButlerStore

  constructor(store: ButlerStore) {
    this.store = store
  }

  /**
   * Loads the user's profile, creating it on first contact. When the store
   * is unreachable the conversation carries on with an unsaved default.
   */
  async getOrCreate(userId: UserId): Promise<Outcome<UserProfile>> {
    try {
      const existing = await this.store.findProfile(userId)
      if (existing) {
        return ok({
          userId,
          personalitySummary: existing.personalitySummary || DEFAULT_PERSONALITY_SUMMARY
        })
      }

      const created = await this.store.createProfile(userId, DEFAULT_PERSONALITY_SUMMARY)
      console.log(`[profiles] Created profile for user ${userId}`)
      return ok(created)
    } catch (e) {
      console.error(`[profiles] Profile lookup failed for user ${userId}:`, e)
      return degraded(
        { userId, personalitySummary: DEFAULT_PERSONALITY_SUMMARY },
        'profile_unavailable',
        e
      )
    }
  }
}
