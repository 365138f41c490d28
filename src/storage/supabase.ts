import { createClient } from '@supabase/supabase-js'
import type { SupabaseClient } from '@supabase/supabase-js'
import { z } from 'zod'
import type {
  ButlerStore,
  ChatLogEntry,
  MemoryEntry,
  MemoryMatch,
  MemoryQuery,
  StoredChatLog,
  UserId,
  UserProfile
} from './types.js'

export const MATCH_MEMORIES_RPC = 'match_memories'

const idSchema = z.union([z.string(), z.number()]).transform(String)

const profileRows = z.array(z.object({
  user_id: idSchema,
  personality_summary: z.string().nullable()
}))

const chatLogRows = z.array(z.object({
  id: idSchema,
  user_id: idSchema,
  user_message: z.string(),
  bot_reply: z.string(),
  created_at: z.string()
}))

const matchRows = z.array(z.object({
  content: z.string(),
  similarity: z.number().optional()
}))

interface SupabaseFailure {
  message: string
}

function fail(operation: string, error: SupabaseFailure): never {
  throw new Error(`Supabase ${operation} failed: ${error.message}`)
}

export function createSupabaseStore(url: string, key: string): SupabaseStore {
  const client = createClient(url, key, {
    auth: { persistSession: false, autoRefreshToken: false }
  })
  return new SupabaseStore(client)
}

/**
 * Hosted store. Tables and the match_memories function are defined in
 * supabase/schema.sql.
 */
export class SupabaseStore implements ButlerStore {
  private client: SupabaseClient

  constructor(client: SupabaseClient) {
    this.client = client
  }

  async findProfile(userId: UserId): Promise<UserProfile | null> {
    const { data, error } = await this.client
      .from('user_profile')
      .select('user_id, personality_summary')
      .eq('user_id', userId)
      .limit(1)
    if (error) fail('profile lookup', error)

    const [row] = profileRows.parse(data ?? [])
    if (!row) return null
    return { userId: row.user_id, personalitySummary: row.personality_summary ?? '' }
  }

  async createProfile(userId: UserId, personalitySummary: string): Promise<UserProfile> {
    const { data, error } = await this.client
      .from('user_profile')
      .insert({ user_id: userId, personality_summary: personalitySummary })
      .select('user_id, personality_summary')
    if (error) fail('profile insert', error)

    const [row] = profileRows.parse(data ?? [])
    if (!row) throw new Error('Supabase profile insert returned no row')
    return { userId: row.user_id, personalitySummary: row.personality_summary ?? personalitySummary }
  }

  async updatePersonality(userId: UserId, personalitySummary: string): Promise<void> {
    const { error } = await this.client
      .from('user_profile')
      .update({ personality_summary: personalitySummary })
      .eq('user_id', userId)
    if (error) fail('profile update', error)
  }

  async insertChatLog(entry: ChatLogEntry): Promise<void> {
    const { error } = await this.client
      .from('chat_logs')
      .insert({ user_id: entry.userId, user_message: entry.userMessage, bot_reply: entry.botReply })
    if (error) fail('chat log insert', error)
  }

  async recentChatLogs(userId: UserId, limit: number): Promise<StoredChatLog[]> {
    const { data, error } = await this.client
      .from('chat_logs')
      .select('id, user_id, user_message, bot_reply, created_at')
      .eq('user_id', userId)
      .order('created_at', { ascending: false })
      .limit(limit)
    if (error) fail('chat log query', error)

    return chatLogRows.parse(data ?? []).map(row => ({
      id: row.id,
      userId: row.user_id,
      userMessage: row.user_message,
      botReply: row.bot_reply,
      createdAt: new Date(row.created_at)
    }))
  }

  async insertMemory(entry: MemoryEntry): Promise<void> {
    const { error } = await this.client
      .from('long_term_memories')
      .insert({ user_id: entry.userId, content: entry.content, embedding: entry.embedding })
    if (error) fail('memory insert', error)
  }

  async matchMemories(query: MemoryQuery): Promise<MemoryMatch[]> {
    const { data, error } = await this.client.rpc(MATCH_MEMORIES_RPC, {
      query_embedding: query.embedding,
      match_threshold: query.threshold,
      match_count: query.count,
      p_user_id: query.userId
    })
    if (error) fail('memory search', error)

    return matchRows.parse(data ?? []).map(row => ({
      content: row.content,
      similarity: row.similarity ?? 0
    }))
  }

  async close(): Promise<void> {
    // PostgREST over HTTP: no connection to release.
  }
}
