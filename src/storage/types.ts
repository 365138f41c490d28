export type UserId = string

export interface UserProfile {
  userId: UserId
  personalitySummary: string
}

export interface ChatLogEntry {
  userId: UserId
  userMessage: string
  botReply: string
}

export interface StoredChatLog extends ChatLogEntry {
  id: string
  createdAt: Date
}

export interface MemoryEntry {
  userId: UserId
  content: string
  embedding: number[]
}

export interface MemoryQuery {
  embedding: number[]
  threshold: number
  count: number
  userId: UserId
}

export interface MemoryMatch {
  content: string
  similarity: number
}

/**
 * Everything the bot persists. Profiles are keyed by user id; chat logs and
 * memories are append-only. matchMemories returns at most `count` rows whose
 * similarity exceeds `threshold`, most similar first.
 */
export interface ButlerStore {
  findProfile(userId: UserId): Promise<UserProfile | null>
  createProfile(userId: UserId, personalitySummary: string): Promise<UserProfile>
  updatePersonality(userId: UserId, personalitySummary: string): Promise<void>
  insertChatLog(entry: ChatLogEntry): Promise<void>
  recentChatLogs(userId: UserId, limit: number): Promise<StoredChatLog[]>
  insertMemory(entry: MemoryEntry): Promise<void>
  matchMemories(query: MemoryQuery): Promise<MemoryMatch[]>
  close(): Promise<void>
}
