import BetterSqlite3 from 'better-sqlite3'
import { nanoid } from 'nanoid'
import { cosineSimilarity } from '../memory/math.js'
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

type TableName = 'user_profile' | 'chat_logs' | 'long_term_memories'

interface ProfileRow {
  user_id: string
  personality_summary: string
}

interface ChatLogRow {
  id: string
  user_id: string
  user_message: string
  bot_reply: string
  created_at: string
}

interface MemoryRow {
  content: string
  embedding: string
}

/**
 * Local SQLite store. Same tables as the hosted schema, with the similarity
 * search done in process over the user's stored embeddings.
 */
export class Database implements ButlerStore {
  private db: BetterSqlite3.Database

  constructor(dbPath: string) {
    this.db = new BetterSqlite3(dbPath)
    this.db.pragma('journal_mode = WAL')
    this.createTables()
  }

  private createTables(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS user_profile (
        user_id TEXT PRIMARY KEY,
        personality_summary TEXT NOT NULL,
        created_at DATETIME NOT NULL,
        updated_at DATETIME NOT NULL
      );

      CREATE TABLE IF NOT EXISTS chat_logs (
        id TEXT PRIMARY KEY,
        user_id TEXT NOT NULL,
        user_message TEXT NOT NULL,
        bot_reply TEXT NOT NULL,
        created_at DATETIME NOT NULL
      );

      CREATE TABLE IF NOT EXISTS long_term_memories (
        id TEXT PRIMARY KEY,
        user_id TEXT NOT NULL,
        content TEXT NOT NULL,
        embedding JSON NOT NULL,
        created_at DATETIME NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_chat_logs_user ON chat_logs (user_id);
      CREATE INDEX IF NOT EXISTS idx_memories_user ON long_term_memories (user_id);
    `)
  }

  listTables(): string[] {
    const rows = this.db.prepare(
      "SELECT name FROM sqlite_master WHERE type='table' AND name NOT LIKE 'sqlite_%'"
    ).all() as { name: string }[]
    return rows.map(r => r.name)
  }

  countRows(table: TableName, userId?: UserId): number {
    const sql = userId === undefined
      ? `SELECT COUNT(*) AS n FROM ${table}`
      : `SELECT COUNT(*) AS n FROM ${table} WHERE user_id = ?`
    const params = userId === undefined ? [] : [userId]
    const row = this.db.prepare(sql).get(...params) as { n: number }
    return row.n
  }

  // --- Profiles ---

  async findProfile(userId: UserId): Promise<UserProfile | null> {
    const row = this.db.prepare(
      'SELECT user_id, personality_summary FROM user_profile WHERE user_id = ?'
    ).get(userId) as ProfileRow | undefined
    if (!row) return null
    return { userId: row.user_id, personalitySummary: row.personality_summary }
  }

  async createProfile(userId: UserId, personalitySummary: string): Promise<UserProfile> {
    const now = new Date().toISOString()
    this.db.prepare(`
      INSERT INTO user_profile (user_id, personality_summary, created_at, updated_at)
      VALUES (?, ?, ?, ?)
    `).run(userId, personalitySummary, now, now)
    return { userId, personalitySummary }
  }

  async updatePersonality(userId: UserId, personalitySummary: string): Promise<void> {
    this.db.prepare(
      'UPDATE user_profile SET personality_summary = ?, updated_at = ? WHERE user_id = ?'
    ).run(personalitySummary, new Date().toISOString(), userId)
  }

  // --- Chat logs ---

  async insertChatLog(entry: ChatLogEntry): Promise<void> {
    this.db.prepare(`
      INSERT INTO chat_logs (id, user_id, user_message, bot_reply, created_at)
      VALUES (?, ?, ?, ?, ?)
    `).run(nanoid(), entry.userId, entry.userMessage, entry.botReply, new Date().toISOString())
  }

  async recentChatLogs(userId: UserId, limit: number): Promise<StoredChatLog[]> {
    const rows = this.db.prepare(`
      SELECT id, user_id, user_message, bot_reply, created_at FROM chat_logs
      WHERE user_id = ?
      ORDER BY created_at DESC, rowid DESC
      LIMIT ?
    `).all(userId, limit) as ChatLogRow[]

    return rows.map(row => ({
      id: row.id,
      userId: row.user_id,
      userMessage: row.user_message,
      botReply: row.bot_reply,
      createdAt: new Date(row.created_at)
    }))
  }

  // --- Long-term memories ---

  async insertMemory(entry: MemoryEntry): Promise<void> {
    this.db.prepare(`
      INSERT INTO long_term_memories (id, user_id, content, embedding, created_at)
      VALUES (?, ?, ?, ?, ?)
    `).run(nanoid(), entry.userId, entry.content, JSON.stringify(entry.embedding), new Date().toISOString())
  }

  async matchMemories(query: MemoryQuery): Promise<MemoryMatch[]> {
    const rows = this.db.prepare(
      'SELECT content, embedding FROM long_term_memories WHERE user_id = ? ORDER BY rowid'
    ).all(query.userId) as MemoryRow[]

    return rows
      .map(row => ({
        content: row.content,
        similarity: cosineSimilarity(query.embedding, JSON.parse(row.embedding) as number[])
      }))
      .filter(match => match.similarity > query.threshold)
      .sort((a, b) => b.similarity - a.similarity)
      .slice(0, query.count)
  }

  async close(): Promise<void> {
    this.db.close()
  }
}
