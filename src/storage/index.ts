import { mkdirSync } from 'node:fs'
import path from 'node:path'
import { resolveDbPath } from '../config.js'
import type { ButlerConfig } from '../config.js'
import { Database } from './database.js'
import { createSupabaseStore } from './supabase.js'
import type { ButlerStore } from './types.js'

export function openStore(config: ButlerConfig['storage']): ButlerStore {
  if (config.driver === 'sqlite') {
    const dbPath = resolveDbPath(config.dbPath)
    mkdirSync(path.dirname(dbPath), { recursive: true })
    return new Database(dbPath)
  }

  if (!config.supabaseUrl || !config.supabaseKey) {
    throw new Error('Supabase storage needs SUPABASE_URL and SUPABASE_KEY')
  }
  return createSupabaseStore(config.supabaseUrl, config.supabaseKey)
}
