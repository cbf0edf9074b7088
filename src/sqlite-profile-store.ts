/**
 * SQLite Profile Store
 *
 * File-backed ProfileStore using better-sqlite3. Profiles are stored as JSON
 * documents and validated again on the way out.
 */
import Database from 'better-sqlite3'
import { InvalidDataError, NotFoundError } from './errors'
import { type Profile, parseProfile } from './profile'
import { type ProfileStore, validProfile, validUserId } from './profile-store'

// ============================================================================
// Schema DDL
// ============================================================================

const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS profile (
    user_id TEXT PRIMARY KEY,
    data TEXT NOT NULL,
    updated_at TEXT NOT NULL
  );
`

type ProfileRow = {
  user_id: string
  data: string
  updated_at: string
}

// ============================================================================
// Row Mapping
// ============================================================================

function toProfile(row: ProfileRow): Profile {
  let raw: unknown
  try {
    raw = JSON.parse(row.data)
  } catch {
    throw new InvalidDataError(`Stored profile for '${row.user_id}' is not valid JSON`)
  }
  const parsed = parseProfile(raw)
  if (!parsed.ok) throw new InvalidDataError(`Stored profile for '${row.user_id}': ${parsed.error.message}`)
  return parsed.value
}

// ============================================================================
// Factory
// ============================================================================

export async function createSqliteProfileStore(path: string): Promise<ProfileStore> {
  const db = new Database(path)
  db.exec(SCHEMA_SQL)

  const selectOne = db.prepare('SELECT * FROM profile WHERE user_id = ?')
  const upsert = db.prepare(
    'INSERT INTO profile (user_id, data, updated_at) VALUES (?, ?, ?) ' +
      'ON CONFLICT(user_id) DO UPDATE SET data = excluded.data, updated_at = excluded.updated_at',
  )

  return {
    async getProfile(userId) {
      const row = selectOne.get(userId.trim()) as ProfileRow | undefined
      return row ? toProfile(row) : null
    },

    async saveProfile(userId, profile) {
      upsert.run(validUserId(userId), JSON.stringify(validProfile(profile)), new Date().toISOString())
    },

    async deleteProfile(userId) {
      const key = userId.trim()
      const info = db.prepare('DELETE FROM profile WHERE user_id = ?').run(key)
      if (info.changes === 0) throw new NotFoundError(`Profile for '${key}' not found`)
    },

    async listUserIds() {
      const rows = db.prepare('SELECT user_id FROM profile ORDER BY user_id').all() as { user_id: string }[]
      return rows.map((r) => r.user_id)
    },

    async close() {
      db.close()
    },
  }
}
