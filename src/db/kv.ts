import type Database from "better-sqlite3";

/**
 * Minimal string key-value store with optional per-key TTL.
 *
 * Backs conversation sessions (conv:{userId}) and rate-limit counters
 * (rl:{userId}). Expired keys read as missing.
 */
export interface KeyValueStore {
  get(key: string): Promise<string | null>;
  put(key: string, value: string, options?: { expirationTtl?: number }): Promise<void>;
  delete(key: string): Promise<void>;
}

const KV_SCHEMA = `
  CREATE TABLE IF NOT EXISTS kv (
    key        TEXT PRIMARY KEY,
    value      TEXT NOT NULL,
    expires_at INTEGER
  );
`;

export interface SqliteKeyValueStore extends KeyValueStore {
  /** Drop every expired row; returns how many were removed */
  purgeExpired(): Promise<number>;
}

export function createSqliteKV(
  db: Database.Database,
  now: () => number = Date.now
): SqliteKeyValueStore {
  db.exec(KV_SCHEMA);

  return {
    async get(key) {
      const row = db
        .prepare<[string], { value: string; expires_at: number | null }>(
          "SELECT value, expires_at FROM kv WHERE key = ?"
        )
        .get(key);
      if (!row) return null;
      if (row.expires_at !== null && row.expires_at <= now()) {
        db.prepare<[string]>("DELETE FROM kv WHERE key = ?").run(key);
        return null;
      }
      return row.value;
    },

    async put(key, value, options) {
      const expiresAt =
        options?.expirationTtl !== undefined ? now() + options.expirationTtl * 1000 : null;
      db.prepare<[string, string, number | null]>(
        `INSERT INTO kv (key, value, expires_at) VALUES (?, ?, ?)
         ON CONFLICT (key) DO UPDATE SET value = excluded.value, expires_at = excluded.expires_at`
      ).run(key, value, expiresAt);
    },

    async delete(key) {
      db.prepare<[string]>("DELETE FROM kv WHERE key = ?").run(key);
    },

    async purgeExpired() {
      return db
        .prepare<[number]>("DELETE FROM kv WHERE expires_at IS NOT NULL AND expires_at <= ?")
        .run(now()).changes;
    },
  };
}
