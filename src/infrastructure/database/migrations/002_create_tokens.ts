import type { Database } from "better-sqlite3";

/**
 * Migration 002: bearer tokens, removed together with their user
 */
export const up = (db: Database): void => {
  db.exec(`
    CREATE TABLE IF NOT EXISTS tokens (
      key         TEXT PRIMARY KEY,
      user_id     TEXT NOT NULL REFERENCES users(id) ON DELETE CASCADE,
      created_at  INTEGER NOT NULL
    )
  `);

  db.exec("CREATE INDEX IF NOT EXISTS idx_tokens_user_id ON tokens(user_id)");
};

export const down = (db: Database): void => {
  db.exec("DROP INDEX IF EXISTS idx_tokens_user_id");
  db.exec("DROP TABLE IF EXISTS tokens");
};
