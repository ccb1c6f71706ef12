import type { Database } from "better-sqlite3";

/**
 * Migration 001: users, with the failed-login counter kept on the row
 */
export const up = (db: Database): void => {
  db.exec(`
    CREATE TABLE IF NOT EXISTS users (
      id                    TEXT PRIMARY KEY,
      username              TEXT NOT NULL UNIQUE,
      email                 TEXT UNIQUE,
      password_hash         TEXT NOT NULL,
      is_superuser          INTEGER NOT NULL DEFAULT 0,
      is_blocked            INTEGER NOT NULL DEFAULT 0,
      totp_secret           TEXT,
      totp_confirmed        INTEGER NOT NULL DEFAULT 0,
      failed_login_attempts INTEGER NOT NULL DEFAULT 0,
      created_at            INTEGER NOT NULL,
      updated_at            INTEGER NOT NULL
    )
  `);
};

export const down = (db: Database): void => {
  db.exec("DROP TABLE IF EXISTS users");
};
