import type { Database } from "better-sqlite3";
import type { Token } from "../../core/entities/token.entity.js";
import { type AppError, storageUnavailable } from "../../core/errors/app-error.js";
import type { TokenStore } from "../../core/ports/token-store.js";
import { type UserId, timestamp, userId } from "../../core/types/brand.js";
import { type Result, err, ok } from "../../core/types/result.js";
import { generateTokenKey } from "../../shared/utils/id.js";

interface TokenRow {
  key: string;
  user_id: string;
  created_at: number;
}

/**
 * SQLite token store. Tokens go away with their user (ON DELETE CASCADE).
 */
export const createSqliteTokenStore = (db: Database): TokenStore => {
  const insertStmt = db.prepare<[string, string, number]>(
    "INSERT INTO tokens (key, user_id, created_at) VALUES (?, ?, ?)",
  );
  const findStmt = db.prepare<[string], TokenRow>("SELECT * FROM tokens WHERE key = ?");
  const deleteStmt = db.prepare<[string]>("DELETE FROM tokens WHERE key = ?");
  const deleteForUserStmt = db.prepare<[string]>("DELETE FROM tokens WHERE user_id = ?");

  return {
    async create(owner: UserId): Promise<Result<Token, AppError>> {
      try {
        const token: Token = { key: generateTokenKey(), userId: owner, createdAt: timestamp() };
        insertStmt.run(token.key, token.userId, token.createdAt);
        return ok(token);
      } catch (e: unknown) {
        return err(storageUnavailable("Database error", e));
      }
    },

    async find(key: string): Promise<Result<Token | null, AppError>> {
      try {
        const row = findStmt.get(key);
        if (!row) return ok(null);
        return ok({ key: row.key, userId: userId(row.user_id), createdAt: timestamp(row.created_at) });
      } catch (e: unknown) {
        return err(storageUnavailable("Database error", e));
      }
    },

    async delete(key: string): Promise<Result<void, AppError>> {
      try {
        deleteStmt.run(key);
        return ok(undefined);
      } catch (e: unknown) {
        return err(storageUnavailable("Database error", e));
      }
    },

    async deleteAllForUser(owner: UserId): Promise<Result<number, AppError>> {
      try {
        return ok(deleteForUserStmt.run(owner).changes);
      } catch (e: unknown) {
        return err(storageUnavailable("Database error", e));
      }
    },
  };
};
