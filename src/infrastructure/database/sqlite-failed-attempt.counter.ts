import type { Database } from "better-sqlite3";
import { type AppError, storageUnavailable } from "../../core/errors/app-error.js";
import type { FailedAttemptCounter } from "../../core/ports/failed-attempt-counter.js";
import type { UserId } from "../../core/types/brand.js";
import { type Result, err, ok } from "../../core/types/result.js";

/**
 * Failed-login counter stored on the users row. The increment is a single
 * UPDATE ... RETURNING statement.
 */
export const createSqliteFailedAttemptCounter = (db: Database): FailedAttemptCounter => {
  const incrementStmt = db.prepare<[string], { failed_login_attempts: number }>(
    `UPDATE users SET failed_login_attempts = failed_login_attempts + 1
     WHERE id = ? RETURNING failed_login_attempts`,
  );
  const resetStmt = db.prepare<[string]>(
    "UPDATE users SET failed_login_attempts = 0 WHERE id = ?",
  );
  const currentStmt = db.prepare<[string], { failed_login_attempts: number }>(
    "SELECT failed_login_attempts FROM users WHERE id = ?",
  );

  return {
    async increment(account: UserId): Promise<Result<number, AppError>> {
      try {
        // unknown account: nothing to count against
        return ok(incrementStmt.get(account)?.failed_login_attempts ?? 0);
      } catch (e: unknown) {
        return err(storageUnavailable("Database error", e));
      }
    },

    async reset(account: UserId): Promise<Result<void, AppError>> {
      try {
        resetStmt.run(account);
        return ok(undefined);
      } catch (e: unknown) {
        return err(storageUnavailable("Database error", e));
      }
    },

    async current(account: UserId): Promise<Result<number, AppError>> {
      try {
        return ok(currentStmt.get(account)?.failed_login_attempts ?? 0);
      } catch (e: unknown) {
        return err(storageUnavailable("Database error", e));
      }
    },
  };
};
