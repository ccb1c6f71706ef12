import type { AppError } from "../../core/errors/app-error.js";
import type { FailedAttemptCounter } from "../../core/ports/failed-attempt-counter.js";
import type { UserId } from "../../core/types/brand.js";
import { type Result, ok } from "../../core/types/result.js";

/**
 * In-memory per-account failure counter. Increment is a single synchronous
 * read-modify-write, so concurrent callers never lose an increment.
 */
export const createInMemoryFailedAttemptCounter = (): FailedAttemptCounter => {
  const counts = new Map<string, number>();

  return {
    async increment(account: UserId): Promise<Result<number, AppError>> {
      const next = (counts.get(account) ?? 0) + 1;
      counts.set(account, next);
      return ok(next);
    },

    async reset(account: UserId): Promise<Result<void, AppError>> {
      counts.delete(account);
      return ok(undefined);
    },

    async current(account: UserId): Promise<Result<number, AppError>> {
      return ok(counts.get(account) ?? 0);
    },
  };
};
