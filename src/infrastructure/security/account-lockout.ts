import type { AppError } from "../../core/errors/app-error.js";
import type { AccountLockout } from "../../core/ports/account-lockout.js";
import type { FailedAttemptCounter } from "../../core/ports/failed-attempt-counter.js";
import type { Logger } from "../../core/ports/logger.js";
import type { UserRepository } from "../../core/ports/user.repository.js";
import type { UserId } from "../../core/types/brand.js";
import { type Result, ok } from "../../core/types/result.js";

/**
 * Account lockout on top of a per-account counter.
 * The failure that brings the count to `maxFailedAttempts` blocks the user
 * and starts the counter over. Blocking is permanent until an operator
 * clears `isBlocked`.
 */

interface LockoutDeps {
  readonly counter: FailedAttemptCounter;
  readonly userRepo: UserRepository;
  readonly maxFailedAttempts: number;
  readonly logger: Logger;
}

export const createAccountLockout = (deps: LockoutDeps): AccountLockout => {
  const { counter, userRepo, maxFailedAttempts, logger } = deps;

  if (!Number.isInteger(maxFailedAttempts) || maxFailedAttempts < 1) {
    throw new RangeError(`maxFailedAttempts must be an integer >= 1, got ${maxFailedAttempts}`);
  }

  return {
    async recordFailure(account: UserId): Promise<Result<boolean, AppError>> {
      const incremented = await counter.increment(account);
      if (!incremented.ok) return incremented;

      const attempts = incremented.value;
      if (attempts < maxFailedAttempts) {
        logger.debug("Failed login recorded", { userId: account, attempts });
        return ok(false);
      }

      const blocked = await userRepo.update(account, { isBlocked: true });
      if (!blocked.ok) return blocked;

      const reset = await counter.reset(account);
      if (!reset.ok) return reset;

      logger.warn("Account blocked after failed attempts", { userId: account, attempts });
      return ok(true);
    },

    async recordSuccess(account: UserId): Promise<Result<void, AppError>> {
      return counter.reset(account);
    },
  };
};
