import type { AppError } from "../../core/errors/app-error.js";
import type {
  TwoFactorChallenge,
  TwoFactorChallengeStore,
} from "../../core/ports/two-factor-challenge.js";
import type { UserId } from "../../core/types/brand.js";
import { type Result, ok } from "../../core/types/result.js";

/**
 * In-memory pending-login challenges. Expired entries are dropped lazily on
 * access.
 */
export const createInMemoryTwoFactorChallengeStore = (
  now: () => number = Date.now,
): TwoFactorChallengeStore => {
  const challenges = new Map<string, TwoFactorChallenge>();

  const live = (userId: UserId): TwoFactorChallenge | null => {
    const challenge = challenges.get(userId);
    if (!challenge) return null;
    if (challenge.expiresAt <= now()) {
      challenges.delete(userId);
      return null;
    }
    return challenge;
  };

  return {
    async open(userId: UserId, ttlMs: number): Promise<Result<TwoFactorChallenge, AppError>> {
      const challenge: TwoFactorChallenge = { userId, expiresAt: now() + ttlMs, failedCodes: 0 };
      challenges.set(userId, challenge);
      return ok(challenge);
    },

    async find(userId: UserId): Promise<Result<TwoFactorChallenge | null, AppError>> {
      return ok(live(userId));
    },

    async recordFailure(userId: UserId, maxFailures: number): Promise<Result<number, AppError>> {
      const challenge = live(userId);
      if (!challenge) return ok(0);
      const failedCodes = challenge.failedCodes + 1;
      if (failedCodes >= maxFailures) {
        challenges.delete(userId);
      } else {
        challenges.set(userId, { ...challenge, failedCodes });
      }
      return ok(failedCodes);
    },

    async consume(userId: UserId): Promise<Result<boolean, AppError>> {
      if (!live(userId)) return ok(false);
      challenges.delete(userId);
      return ok(true);
    },

    async discard(userId: UserId): Promise<Result<void, AppError>> {
      challenges.delete(userId);
      return ok(undefined);
    },
  };
};
