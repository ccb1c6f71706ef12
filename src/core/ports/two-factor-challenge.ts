import type { AppError } from "../errors/app-error.js";
import type { UserId } from "../types/brand.js";
import type { Result } from "../types/result.js";

/**
 * Port: Two-Factor Challenge Store
 * Holds the pending login of a user who passed the password check and still
 * owes a one-time code. At most one open challenge per user.
 */
export interface TwoFactorChallenge {
  readonly userId: UserId;
  readonly expiresAt: number;
  readonly failedCodes: number;
}

export interface TwoFactorChallengeStore {
  /** Open (or replace) the challenge for a user */
  open(userId: UserId, ttlMs: number): Promise<Result<TwoFactorChallenge, AppError>>;
  /** Open, unexpired challenge or null */
  find(userId: UserId): Promise<Result<TwoFactorChallenge | null, AppError>>;
  /**
   * Count a wrong code and return the new count, or 0 when no challenge is
   * open. The count that reaches `maxFailures` closes the challenge in the
   * same step, so no later `consume` can succeed.
   */
  recordFailure(userId: UserId, maxFailures: number): Promise<Result<number, AppError>>;
  /**
   * Close the challenge. Resolves true for exactly one caller per opened
   * challenge; every other concurrent caller gets false.
   */
  consume(userId: UserId): Promise<Result<boolean, AppError>>;
  /** Drop the challenge whatever its state */
  discard(userId: UserId): Promise<Result<void, AppError>>;
}
