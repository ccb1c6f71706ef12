import type { AppError } from "../errors/app-error.js";
import type { UserId } from "../types/brand.js";
import type { Result } from "../types/result.js";

/**
 * Port: Failed Attempt Counter
 * Per-account consecutive failure count. `increment` must be atomic: two
 * concurrent calls for the same account never observe the same new value.
 */
export interface FailedAttemptCounter {
  /** Increment and return the new count */
  increment(account: UserId): Promise<Result<number, AppError>>;
  reset(account: UserId): Promise<Result<void, AppError>>;
  current(account: UserId): Promise<Result<number, AppError>>;
}
