import type { AppError } from "../errors/app-error.js";
import type { UserId } from "../types/brand.js";
import type { Result } from "../types/result.js";

/**
 * Port: Account Lockout
 * Counts failed logins per account and blocks the account at the threshold.
 */
export interface AccountLockout {
  /** Record a failed login attempt. Returns whether the account is now blocked. */
  recordFailure(account: UserId): Promise<Result<boolean, AppError>>;
  /** Reset failed attempts on a successful full login */
  recordSuccess(account: UserId): Promise<Result<void, AppError>>;
}
