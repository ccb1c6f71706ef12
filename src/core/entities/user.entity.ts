import type { Timestamp, UserId } from "../types/index.js";

/**
 * User entity: pure data, no behaviour, no framework deps.
 *
 * `totpSecret` is set by enrollment; it only gates login once
 * `totpConfirmed` is true.
 */
export interface User {
  readonly id: UserId;
  readonly username: string;
  readonly email: string | null;
  readonly passwordHash: string;
  readonly isSuperuser: boolean;
  readonly isBlocked: boolean;
  readonly totpSecret: string | null;
  readonly totpConfirmed: boolean;
  readonly createdAt: Timestamp;
  readonly updatedAt: Timestamp;
}

/** Public profile. Never carries the hash, the secret or the lockout state. */
export interface UserView {
  readonly id: UserId;
  readonly username: string;
  readonly email: string | null;
  readonly isSuperuser: boolean;
}

export const toUserView = (user: User): UserView => ({
  id: user.id,
  username: user.username,
  email: user.email,
  isSuperuser: user.isSuperuser,
});

export const hasActiveTwoFactor = (user: User): boolean =>
  user.totpSecret !== null && user.totpConfirmed;
