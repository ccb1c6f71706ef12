import type { UserId } from "../types/index.js";
import type { UserView } from "./user.entity.js";

/**
 * States a login attempt can settle in.
 *
 *   credentials ok, no 2FA  → authenticated
 *   credentials ok, 2FA on  → awaiting_code → (verifyTwoFactor) → authenticated
 *
 * Failures (INVALID_CREDENTIALS, ACCOUNT_LOCKED, INVALID_CODE) are errors, and
 * the caller starts over from credentials.
 */
export type LoginStep = AuthenticatedStep | AwaitingCodeStep;

export interface AuthenticatedStep {
  readonly step: "authenticated";
  readonly token: string;
  readonly user: UserView;
}

export interface AwaitingCodeStep {
  readonly step: "awaiting_code";
  readonly userId: UserId;
  readonly expiresAt: number;
}
