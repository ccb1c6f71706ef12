export type { UserRepository, CreateUserData, UpdateUserData } from "./user.repository.js";
export type { TokenStore } from "./token-store.js";
export type { FailedAttemptCounter } from "./failed-attempt-counter.js";
export type { AccountLockout } from "./account-lockout.js";
export type { TwoFactorChallenge, TwoFactorChallengeStore } from "./two-factor-challenge.js";
export type { TotpService } from "./totp-service.js";
export type { PasswordHasher } from "./password-hasher.js";
export type {
  PasswordPolicy,
  PasswordPolicyConfig,
  PasswordPolicyResult,
} from "./password-policy.js";
export type { MailMessage, Notifier } from "./notifier.js";
export type { ResetSubject, ResetTokenGenerator } from "./reset-token.js";
export { type Logger, type LogLevel, type LogMeta, LOG_LEVELS } from "./logger.js";
