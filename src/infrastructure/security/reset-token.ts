import { createHmac } from "node:crypto";
import type { ResetSubject, ResetTokenGenerator } from "../../core/ports/reset-token.js";
import { timingSafeEqual } from "../../shared/utils/timing-safe.js";

/**
 * Stateless single-use password reset tokens.
 *
 * Token = `<issued-at seconds, base36>-<HMAC-SHA256 prefix>`, signed over the
 * user id, the current password hash and the issue time. Changing the
 * password changes the hash, which invalidates every outstanding token.
 */

interface ResetTokenConfig {
  readonly secret: string;
  readonly ttlMs: number;
}

const SIGNATURE_LENGTH = 32;

const sign = (secret: string, user: ResetSubject, issuedAt: number): string =>
  createHmac("sha256", secret)
    .update(`password-reset:${user.id}:${user.passwordHash}:${issuedAt}`)
    .digest("hex")
    .slice(0, SIGNATURE_LENGTH);

export const createResetTokenGenerator = (config: ResetTokenConfig): ResetTokenGenerator => ({
  make(user: ResetSubject, nowMs: number = Date.now()): string {
    const issuedAt = Math.floor(nowMs / 1000);
    return `${issuedAt.toString(36)}-${sign(config.secret, user, issuedAt)}`;
  },

  check(user: ResetSubject, token: string, nowMs: number = Date.now()): boolean {
    const match = /^([0-9a-z]{1,13})-([0-9a-f]+)$/.exec(token);
    if (!match) return false;
    const [, ts36 = "", signature = ""] = match;

    const issuedAt = Number.parseInt(ts36, 36);
    if (!Number.isSafeInteger(issuedAt)) return false;

    if (!timingSafeEqual(signature, sign(config.secret, user, issuedAt))) return false;

    return nowMs - issuedAt * 1000 <= config.ttlMs;
  },
});
