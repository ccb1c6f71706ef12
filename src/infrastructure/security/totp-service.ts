import { createHmac, randomBytes } from "node:crypto";
import { type AppError, internal } from "../../core/errors/app-error.js";
import type { TotpService } from "../../core/ports/totp-service.js";
import { type Result, err, ok } from "../../core/types/result.js";
import { timingSafeEqual } from "../../shared/utils/timing-safe.js";

/**
 * TOTP implementation (RFC 6238) using node:crypto HMAC-SHA1.
 * Compatible with Google Authenticator, Authy, Microsoft Authenticator, etc.
 */

/** Base32 alphabet (RFC 4648) */
const BASE32_CHARS = "ABCDEFGHIJKLMNOPQRSTUVWXYZ234567";

/** Encode bytes to unpadded base32 */
export const base32Encode = (data: Uint8Array): string => {
  let result = "";
  let bits = 0;
  let value = 0;
  for (const byte of data) {
    value = ((value << 8) | byte) & 0xffff;
    bits += 8;
    while (bits >= 5) {
      bits -= 5;
      result += BASE32_CHARS[(value >>> bits) & 0x1f];
    }
  }
  if (bits > 0) {
    result += BASE32_CHARS[(value << (5 - bits)) & 0x1f];
  }
  return result;
};

/** Decode a base32 string; padding, spaces and case are ignored */
export const base32Decode = (encoded: string): Buffer => {
  const cleaned = encoded.replace(/[=\s]+/g, "").toUpperCase();
  const bytes: number[] = [];
  let bits = 0;
  let value = 0;
  for (const char of cleaned) {
    const idx = BASE32_CHARS.indexOf(char);
    if (idx === -1) continue;
    value = ((value << 5) | idx) & 0xffff;
    bits += 5;
    if (bits >= 8) {
      bits -= 8;
      bytes.push((value >>> bits) & 0xff);
    }
  }
  return Buffer.from(bytes);
};

/** Dynamic truncation (RFC 4226 §5.4) */
const dynamicTruncate = (hmac: Buffer): number => {
  const offset = hmac.readUInt8(hmac.length - 1) & 0x0f;
  return hmac.readUInt32BE(offset) & 0x7fffffff;
};

/** HOTP value for a counter, zero-padded to `DIGITS` */
const hotp = (key: Buffer, counter: number): string => {
  const counterBytes = Buffer.alloc(8);
  counterBytes.writeBigUInt64BE(BigInt(counter));
  const hmac = createHmac("sha1", key).update(counterBytes).digest();
  return (dynamicTruncate(hmac) % 10 ** DIGITS).toString().padStart(DIGITS, "0");
};

/** TOTP period in seconds */
export const PERIOD = 30;

const DIGITS = 6;

/** Secret size before encoding: 160 bits, standard for TOTP */
const SECRET_BYTES = 20;

const CODE_PATTERN = /^\d{6}$/;

export interface TotpOptions {
  /** Steps tolerated on each side of the current one for clock drift */
  readonly window: number;
}

export const createTotpService = (options: TotpOptions = { window: 1 }): TotpService => {
  const counterAt = (atMs: number): number => Math.floor(atMs / 1000 / PERIOD);

  return {
    generateSecret(): string {
      return base32Encode(randomBytes(SECRET_BYTES));
    },

    generateUri(secret: string, accountLabel: string, issuer: string): string {
      const encodedIssuer = encodeURIComponent(issuer);
      const encodedLabel = encodeURIComponent(accountLabel);
      return `otpauth://totp/${encodedIssuer}:${encodedLabel}?secret=${secret}&issuer=${encodedIssuer}&algorithm=SHA1&digits=${DIGITS}&period=${PERIOD}`;
    },

    generate(secret: string, atMs: number = Date.now()): Result<string, AppError> {
      try {
        return ok(hotp(base32Decode(secret), counterAt(atMs)));
      } catch (e: unknown) {
        return err(internal("TOTP generation failed", e));
      }
    },

    verify(secret: string, code: string, atMs: number = Date.now()): Result<boolean, AppError> {
      if (!CODE_PATTERN.test(code)) {
        return ok(false);
      }

      const key = base32Decode(secret);
      if (key.length === 0) return ok(false);

      const current = counterAt(atMs);

      try {
        // Every step in the window is checked so timing does not reveal which matched
        let matched = false;
        for (let i = -options.window; i <= options.window; i++) {
          if (timingSafeEqual(code, hotp(key, current + i))) {
            matched = true;
          }
        }
        return ok(matched);
      } catch (e: unknown) {
        return err(internal("TOTP verification failed", e));
      }
    },
  };
};
