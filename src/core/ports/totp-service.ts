import type { AppError } from "../errors/app-error.js";
import type { Result } from "../types/result.js";

/**
 * Port: TOTP Service
 * Time-based One-Time Password (RFC 6238) for the second login factor.
 * Compatible with Google Authenticator, Authy, etc.
 */
export interface TotpService {
  /** Generate a random TOTP secret (base32-encoded, 20 bytes) */
  generateSecret(): string;
  /** Generate an otpauth:// URI for QR code display */
  generateUri(secret: string, accountLabel: string, issuer: string): string;
  /** The 6-digit code for `atMs` (default: now) */
  generate(secret: string, atMs?: number): Result<string, AppError>;
  /** Verify a code against a secret, tolerating the configured window of steps */
  verify(secret: string, code: string, atMs?: number): Result<boolean, AppError>;
}
