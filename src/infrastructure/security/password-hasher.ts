import bcrypt from "bcryptjs";
import { type AppError, internal } from "../../core/errors/app-error.js";
import type { PasswordHasher } from "../../core/ports/password-hasher.js";
import { type Result, err, ok } from "../../core/types/result.js";

/**
 * bcrypt password hasher (pure JS, no native build).
 * 12 rounds in production; tests pass the minimum of 4.
 */
export const createPasswordHasher = (rounds = 12): PasswordHasher => ({
  async hash(plain: string): Promise<Result<string, AppError>> {
    try {
      const hashed = await bcrypt.hash(plain, rounds);
      return ok(hashed);
    } catch (e: unknown) {
      return err(internal("Failed to hash password", e));
    }
  },

  async verify(plain: string, hash: string): Promise<Result<boolean, AppError>> {
    try {
      const matches = await bcrypt.compare(plain, hash);
      return ok(matches);
    } catch (e: unknown) {
      return err(internal("Failed to verify password", e));
    }
  },
});
