import type { AppError } from "../errors/app-error.js";
import type { Result } from "../types/result.js";

/**
 * Port: Password Hasher
 * `hash` output is what `User.passwordHash` stores. A hash that does not
 * match is `ok(false)`; only a hashing failure is an error.
 */
export interface PasswordHasher {
  hash(password: string): Promise<Result<string, AppError>>;
  verify(password: string, passwordHash: string): Promise<Result<boolean, AppError>>;
}
