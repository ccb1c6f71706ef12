import type { Token } from "../entities/token.entity.js";
import type { AppError } from "../errors/app-error.js";
import type { UserId } from "../types/brand.js";
import type { Result } from "../types/result.js";

/**
 * Port: Token Store
 * A token is valid iff `find` returns it. `delete` of an absent key is a no-op.
 */
export interface TokenStore {
  create(userId: UserId): Promise<Result<Token, AppError>>;
  find(key: string): Promise<Result<Token | null, AppError>>;
  delete(key: string): Promise<Result<void, AppError>>;
  /** Returns how many tokens were removed */
  deleteAllForUser(userId: UserId): Promise<Result<number, AppError>>;
}
