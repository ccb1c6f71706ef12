import type { Token } from "../../core/entities/token.entity.js";
import type { AppError } from "../../core/errors/app-error.js";
import type { TokenStore } from "../../core/ports/token-store.js";
import { type UserId, timestamp } from "../../core/types/brand.js";
import { type Result, ok } from "../../core/types/result.js";
import { generateTokenKey } from "../../shared/utils/id.js";

/**
 * In-memory token store keyed by token string.
 */
export const createInMemoryTokenStore = (): TokenStore => {
  const store = new Map<string, Token>();

  return {
    async create(userId: UserId): Promise<Result<Token, AppError>> {
      let key = generateTokenKey();
      while (store.has(key)) key = generateTokenKey();

      const token: Token = { key, userId, createdAt: timestamp() };
      store.set(key, token);
      return ok(token);
    },

    async find(key: string): Promise<Result<Token | null, AppError>> {
      return ok(store.get(key) ?? null);
    },

    async delete(key: string): Promise<Result<void, AppError>> {
      store.delete(key);
      return ok(undefined);
    },

    async deleteAllForUser(userId: UserId): Promise<Result<number, AppError>> {
      let removed = 0;
      for (const [key, token] of store) {
        if (token.userId === userId) {
          store.delete(key);
          removed++;
        }
      }
      return ok(removed);
    },
  };
};
