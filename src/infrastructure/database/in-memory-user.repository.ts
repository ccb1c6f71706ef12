import type { User } from "../../core/entities/user.entity.js";
import { type AppError, conflict, notFound } from "../../core/errors/app-error.js";
import type {
  CreateUserData,
  UpdateUserData,
  UserRepository,
} from "../../core/ports/user.repository.js";
import { type UserId, timestamp, userId } from "../../core/types/brand.js";
import { type Result, err, ok } from "../../core/types/result.js";
import { generateId } from "../../shared/utils/id.js";

/**
 * In-memory user repository for tests and the `memory` database driver.
 * Each method reads and writes the map without awaiting in between, so every
 * mutation is atomic with respect to other callers.
 */
export const createInMemoryUserRepository = (): UserRepository => {
  const store = new Map<string, User>();

  const find = (predicate: (u: User) => boolean): User | undefined => {
    for (const user of store.values()) {
      if (predicate(user)) return user;
    }
    return undefined;
  };

  return {
    async findById(id: UserId): Promise<Result<User, AppError>> {
      const user = store.get(id);
      return user ? ok(user) : err(notFound("User"));
    },

    async findByUsername(username: string): Promise<Result<User, AppError>> {
      const user = find((u) => u.username === username);
      return user ? ok(user) : err(notFound("User"));
    },

    async findByEmail(email: string): Promise<Result<User, AppError>> {
      const user = find((u) => u.email !== null && u.email === email);
      return user ? ok(user) : err(notFound("User"));
    },

    async create(data: CreateUserData): Promise<Result<User, AppError>> {
      const email = data.email ?? null;
      if (find((u) => u.username === data.username)) {
        return err(conflict("Username already exists"));
      }
      if (email !== null && find((u) => u.email === email)) {
        return err(conflict("Email already exists"));
      }

      const now = timestamp();
      const user: User = {
        id: userId(generateId()),
        username: data.username,
        email,
        passwordHash: data.passwordHash,
        isSuperuser: data.isSuperuser ?? false,
        isBlocked: false,
        totpSecret: null,
        totpConfirmed: false,
        createdAt: now,
        updatedAt: now,
      };

      store.set(user.id, user);
      return ok(user);
    },

    async update(id: UserId, data: UpdateUserData): Promise<Result<User, AppError>> {
      const existing = store.get(id);
      if (!existing) return err(notFound("User"));

      const updated: User = {
        ...existing,
        ...(data.passwordHash !== undefined ? { passwordHash: data.passwordHash } : {}),
        ...(data.isSuperuser !== undefined ? { isSuperuser: data.isSuperuser } : {}),
        ...(data.isBlocked !== undefined ? { isBlocked: data.isBlocked } : {}),
        ...(data.totpSecret !== undefined ? { totpSecret: data.totpSecret } : {}),
        ...(data.totpConfirmed !== undefined ? { totpConfirmed: data.totpConfirmed } : {}),
        updatedAt: timestamp(),
      };

      store.set(id, updated);
      return ok(updated);
    },
  };
};
