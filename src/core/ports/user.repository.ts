import type { User } from "../entities/user.entity.js";
import type { AppError } from "../errors/app-error.js";
import type { UserId } from "../types/brand.js";
import type { Result } from "../types/result.js";

/**
 * Port: User Repository
 * Lookups miss with NOT_FOUND; `create` fails with CONFLICT on a taken
 * username or email; store failures surface as STORAGE_UNAVAILABLE.
 */
export interface UserRepository {
  findById(id: UserId): Promise<Result<User, AppError>>;
  findByUsername(username: string): Promise<Result<User, AppError>>;
  findByEmail(email: string): Promise<Result<User, AppError>>;
  create(data: CreateUserData): Promise<Result<User, AppError>>;
  update(id: UserId, data: UpdateUserData): Promise<Result<User, AppError>>;
}

export interface CreateUserData {
  readonly username: string;
  readonly email?: string | null | undefined;
  readonly passwordHash: string;
  readonly isSuperuser?: boolean | undefined;
}

export interface UpdateUserData {
  readonly passwordHash?: string | undefined;
  readonly isSuperuser?: boolean | undefined;
  readonly isBlocked?: boolean | undefined;
  readonly totpSecret?: string | null | undefined;
  readonly totpConfirmed?: boolean | undefined;
}
