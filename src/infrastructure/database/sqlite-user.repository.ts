import type { Database } from "better-sqlite3";
import type { User } from "../../core/entities/user.entity.js";
import {
  type AppError,
  conflict,
  notFound,
  storageUnavailable,
} from "../../core/errors/app-error.js";
import type {
  CreateUserData,
  UpdateUserData,
  UserRepository,
} from "../../core/ports/user.repository.js";
import { type UserId, timestamp, userId } from "../../core/types/brand.js";
import { type Result, err, ok } from "../../core/types/result.js";
import { generateId } from "../../shared/utils/id.js";

/**
 * SQLite user repository on better-sqlite3.
 * Swaps cleanly for the in-memory adapter.
 */

interface UserRow {
  id: string;
  username: string;
  email: string | null;
  password_hash: string;
  is_superuser: number;
  is_blocked: number;
  totp_secret: string | null;
  totp_confirmed: number;
  created_at: number;
  updated_at: number;
}

type Binding = string | number | null;

const rowToUser = (row: UserRow): User => ({
  id: userId(row.id),
  username: row.username,
  email: row.email,
  passwordHash: row.password_hash,
  isSuperuser: row.is_superuser === 1,
  isBlocked: row.is_blocked === 1,
  totpSecret: row.totp_secret,
  totpConfirmed: row.totp_confirmed === 1,
  createdAt: timestamp(row.created_at),
  updatedAt: timestamp(row.updated_at),
});

const flag = (value: boolean): number => (value ? 1 : 0);

/** Build SET clause entries from partial update data */
const buildUpdateFields = (data: UpdateUserData, now: number): [string, Binding][] => {
  const fields: [string, Binding][] = [];
  if (data.passwordHash !== undefined) fields.push(["password_hash = ?", data.passwordHash]);
  if (data.isSuperuser !== undefined) fields.push(["is_superuser = ?", flag(data.isSuperuser)]);
  if (data.isBlocked !== undefined) fields.push(["is_blocked = ?", flag(data.isBlocked)]);
  if (data.totpSecret !== undefined) fields.push(["totp_secret = ?", data.totpSecret]);
  if (data.totpConfirmed !== undefined) {
    fields.push(["totp_confirmed = ?", flag(data.totpConfirmed)]);
  }
  fields.push(["updated_at = ?", now]);
  return fields;
};

/** Map a UNIQUE constraint violation to the conflict it represents, if it is one */
const uniqueViolation = (e: unknown): AppError | null => {
  if (!(e instanceof Error) || !e.message.includes("UNIQUE")) return null;
  return e.message.includes("users.email")
    ? conflict("Email already exists")
    : conflict("Username already exists");
};

export const createSqliteUserRepository = (db: Database): UserRepository => {
  const findByIdStmt = db.prepare<[string], UserRow>("SELECT * FROM users WHERE id = ?");
  const findByUsernameStmt = db.prepare<[string], UserRow>(
    "SELECT * FROM users WHERE username = ?",
  );
  const findByEmailStmt = db.prepare<[string], UserRow>("SELECT * FROM users WHERE email = ?");
  const insertStmt = db.prepare<[string, string, string | null, string, number, number, number]>(
    `INSERT INTO users (id, username, email, password_hash, is_superuser, created_at, updated_at)
     VALUES (?, ?, ?, ?, ?, ?, ?)`,
  );

  const findOne = (stmt: typeof findByIdStmt, value: string): Result<User, AppError> => {
    try {
      const row = stmt.get(value);
      return row ? ok(rowToUser(row)) : err(notFound("User"));
    } catch (e: unknown) {
      return err(storageUnavailable("Database error", e));
    }
  };

  return {
    async findById(id: UserId): Promise<Result<User, AppError>> {
      return findOne(findByIdStmt, id);
    },

    async findByUsername(username: string): Promise<Result<User, AppError>> {
      return findOne(findByUsernameStmt, username);
    },

    async findByEmail(email: string): Promise<Result<User, AppError>> {
      return findOne(findByEmailStmt, email);
    },

    async create(data: CreateUserData): Promise<Result<User, AppError>> {
      const id = generateId();
      const now = Date.now();
      const email = data.email ?? null;
      const isSuperuser = data.isSuperuser ?? false;

      try {
        insertStmt.run(id, data.username, email, data.passwordHash, flag(isSuperuser), now, now);
      } catch (e: unknown) {
        const duplicate = uniqueViolation(e);
        if (duplicate) return err(duplicate);
        return err(storageUnavailable("Database error", e));
      }

      return ok({
        id: userId(id),
        username: data.username,
        email,
        passwordHash: data.passwordHash,
        isSuperuser,
        isBlocked: false,
        totpSecret: null,
        totpConfirmed: false,
        createdAt: timestamp(now),
        updatedAt: timestamp(now),
      });
    },

    async update(id: UserId, data: UpdateUserData): Promise<Result<User, AppError>> {
      try {
        const fieldMap = buildUpdateFields(data, Date.now());
        const sql = `UPDATE users SET ${fieldMap.map(([f]) => f).join(", ")} WHERE id = ?`;
        const values: Binding[] = [...fieldMap.map(([, v]) => v), id];
        const { changes } = db.prepare<Binding[]>(sql).run(...values);
        if (changes === 0) return err(notFound("User"));

        const updated = findByIdStmt.get(id);
        return updated ? ok(rowToUser(updated)) : err(notFound("User"));
      } catch (e: unknown) {
        return err(storageUnavailable("Database error", e));
      }
    },
  };
};
