import type { User } from "../entities/user.entity.js";

/**
 * Port: Reset Token Generator
 * Issues and checks password reset tokens bound to the user's current
 * password hash, so a token stops working once the password changes.
 */
export type ResetSubject = Pick<User, "id" | "passwordHash">;

export interface ResetTokenGenerator {
  make(user: ResetSubject, nowMs?: number): string;
  check(user: ResetSubject, token: string, nowMs?: number): boolean;
}
