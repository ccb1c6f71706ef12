import type { LoginStep } from "../../core/entities/login-step.js";
import {
  type UserView,
  hasActiveTwoFactor,
  toUserView,
} from "../../core/entities/user.entity.js";
import {
  type AppError,
  ErrorCode,
  accountLocked,
  invalidCode,
  invalidCredentials,
  notFound,
} from "../../core/errors/app-error.js";
import type { AccountLockout } from "../../core/ports/account-lockout.js";
import type { Logger } from "../../core/ports/logger.js";
import type { PasswordHasher } from "../../core/ports/password-hasher.js";
import type { TokenStore } from "../../core/ports/token-store.js";
import type { TotpService } from "../../core/ports/totp-service.js";
import type { TwoFactorChallengeStore } from "../../core/ports/two-factor-challenge.js";
import type { UserRepository } from "../../core/ports/user.repository.js";
import { type UserId, userId } from "../../core/types/brand.js";
import { type Result, err, ok } from "../../core/types/result.js";
import {
  type LoginDto,
  type VerifyTwoFactorDto,
  loginDto,
  validateInput,
  verifyTwoFactorDto,
} from "../dtos/auth.dto.js";

export interface AuthService {
  login(dto: LoginDto): Promise<Result<LoginStep, AppError>>;
  verifyTwoFactor(dto: VerifyTwoFactorDto): Promise<Result<LoginStep, AppError>>;
  getUser(token: string): Promise<Result<UserView, AppError>>;
  logout(token: string): Promise<Result<void, AppError>>;
}

interface Deps {
  readonly userRepo: UserRepository;
  readonly tokenStore: TokenStore;
  readonly passwordHasher: PasswordHasher;
  readonly accountLockout: AccountLockout;
  readonly challenges: TwoFactorChallengeStore;
  readonly totpService: TotpService;
  readonly challengeTtlMs: number;
  readonly maxFailedCodeAttempts: number;
  readonly logger: Logger;
}

const NO_PENDING_LOGIN = "No pending login; log in again";

/** Hashed once per service and compared against when the username is unknown */
const DUMMY_PASSWORD = "dummy-password-for-unknown-usernames";

export const createAuthService = (deps: Deps): AuthService => {
  const {
    userRepo,
    tokenStore,
    passwordHasher,
    accountLockout,
    challenges,
    totpService,
    challengeTtlMs,
    maxFailedCodeAttempts,
    logger,
  } = deps;

  let dummyHash: Promise<Result<string, AppError>> | undefined;

  /** Spend the same hashing work on an unknown username as on a known one */
  const verifyAgainstDummy = async (password: string): Promise<Result<boolean, AppError>> => {
    dummyHash ??= passwordHasher.hash(DUMMY_PASSWORD);
    const hashed = await dummyHash;
    if (!hashed.ok) return hashed;
    return passwordHasher.verify(password, hashed.value);
  };

  /**
   * Finish a login: clear the failure count and hand out a token. The user is
   * read again after the reset, since a concurrent failure may have blocked
   * the account while the password was being checked.
   */
  const authenticate = async (id: UserId): Promise<Result<LoginStep, AppError>> => {
    const reset = await accountLockout.recordSuccess(id);
    if (!reset.ok) return reset;

    const current = await userRepo.findById(id);
    if (!current.ok) return current;
    if (current.value.isBlocked) {
      logger.warn("Login refused: account was blocked meanwhile", { userId: id });
      return err(accountLocked());
    }

    const token = await tokenStore.create(id);
    if (!token.ok) return token;

    logger.info("User logged in", { userId: id });
    return ok({ step: "authenticated", token: token.value.key, user: toUserView(current.value) });
  };

  return {
    async login(dto: LoginDto): Promise<Result<LoginStep, AppError>> {
      const input = validateInput(loginDto, dto);
      if (!input.ok) return input;
      const { username, password } = input.value;

      logger.info("Login attempt", { username });

      const found = await userRepo.findByUsername(username);
      if (!found.ok) {
        if (found.error.code !== ErrorCode.NOT_FOUND) return found;
        const burned = await verifyAgainstDummy(password);
        if (!burned.ok) return burned;
        logger.warn("Login failed: unknown username", { username });
        return err(invalidCredentials());
      }

      const user = found.value;
      const matches = await passwordHasher.verify(password, user.passwordHash);
      if (!matches.ok) return matches;

      if (!matches.value) {
        if (user.isBlocked) {
          logger.warn("Login failed: invalid password on blocked account", { userId: user.id });
          return err(invalidCredentials());
        }

        const blocked = await accountLockout.recordFailure(user.id);
        if (!blocked.ok) return blocked;
        if (blocked.value) {
          return err(accountLocked("Account locked due to too many failed login attempts"));
        }

        logger.warn("Login failed: invalid password", { userId: user.id });
        return err(invalidCredentials());
      }

      if (user.isBlocked) {
        logger.warn("Login blocked: account is locked", { userId: user.id });
        return err(accountLocked());
      }

      if (!hasActiveTwoFactor(user)) return authenticate(user.id);

      const challenge = await challenges.open(user.id, challengeTtlMs);
      if (!challenge.ok) return challenge;

      logger.info("Two-factor challenge issued", { userId: user.id });
      return ok({ step: "awaiting_code", userId: user.id, expiresAt: challenge.value.expiresAt });
    },

    async verifyTwoFactor(dto: VerifyTwoFactorDto): Promise<Result<LoginStep, AppError>> {
      const input = validateInput(verifyTwoFactorDto, dto);
      if (!input.ok) return input;
      const id = userId(input.value.userId);

      const pending = await challenges.find(id);
      if (!pending.ok) return pending;
      if (pending.value === null) {
        logger.warn("Code submitted without a pending login", { userId: id });
        return err(invalidCode(NO_PENDING_LOGIN));
      }

      const found = await userRepo.findById(id);
      if (!found.ok) {
        if (found.error.code !== ErrorCode.NOT_FOUND) return found;
        const dropped = await challenges.discard(id);
        if (!dropped.ok) return dropped;
        return err(invalidCode(NO_PENDING_LOGIN));
      }

      const user = found.value;
      if (user.isBlocked || user.totpSecret === null || !user.totpConfirmed) {
        const dropped = await challenges.discard(id);
        if (!dropped.ok) return dropped;
        return err(user.isBlocked ? accountLocked() : invalidCode(NO_PENDING_LOGIN));
      }

      const valid = totpService.verify(user.totpSecret, input.value.code);
      if (!valid.ok) return valid;

      if (!valid.value) {
        const failures = await challenges.recordFailure(id, maxFailedCodeAttempts);
        if (!failures.ok) return failures;

        // closed by a concurrent guess in the meantime
        if (failures.value === 0) return err(invalidCode(NO_PENDING_LOGIN));

        if (failures.value >= maxFailedCodeAttempts) {
          logger.warn("Two-factor challenge discarded after invalid codes", {
            userId: id,
            attempts: failures.value,
          });
          return err(invalidCode("Too many invalid codes; log in again"));
        }

        logger.warn("Invalid two-factor code", { userId: id, attempts: failures.value });
        return err(invalidCode());
      }

      const consumed = await challenges.consume(id);
      if (!consumed.ok) return consumed;
      if (!consumed.value) {
        logger.warn("Two-factor challenge already used", { userId: id });
        return err(invalidCode(NO_PENDING_LOGIN));
      }

      return authenticate(user.id);
    },

    async getUser(token: string): Promise<Result<UserView, AppError>> {
      const found = await tokenStore.find(token);
      if (!found.ok) return found;
      if (found.value === null) return err(notFound("Token"));

      const owner = await userRepo.findById(found.value.userId);
      if (!owner.ok) {
        if (owner.error.code !== ErrorCode.NOT_FOUND) return owner;

        logger.warn("Purging token of missing user", { userId: found.value.userId });
        const purged = await tokenStore.delete(token);
        if (!purged.ok) return purged;
        return err(notFound("User"));
      }

      return ok(toUserView(owner.value));
    },

    async logout(token: string): Promise<Result<void, AppError>> {
      const removed = await tokenStore.delete(token);
      if (!removed.ok) return removed;

      logger.info("User logged out");
      return ok(undefined);
    },
  };
};
