import type { Database } from "better-sqlite3";
import { type AuthService, createAuthService } from "./application/services/auth.service.js";
import {
  type PasswordResetService,
  createPasswordResetService,
} from "./application/services/password-reset.service.js";
import {
  type RegistrationService,
  createRegistrationService,
} from "./application/services/registration.service.js";
import {
  type TwoFactorService,
  createTwoFactorService,
} from "./application/services/two-factor.service.js";
import type { FailedAttemptCounter } from "./core/ports/failed-attempt-counter.js";
import type { Logger } from "./core/ports/logger.js";
import type { Notifier } from "./core/ports/notifier.js";
import type { PasswordHasher } from "./core/ports/password-hasher.js";
import type { TokenStore } from "./core/ports/token-store.js";
import type { TotpService } from "./core/ports/totp-service.js";
import type { UserRepository } from "./core/ports/user.repository.js";
import type { AppConfig } from "./infrastructure/config/config.js";
import { createInMemoryFailedAttemptCounter } from "./infrastructure/database/in-memory-failed-attempt.counter.js";
import { createInMemoryTokenStore } from "./infrastructure/database/in-memory-token.store.js";
import { createInMemoryTwoFactorChallengeStore } from "./infrastructure/database/in-memory-two-factor-challenge.store.js";
import { createInMemoryUserRepository } from "./infrastructure/database/in-memory-user.repository.js";
import { migrateUp } from "./infrastructure/database/migrations/runner.js";
import { openSqliteDatabase } from "./infrastructure/database/sqlite-connection.js";
import { createSqliteFailedAttemptCounter } from "./infrastructure/database/sqlite-failed-attempt.counter.js";
import { createSqliteTokenStore } from "./infrastructure/database/sqlite-token.store.js";
import { createSqliteUserRepository } from "./infrastructure/database/sqlite-user.repository.js";
import { createLogNotifier } from "./infrastructure/notifications/log-notifier.js";
import { createAccountLockout } from "./infrastructure/security/account-lockout.js";
import { createPasswordHasher } from "./infrastructure/security/password-hasher.js";
import {
  createPasswordPolicy,
  loadCommonPasswords,
} from "./infrastructure/security/password-policy.js";
import { createResetTokenGenerator } from "./infrastructure/security/reset-token.js";
import { createTotpService } from "./infrastructure/security/totp-service.js";

/**
 * Composition root: wires storage, security adapters and services from a
 * validated config. Callers own the returned module and must `close()` it.
 */

export interface Storage {
  readonly userRepo: UserRepository;
  readonly tokenStore: TokenStore;
  readonly failedAttempts: FailedAttemptCounter;
  /** Underlying SQLite handle; null for the memory driver */
  readonly db: Database | null;
  close(): void;
}

export interface AuthModule {
  readonly auth: AuthService;
  readonly registration: RegistrationService;
  readonly twoFactor: TwoFactorService;
  readonly passwordReset: PasswordResetService;
  readonly storage: Storage;
  readonly passwordHasher: PasswordHasher;
  readonly totpService: TotpService;
  close(): void;
}

export interface AuthModuleOptions {
  /** Defaults to a notifier that writes messages to the log */
  readonly notifier?: Notifier;
  /** Clock for two-factor challenge expiry */
  readonly now?: () => number;
}

/** Open the configured store, migrating SQLite to the latest schema */
export const openStorage = async (config: AppConfig, logger: Logger): Promise<Storage> => {
  if (config.database.driver === "memory") {
    logger.debug("Using in-memory storage");
    return {
      userRepo: createInMemoryUserRepository(),
      tokenStore: createInMemoryTokenStore(),
      failedAttempts: createInMemoryFailedAttemptCounter(),
      db: null,
      close() {},
    };
  }

  const db = openSqliteDatabase(config.database.path);
  logger.info("SQLite database opened", { path: config.database.path });

  await migrateUp(db, logger);

  return {
    userRepo: createSqliteUserRepository(db),
    tokenStore: createSqliteTokenStore(db),
    failedAttempts: createSqliteFailedAttemptCounter(db),
    db,
    close() {
      db.close();
    },
  };
};

export const createAuthModule = async (
  config: AppConfig,
  logger: Logger,
  options: AuthModuleOptions = {},
): Promise<AuthModule> => {
  const storage = await openStorage(config, logger);
  const { userRepo, tokenStore, failedAttempts } = storage;

  const passwordHasher = createPasswordHasher(config.auth.hashRounds);
  const passwordPolicy = createPasswordPolicy(config.passwordPolicy, loadCommonPasswords());
  const totpService = createTotpService({ window: config.totp.window });
  const notifier = options.notifier ?? createLogNotifier(logger, config.mail.from);

  const accountLockout = createAccountLockout({
    counter: failedAttempts,
    userRepo,
    maxFailedAttempts: config.auth.maxFailedLoginAttempts,
    logger: logger.child({ component: "lockout" }),
  });

  const auth = createAuthService({
    userRepo,
    tokenStore,
    passwordHasher,
    accountLockout,
    challenges: createInMemoryTwoFactorChallengeStore(options.now),
    totpService,
    challengeTtlMs: config.auth.twoFactorChallengeTtlMs,
    maxFailedCodeAttempts: config.auth.maxFailedCodeAttempts,
    logger: logger.child({ service: "auth" }),
  });

  const registration = createRegistrationService({
    userRepo,
    tokenStore,
    passwordHasher,
    passwordPolicy,
    logger: logger.child({ service: "registration" }),
  });

  const twoFactor = createTwoFactorService({
    userRepo,
    totpService,
    issuer: config.totp.issuer,
    logger: logger.child({ service: "two-factor" }),
  });

  const passwordReset = createPasswordResetService({
    userRepo,
    tokenStore,
    passwordHasher,
    passwordPolicy,
    resetTokens: createResetTokenGenerator({
      secret: config.auth.secretKey,
      ttlMs: config.passwordReset.ttlMs,
    }),
    notifier,
    logger: logger.child({ service: "password-reset" }),
  });

  return {
    auth,
    registration,
    twoFactor,
    passwordReset,
    storage,
    passwordHasher,
    totpService,
    close() {
      storage.close();
    },
  };
};
