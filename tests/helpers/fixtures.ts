import { type AuthModule, type AuthModuleOptions, createAuthModule } from "../../src/bootstrap.js";
import type { User } from "../../src/core/entities/user.entity.js";
import {
  type AppConfig,
  type ConfigSource,
  parseConfig,
} from "../../src/infrastructure/config/config.js";
import { createSilentLogger } from "../../src/infrastructure/logging/logger.js";

export const TEST_SECRET = "test-secret-key-with-at-least-32-characters";

/** Valid config for tests: memory store, cheap hashing */
export const testConfig = (overrides: ConfigSource = {}): AppConfig => {
  const parsed = parseConfig({
    NODE_ENV: "test",
    DATABASE_DRIVER: "memory",
    AUTH_SECRET_KEY: TEST_SECRET,
    AUTH_HASH_ROUNDS: "4",
    ...overrides,
  });
  if (!parsed.success) throw new Error(`Invalid test config: ${parsed.error.message}`);
  return parsed.data;
};

export const createTestModule = (
  overrides: ConfigSource = {},
  options: AuthModuleOptions = {},
): Promise<AuthModule> => createAuthModule(testConfig(overrides), createSilentLogger(), options);

interface SeedUser {
  readonly username: string;
  readonly password: string;
  readonly email?: string;
  readonly isSuperuser?: boolean;
}

/** Insert a user directly into the store, bypassing the services */
export const seedUser = async (module: AuthModule, seed: SeedUser): Promise<User> => {
  const hashed = await module.passwordHasher.hash(seed.password);
  if (!hashed.ok) throw new Error(hashed.error.message);

  const created = await module.storage.userRepo.create({
    username: seed.username,
    email: seed.email ?? null,
    passwordHash: hashed.value,
    isSuperuser: seed.isSuperuser ?? false,
  });
  if (!created.ok) throw new Error(created.error.message);
  return created.value;
};

/** Give a user a confirmed TOTP secret and return it */
export const enableTwoFactor = async (module: AuthModule, user: User): Promise<string> => {
  const secret = module.totpService.generateSecret();
  const updated = await module.storage.userRepo.update(user.id, {
    totpSecret: secret,
    totpConfirmed: true,
  });
  if (!updated.ok) throw new Error(updated.error.message);
  return secret;
};

/** Current code for a secret */
export const currentCode = (module: AuthModule, secret: string, atMs?: number): string => {
  const code = module.totpService.generate(secret, atMs);
  if (!code.ok) throw new Error(code.error.message);
  return code.value;
};

/** A 6-digit code that is not valid for the secret around `atMs` */
export const wrongCode = (module: AuthModule, secret: string, atMs: number = Date.now()): string => {
  const valid = new Set(
    [-30_000, 0, 30_000].map((offset) => currentCode(module, secret, atMs + offset)),
  );
  for (let n = 0; ; n++) {
    const candidate = String(n).padStart(6, "0");
    if (!valid.has(candidate)) return candidate;
  }
};

/** Fresh copy of a user from the store */
export const reloadUser = async (module: AuthModule, id: User["id"]): Promise<User> => {
  const found = await module.storage.userRepo.findById(id);
  if (!found.ok) throw new Error(found.error.message);
  return found.value;
};
