import { describe, expect, it } from "vitest";
import { parseConfig } from "../../src/infrastructure/config/config.js";
import { TEST_SECRET } from "../helpers/fixtures.js";

describe("Config", () => {
  it("applies defaults", () => {
    const parsed = parseConfig({ AUTH_SECRET_KEY: TEST_SECRET });
    expect(parsed.success).toBe(true);
    if (!parsed.success) return;

    expect(parsed.data).toEqual({
      env: "development",
      log: { level: "info", format: "pretty" },
      database: { driver: "sqlite", path: "data/ballot-auth.sqlite" },
      auth: {
        secretKey: TEST_SECRET,
        maxFailedLoginAttempts: 5,
        maxFailedCodeAttempts: 5,
        twoFactorChallengeTtlMs: 300_000,
        hashRounds: 12,
      },
      totp: { issuer: "Ballot", window: 1 },
      passwordPolicy: {
        minLength: 8,
        requireUppercase: false,
        requireLowercase: false,
        requireDigit: false,
        requireSpecial: false,
      },
      passwordReset: { ttlMs: 259_200_000 },
      mail: { from: "no-reply@localhost" },
    });
  });

  it("coerces numbers and flags from strings", () => {
    const parsed = parseConfig({
      AUTH_SECRET_KEY: TEST_SECRET,
      AUTH_MAX_FAILED_LOGIN_ATTEMPTS: "3",
      TOTP_WINDOW: "0",
      PASSWORD_REQUIRE_DIGIT: "true",
      DATABASE_DRIVER: "memory",
    });
    expect(parsed.success).toBe(true);
    if (!parsed.success) return;

    expect(parsed.data.auth.maxFailedLoginAttempts).toBe(3);
    expect(parsed.data.totp.window).toBe(0);
    expect(parsed.data.passwordPolicy.requireDigit).toBe(true);
    expect(parsed.data.database.driver).toBe("memory");
  });

  it("requires a long enough secret key", () => {
    const missing = parseConfig({});
    const short = parseConfig({ AUTH_SECRET_KEY: "test-secret" });
    expect(missing.success).toBe(false);
    expect(short.success).toBe(false);
    if (short.success) return;

    expect(short.error.issues.map((i) => i.path.join("."))).toEqual(["auth.secretKey"]);
  });

  it("rejects a lockout threshold below 1", () => {
    const parsed = parseConfig({
      AUTH_SECRET_KEY: TEST_SECRET,
      AUTH_MAX_FAILED_LOGIN_ATTEMPTS: "0",
    });
    expect(parsed.success).toBe(false);
  });

  it("rejects unknown drivers and log levels", () => {
    expect(parseConfig({ AUTH_SECRET_KEY: TEST_SECRET, DATABASE_DRIVER: "postgres" }).success).toBe(
      false,
    );
    expect(parseConfig({ AUTH_SECRET_KEY: TEST_SECRET, LOG_LEVEL: "verbose" }).success).toBe(false);
  });
});
