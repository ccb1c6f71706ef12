import { z } from "zod";
import { LOG_LEVELS } from "../../core/ports/logger.js";
import { printConfigError } from "../../shared/cli.js";

/**
 * Application config: validated at boot via Zod.
 * Fails fast if env vars are missing or out of range.
 */

const booleanFlag = z
  .enum(["true", "false"])
  .transform((v) => v === "true")
  .default("false");

const configSchema = z.object({
  env: z.enum(["development", "production", "test"]).default("development"),

  log: z.object({
    level: z.enum(LOG_LEVELS).default("info"),
    format: z.enum(["pretty", "json"]).default("pretty"),
  }),

  database: z.object({
    driver: z.enum(["memory", "sqlite"]).default("sqlite"),
    path: z.string().min(1).default("data/ballot-auth.sqlite"),
  }),

  auth: z.object({
    secretKey: z.string().min(32),
    maxFailedLoginAttempts: z.coerce.number().int().min(1).default(5),
    maxFailedCodeAttempts: z.coerce.number().int().min(1).default(5),
    twoFactorChallengeTtlMs: z.coerce.number().int().positive().default(300_000), // 5 minutes
    hashRounds: z.coerce.number().int().min(4).max(15).default(12),
  }),

  totp: z.object({
    issuer: z.string().min(1).default("Ballot"),
    window: z.coerce.number().int().min(0).max(5).default(1),
  }),

  passwordPolicy: z.object({
    minLength: z.coerce.number().int().positive().default(8),
    requireUppercase: booleanFlag,
    requireLowercase: booleanFlag,
    requireDigit: booleanFlag,
    requireSpecial: booleanFlag,
  }),

  passwordReset: z.object({
    ttlMs: z.coerce.number().int().positive().default(259_200_000), // 3 days
  }),

  mail: z.object({
    from: z.string().min(1).default("no-reply@localhost"),
  }),
});

export type AppConfig = z.infer<typeof configSchema>;

export type ConfigSource = Readonly<Record<string, string | undefined>>;

/** Parse config from an env-like record; returns the Zod result untouched. */
export const parseConfig = (env: ConfigSource) =>
  configSchema.safeParse({
    env: env["NODE_ENV"],
    log: {
      level: env["LOG_LEVEL"],
      format: env["LOG_FORMAT"],
    },
    database: {
      driver: env["DATABASE_DRIVER"],
      path: env["DATABASE_PATH"],
    },
    auth: {
      secretKey: env["AUTH_SECRET_KEY"],
      maxFailedLoginAttempts: env["AUTH_MAX_FAILED_LOGIN_ATTEMPTS"],
      maxFailedCodeAttempts: env["AUTH_MAX_FAILED_CODE_ATTEMPTS"],
      twoFactorChallengeTtlMs: env["AUTH_TWO_FACTOR_CHALLENGE_TTL_MS"],
      hashRounds: env["AUTH_HASH_ROUNDS"],
    },
    totp: {
      issuer: env["TOTP_ISSUER"],
      window: env["TOTP_WINDOW"],
    },
    passwordPolicy: {
      minLength: env["PASSWORD_MIN_LENGTH"],
      requireUppercase: env["PASSWORD_REQUIRE_UPPERCASE"],
      requireLowercase: env["PASSWORD_REQUIRE_LOWERCASE"],
      requireDigit: env["PASSWORD_REQUIRE_DIGIT"],
      requireSpecial: env["PASSWORD_REQUIRE_SPECIAL"],
    },
    passwordReset: {
      ttlMs: env["PASSWORD_RESET_TTL_MS"],
    },
    mail: {
      from: env["MAIL_FROM"],
    },
  });

export const loadConfig = (env: ConfigSource = process.env): AppConfig => {
  const result = parseConfig(env);

  if (!result.success) {
    const formatted = result.error.flatten((issue) => `${issue.path.join(".")}: ${issue.message}`);
    printConfigError(formatted.fieldErrors);
    process.exit(1);
  }

  return result.data;
};
