import type { AppConfig } from "../infrastructure/config/config.js";
import {
  bgCyan,
  bgGreen,
  bgMagenta,
  bgYellow,
  bold,
  cyan,
  dim,
  gray,
  green,
  red,
  white,
  yellow,
} from "./ansi.js";

// ── Helpers ─────────────────────────────────────────────────────────────

const formatUptime = (ms: number): string => {
  if (ms < 1000) return `${Math.round(ms)}ms`;
  return `${(ms / 1000).toFixed(2)}s`;
};

const envBadge = (env: string): string => {
  switch (env) {
    case "production":
      return bgGreen("PRODUCTION");
    case "development":
      return bgCyan("DEVELOPMENT");
    case "test":
      return bgYellow("TEST");
    default:
      return bgMagenta(env.toUpperCase());
  }
};

// ── Public API ──────────────────────────────────────────────────────────

interface BootInfo {
  readonly config: AppConfig;
  readonly bootTimeMs: number;
}

/**
 * Summary of the effective configuration, printed by CLI commands that open
 * the store. Secrets are never shown.
 */
export const formatBootSummary = (info: BootInfo): string => {
  const { config, bootTimeMs } = info;
  const storage =
    config.database.driver === "sqlite" ? `sqlite ${dim(config.database.path)}` : "memory";

  const lines = [
    "",
    `  ${envBadge(config.env)}  ${dim("ready in")} ${bold(green(formatUptime(bootTimeMs)))}`,
    "",
    `  ${gray("├─")} ${dim("Storage")}       ${white(storage)}`,
    `  ${gray("├─")} ${dim("Lockout")}       ${white(`${config.auth.maxFailedLoginAttempts} failed logins`)}`,
    `  ${gray("├─")} ${dim("2FA codes")}     ${white(`${config.auth.maxFailedCodeAttempts} tries per challenge`)}`,
    `  ${gray("├─")} ${dim("TOTP issuer")}   ${white(config.totp.issuer)}`,
    `  ${gray("└─")} ${dim("Log level")}     ${white(config.log.level)}`,
    "",
  ];
  return lines.join("\n");
};

export const printBootSummary = (info: BootInfo): void => {
  process.stdout.write(`${formatBootSummary(info)}\n`);
};

/**
 * Prints config validation errors with a hint.
 */
export const printConfigError = (errors: Readonly<Record<string, string[] | undefined>>): void => {
  const lines: string[] = [];

  lines.push("");
  lines.push(`  ${bgMagenta("CONFIG ERROR")}  ${dim("Invalid configuration detected")}`);
  lines.push("");

  for (const [field, messages] of Object.entries(errors)) {
    for (const msg of messages ?? []) {
      lines.push(`  ${red("✗")} ${bold(white(field))} ${dim("→")} ${red(msg)}`);
    }
  }

  lines.push("");
  lines.push(`  ${dim("Hint: Copy .env.example to .env and set the required values:")}`);
  lines.push(`  ${cyan("$ cp .env.example .env")}`);
  lines.push(`  ${yellow("AUTH_SECRET_KEY")} ${dim("must be at least 32 characters")}`);
  lines.push("");

  process.stderr.write(`${lines.join("\n")}\n`);
};
