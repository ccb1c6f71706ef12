/**
 * CLI UI utilities: zero-dependency ANSI output helpers.
 * Follows the same style as the boot summary.
 */

import { bold, cyan, dim, gray, green, red, stripAnsi, white, yellow } from "../shared/ansi.js";

export { bold, cyan, dim, gray, green, red, white, yellow } from "../shared/ansi.js";

// ── Icons ───────────────────────────────────────────────────────────────

export const icons = {
  success: green("✔"),
  error: red("✗"),
  warning: yellow("⚠"),
  info: cyan("ℹ"),
  chevron: cyan("›"),
} as const;

// ── Logo ────────────────────────────────────────────────────────────────

export const logo = (version: string): string => {
  const title = `${bold(white("ballot-auth"))}  ${dim(gray(`v${version}`))}`;
  const tagline = dim(gray("Voter accounts, sessions and 2FA"));
  return box([title, tagline]);
};

// ── Output helpers ──────────────────────────────────────────────────────

export const log = (msg: string) => process.stdout.write(`${msg}\n`);
export const blank = () => process.stdout.write("\n");
export const error = (msg: string) => process.stderr.write(`  ${icons.error} ${red(msg)}\n`);
export const warn = (msg: string) => process.stdout.write(`  ${icons.warning} ${yellow(msg)}\n`);
export const info = (msg: string) => process.stdout.write(`  ${icons.info} ${msg}\n`);
export const success = (msg: string) => process.stdout.write(`  ${icons.success} ${green(msg)}\n`);

// ── Table helper ────────────────────────────────────────────────────────

export const printKeyValue = (pairs: readonly (readonly [string, string])[]): void => {
  const maxKey = Math.max(...pairs.map(([k]) => k.length));
  for (const [key, value] of pairs) {
    log(`  ${gray("│")} ${dim(key.padEnd(maxKey))}  ${white(value)}`);
  }
};

// ── Box ─────────────────────────────────────────────────────────────────

export const box = (lines: readonly string[]): string => {
  const maxLen = Math.max(...lines.map((l) => stripAnsi(l).length));
  const border = "─".repeat(maxLen + 4);

  return [
    bold(cyan(`  ┌${border}┐`)),
    ...lines.map((line) => {
      const padding = " ".repeat(maxLen - stripAnsi(line).length);
      return `${bold(cyan("  │"))}  ${line}${padding}  ${bold(cyan("│"))}`;
    }),
    bold(cyan(`  └${border}┘`)),
  ].join("\n");
};
