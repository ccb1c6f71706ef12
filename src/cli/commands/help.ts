/**
 * `ballot-auth help`: display help information.
 */

import { blank, bold, cyan, dim, gray, green, log, logo, white, yellow } from "../ui.js";

export const COMMANDS = [
  ["migrate [up|down]", "Apply pending migrations, or roll back the last one"],
  ["create-superuser <username> <password> [email]", "Create an administrator account"],
  ["unblock <username>", "Lift a lockout and reset the failed-login count"],
  ["version", "Show CLI version"],
  ["help", "Show this help message"],
] as const;

export const helpCommand = (version: string): void => {
  blank();
  log(logo(version));
  blank();

  log(`  ${bold(white("USAGE"))}`);
  log(`  ${gray("─".repeat(50))}`);
  log(`  ${dim("$")} ${cyan("ballot-auth")} ${green("<command>")} ${dim("[arguments]")}`);
  blank();

  log(`  ${bold(white("COMMANDS"))}`);
  log(`  ${gray("─".repeat(50))}`);

  const maxCmd = Math.max(...COMMANDS.map(([c]) => c.length));
  for (const [cmd, desc] of COMMANDS) {
    log(`  ${green(cmd.padEnd(maxCmd + 2))} ${dim(desc)}`);
  }

  blank();
  log(`  ${bold(white("ENVIRONMENT"))}`);
  log(`  ${gray("─".repeat(50))}`);
  log(`  ${yellow("AUTH_SECRET_KEY")}   ${dim("required, at least 32 characters")}`);
  log(`  ${yellow("DATABASE_PATH")}     ${dim("SQLite file (default data/ballot-auth.sqlite)")}`);
  log(`  ${dim("Variables are read from the process and from .env in the working directory.")}`);
  blank();
};
