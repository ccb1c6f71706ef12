#!/usr/bin/env node

/**
 * ballot-auth CLI: operator tooling for the account store.
 *
 * Usage:
 *   ballot-auth migrate [up|down]
 *   ballot-auth create-superuser <username> <password> [email]
 *   ballot-auth unblock <username>
 *   ballot-auth version
 *   ballot-auth help
 */

import "dotenv/config";
import { type AuthModule, createAuthModule } from "../bootstrap.js";
import { loadConfig } from "../infrastructure/config/config.js";
import { createLogger } from "../infrastructure/logging/logger.js";
import { printBootSummary } from "../shared/cli.js";
import { createSuperuserCommand } from "./commands/create-superuser.js";
import { helpCommand } from "./commands/help.js";
import { migrateCommand } from "./commands/migrate.js";
import { unblockCommand } from "./commands/unblock.js";
import { blank, bold, cyan, dim, error, log, white } from "./ui.js";

// ── Version ─────────────────────────────────────────────────────────────

const VERSION = "1.0.0";

// ── Arg parsing ─────────────────────────────────────────────────────────

const args = process.argv.slice(2);
const command = args[0]?.toLowerCase() ?? "";
const commandArgs = args.slice(1);

// ── Boot ────────────────────────────────────────────────────────────────

const boot = () => {
  const config = loadConfig();
  const logger = createLogger(config.log.level, { app: "ballot-auth" }, config.log.format);
  return { config, logger };
};

/** Run a command against a fully wired module, closing the store afterwards */
const withModule = async (fn: (module: AuthModule) => Promise<void>): Promise<void> => {
  const bootStart = performance.now();
  const { config, logger } = boot();
  const module = await createAuthModule(config, logger);
  printBootSummary({ config, bootTimeMs: performance.now() - bootStart });

  try {
    await fn(module);
  } finally {
    module.close();
  }
};

// ── Route command ───────────────────────────────────────────────────────

const run = async (): Promise<void> => {
  try {
    switch (command) {
      case "migrate": {
        const { config, logger } = boot();
        await migrateCommand(commandArgs, config, logger);
        break;
      }

      case "create-superuser":
      case "createsuperuser":
        await withModule((module) => createSuperuserCommand(commandArgs, module));
        break;

      case "unblock":
        await withModule((module) => unblockCommand(commandArgs, module));
        break;

      case "version":
      case "-v":
      case "--version":
        log(`ballot-auth v${VERSION}`);
        break;

      case "help":
      case "-h":
      case "--help":
      case "":
        helpCommand(VERSION);
        break;

      default:
        blank();
        error(`Unknown command: ${bold(white(command))}`);
        blank();
        log(`  ${dim("Run")} ${cyan("ballot-auth help")} ${dim("to see available commands.")}`);
        blank();
        process.exitCode = 1;
    }
  } catch (e: unknown) {
    blank();
    error(e instanceof Error ? e.message : String(e));
    blank();
    process.exitCode = 1;
  }
};

await run();
