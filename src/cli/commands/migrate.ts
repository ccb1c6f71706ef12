/**
 * `ballot-auth migrate [up|down]`: manage the SQLite schema.
 */

import type { Logger } from "../../core/ports/logger.js";
import type { AppConfig } from "../../infrastructure/config/config.js";
import { migrateDown, migrateUp } from "../../infrastructure/database/migrations/runner.js";
import { openSqliteDatabase } from "../../infrastructure/database/sqlite-connection.js";
import { info, success, warn } from "../ui.js";

export const migrateCommand = async (
  args: readonly string[],
  config: AppConfig,
  logger: Logger,
): Promise<void> => {
  const direction = args[0]?.toLowerCase() ?? "up";
  if (direction !== "up" && direction !== "down") {
    throw new Error(`Unknown migrate direction: ${direction} (expected "up" or "down")`);
  }

  if (config.database.driver !== "sqlite") {
    warn("DATABASE_DRIVER is memory; there is no schema to migrate");
    return;
  }

  const db = openSqliteDatabase(config.database.path);
  try {
    if (direction === "up") {
      const applied = await migrateUp(db, logger);
      if (applied === 0) {
        info("Database schema is up to date");
      } else {
        success(`Applied ${applied} migration(s)`);
      }
      return;
    }

    const version = await migrateDown(db, logger);
    if (version === null) {
      info("Nothing to roll back");
    } else {
      success(`Rolled back migration ${version}`);
    }
  } finally {
    db.close();
  }
};
