import { beforeEach, describe, expect, it } from "vitest";
import type { Database } from "better-sqlite3";
import { migrateDown, migrateUp } from "../../src/infrastructure/database/migrations/runner.js";
import { openSqliteDatabase } from "../../src/infrastructure/database/sqlite-connection.js";
import { createSilentLogger } from "../../src/infrastructure/logging/logger.js";

const logger = createSilentLogger();

const tableNames = (db: Database): string[] =>
  db
    .prepare<[], { name: string }>(
      "SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name",
    )
    .all()
    .map((t) => t.name);

describe("Migrations", () => {
  let db: Database;

  beforeEach(() => {
    db = openSqliteDatabase(":memory:");
  });

  it("applies all migrations", async () => {
    expect(await migrateUp(db, logger)).toBe(2);
    expect(tableNames(db)).toEqual(["_migrations", "tokens", "users"]);
  });

  it("is idempotent", async () => {
    await migrateUp(db, logger);
    expect(await migrateUp(db, logger)).toBe(0);
  });

  it("rolls back the last migration", async () => {
    await migrateUp(db, logger);

    expect(await migrateDown(db, logger)).toBe("002");
    expect(tableNames(db)).toEqual(["_migrations", "users"]);

    expect(await migrateDown(db, logger)).toBe("001");
    expect(await migrateDown(db, logger)).toBe(null);
    expect(tableNames(db)).toEqual(["_migrations"]);
  });

  it("re-applies after a rollback", async () => {
    await migrateUp(db, logger);
    await migrateDown(db, logger);
    expect(await migrateUp(db, logger)).toBe(1);
  });
});
