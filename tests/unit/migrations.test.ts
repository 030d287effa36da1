import { beforeEach, describe, expect, it } from "vitest";
import { migrateDown, migrateUp } from "../../src/infrastructure/database/migrations/runner.js";
import { type SqliteDatabase, openSqlite } from "../../src/infrastructure/database/sqlite.js";
import { createLogger } from "../../src/infrastructure/logging/logger.js";

const logger = createLogger({ level: "fatal" });

const tableNames = (db: SqliteDatabase): string[] =>
  db
    .prepare<[], { name: string }>("SELECT name FROM sqlite_master WHERE type='table' ORDER BY name")
    .all()
    .map((t) => t.name);

describe("Migrations", () => {
  let db: SqliteDatabase;

  beforeEach(() => {
    db = openSqlite(":memory:");
  });

  it("applies all migrations", () => {
    const count = migrateUp(db, logger);
    expect(count).toBe(2);
    expect(tableNames(db)).toEqual(["_migrations", "memberships", "session_data", "tenants"]);
  });

  it("is idempotent (running twice applies nothing the second time)", () => {
    migrateUp(db, logger);
    expect(migrateUp(db, logger)).toBe(0);
  });

  it("rolls back the last migration", () => {
    migrateUp(db, logger);
    expect(migrateDown(db, logger)).toBe("002");
    expect(tableNames(db)).toEqual(["_migrations", "memberships", "tenants"]);
  });

  it("rolls back all migrations", () => {
    migrateUp(db, logger);
    migrateDown(db, logger);
    expect(migrateDown(db, logger)).toBe("001");
    expect(tableNames(db)).toEqual(["_migrations"]);
  });

  it("returns null when nothing to rollback", () => {
    migrateUp(db, logger);
    migrateDown(db, logger);
    migrateDown(db, logger);
    expect(migrateDown(db, logger)).toBeNull();
  });
});
