import type { Logger } from "../../../core/ports/logger.js";
import type { SqliteDatabase } from "../sqlite.js";
import { down as down001, up as up001 } from "./001_create_tenants.js";
import { down as down002, up as up002 } from "./002_create_session_data.js";

/**
 * Database migration runner.
 * Tracks applied migrations in a `_migrations` table.
 * Supports up/down with versioned TypeScript migration files.
 */

interface Migration {
  readonly version: string;
  readonly name: string;
  readonly up: (db: SqliteDatabase) => void;
  readonly down: (db: SqliteDatabase) => void;
}

const migrations: readonly Migration[] = [
  { version: "001", name: "create_tenants", up: up001, down: down001 },
  { version: "002", name: "create_session_data", up: up002, down: down002 },
];

/** Initialize the migrations tracking table */
const ensureMigrationsTable = (db: SqliteDatabase): void => {
  db.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      version     TEXT PRIMARY KEY,
      name        TEXT NOT NULL,
      applied_at  INTEGER NOT NULL
    )
  `);
};

/** Get all applied migration versions */
const getAppliedVersions = (db: SqliteDatabase): Set<string> => {
  const rows = db
    .prepare<[], { version: string }>("SELECT version FROM _migrations ORDER BY version")
    .all();
  return new Set(rows.map((r) => r.version));
};

/**
 * Run all pending migrations (up).
 * Returns the number of migrations applied.
 */
export const migrateUp = (db: SqliteDatabase, logger: Logger): number => {
  ensureMigrationsTable(db);
  const applied = getAppliedVersions(db);
  const record = db.prepare<[string, string, number]>(
    "INSERT INTO _migrations (version, name, applied_at) VALUES (?, ?, ?)",
  );
  let count = 0;

  for (const migration of migrations) {
    if (applied.has(migration.version)) continue;

    logger.info(`Applying migration ${migration.version}: ${migration.name}`);

    db.transaction(() => {
      migration.up(db);
      record.run(migration.version, migration.name, Date.now());
    })();

    count++;
  }

  if (count === 0) {
    logger.debug("No pending migrations");
  } else {
    logger.info(`Applied ${count} migration(s)`);
  }

  return count;
};

/**
 * Rollback the last applied migration (down).
 * Returns the version that was rolled back, or null if nothing to rollback.
 */
export const migrateDown = (db: SqliteDatabase, logger: Logger): string | null => {
  ensureMigrationsTable(db);

  const lastApplied = db
    .prepare<[], { version: string }>(
      "SELECT version FROM _migrations ORDER BY version DESC LIMIT 1",
    )
    .get();

  if (!lastApplied) {
    logger.info("No migrations to rollback");
    return null;
  }

  const migration = migrations.find((m) => m.version === lastApplied.version);
  if (!migration) {
    logger.error(`Migration ${lastApplied.version} not found in migration files`);
    return null;
  }

  logger.info(`Rolling back migration ${migration.version}: ${migration.name}`);

  db.transaction(() => {
    migration.down(db);
    db.prepare<[string]>("DELETE FROM _migrations WHERE version = ?").run(migration.version);
  })();

  return migration.version;
};
