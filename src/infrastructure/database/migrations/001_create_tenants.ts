import type { SqliteDatabase } from "../sqlite.js";

/**
 * Migration 001: tenants and the memberships linking callers to them
 */
export const up = (db: SqliteDatabase): void => {
  db.exec(`
    CREATE TABLE IF NOT EXISTS tenants (
      id          TEXT PRIMARY KEY,
      name        TEXT NOT NULL,
      slug        TEXT NOT NULL UNIQUE,
      created_at  INTEGER NOT NULL
    )
  `);

  db.exec(`
    CREATE TABLE IF NOT EXISTS memberships (
      tenant_id  TEXT NOT NULL REFERENCES tenants(id) ON DELETE CASCADE,
      user_id    TEXT NOT NULL,
      role       TEXT NOT NULL DEFAULT 'member',
      joined_at  INTEGER NOT NULL,
      PRIMARY KEY (tenant_id, user_id)
    )
  `);

  db.exec(
    "CREATE INDEX IF NOT EXISTS idx_memberships_user ON memberships(user_id, joined_at, tenant_id)",
  );
};

export const down = (db: SqliteDatabase): void => {
  db.exec("DROP INDEX IF EXISTS idx_memberships_user");
  db.exec("DROP TABLE IF EXISTS memberships");
  db.exec("DROP TABLE IF EXISTS tenants");
};
