/**
 * SQL Server migration runner: uses the `mssql` npm package.
 *
 * Mirrors the SQLite runner but uses T-SQL DDL.
 * Migrations are idempotent and wrapped in transactions.
 */

import type sql from "mssql";
import type { Logger } from "../../../core/ports/logger.js";

interface MssqlMigration {
  readonly version: string;
  readonly name: string;
  readonly up: string; // T-SQL DDL
  readonly down: string;
}

/**
 * All SQL Server migrations: inlined T-SQL strings.
 * Uses NVARCHAR for text, BIGINT for timestamps (ms).
 */
const migrations: readonly MssqlMigration[] = [
  {
    version: "001",
    name: "create_tenants",
    up: `
      IF NOT EXISTS (SELECT * FROM sys.tables WHERE name = 'tenants')
      CREATE TABLE tenants (
        id          NVARCHAR(36)  NOT NULL PRIMARY KEY,
        name        NVARCHAR(100) NOT NULL,
        slug        NVARCHAR(64)  NOT NULL UNIQUE,
        created_at  BIGINT        NOT NULL
      );

      IF NOT EXISTS (SELECT * FROM sys.tables WHERE name = 'memberships')
      CREATE TABLE memberships (
        tenant_id  NVARCHAR(36) NOT NULL REFERENCES tenants(id) ON DELETE CASCADE,
        user_id    NVARCHAR(64) NOT NULL,
        role       NVARCHAR(20) NOT NULL DEFAULT 'member',
        joined_at  BIGINT       NOT NULL,
        CONSTRAINT pk_memberships PRIMARY KEY (tenant_id, user_id)
      );

      IF NOT EXISTS (SELECT * FROM sys.indexes WHERE name = 'idx_memberships_user')
      CREATE INDEX idx_memberships_user ON memberships(user_id, joined_at, tenant_id);
    `,
    down: `
      DROP INDEX IF EXISTS idx_memberships_user ON memberships;
      IF EXISTS (SELECT * FROM sys.tables WHERE name = 'memberships')
      DROP TABLE memberships;
      IF EXISTS (SELECT * FROM sys.tables WHERE name = 'tenants')
      DROP TABLE tenants;
    `,
  },
  {
    version: "002",
    name: "create_session_data",
    up: `
      IF NOT EXISTS (SELECT * FROM sys.tables WHERE name = 'session_data')
      CREATE TABLE session_data (
        session_id  NVARCHAR(64)   NOT NULL,
        [key]       NVARCHAR(64)   NOT NULL,
        value       NVARCHAR(MAX)  NOT NULL,
        expires_at  BIGINT         NOT NULL,
        CONSTRAINT pk_session_data PRIMARY KEY (session_id, [key])
      );

      IF NOT EXISTS (SELECT * FROM sys.indexes WHERE name = 'idx_session_data_expires')
      CREATE INDEX idx_session_data_expires ON session_data(expires_at);
    `,
    down: `
      DROP INDEX IF EXISTS idx_session_data_expires ON session_data;
      IF EXISTS (SELECT * FROM sys.tables WHERE name = 'session_data')
      DROP TABLE session_data;
    `,
  },
];

/** Split a migration body into individually executable statements */
const statements = (body: string): string[] =>
  body
    .split(";")
    .map((s) => s.trim())
    .filter((s) => s.length > 0);

const ensureMigrationsTable = async (pool: sql.ConnectionPool): Promise<void> => {
  await pool.request().query(`
    IF NOT EXISTS (SELECT * FROM sys.tables WHERE name = '_migrations')
    CREATE TABLE _migrations (
      version     NVARCHAR(10) NOT NULL PRIMARY KEY,
      name        NVARCHAR(100) NOT NULL,
      applied_at  BIGINT NOT NULL
    )
  `);
};

const getAppliedVersions = async (pool: sql.ConnectionPool): Promise<Set<string>> => {
  const result = await pool
    .request()
    .query<{ version: string }>("SELECT version FROM _migrations ORDER BY version");
  return new Set(result.recordset.map((r) => r.version));
};

export const mssqlMigrateUp = async (pool: sql.ConnectionPool, logger: Logger): Promise<number> => {
  await ensureMigrationsTable(pool);
  const applied = await getAppliedVersions(pool);
  let count = 0;

  for (const migration of migrations) {
    if (applied.has(migration.version)) continue;

    const tx = pool.transaction();
    await tx.begin();

    try {
      // DDL is guarded with IF NOT EXISTS, so statements run one by one
      for (const stmt of statements(migration.up)) {
        await tx.request().query(stmt);
      }

      await tx
        .request()
        .input("version", migration.version)
        .input("name", migration.name)
        .input("appliedAt", Date.now())
        .query(
          "INSERT INTO _migrations (version, name, applied_at) VALUES (@version, @name, @appliedAt)",
        );

      await tx.commit();
    } catch (e) {
      await tx.rollback();
      throw e;
    }

    logger.info("Migration applied", {
      version: migration.version,
      name: migration.name,
    });
    count++;
  }

  if (count > 0) {
    logger.info("SQL Server migrations complete", { applied: count });
  }
  return count;
};

export const mssqlMigrateDown = async (
  pool: sql.ConnectionPool,
  logger: Logger,
): Promise<string | null> => {
  await ensureMigrationsTable(pool);
  const applied = await getAppliedVersions(pool);
  const reversed = [...migrations].reverse();

  for (const migration of reversed) {
    if (!applied.has(migration.version)) continue;

    const tx = pool.transaction();
    await tx.begin();

    try {
      for (const stmt of statements(migration.down)) {
        await tx.request().query(stmt);
      }

      await tx
        .request()
        .input("version", migration.version)
        .query("DELETE FROM _migrations WHERE version = @version");

      await tx.commit();
    } catch (e) {
      await tx.rollback();
      throw e;
    }

    logger.info("Migration rolled back", {
      version: migration.version,
      name: migration.name,
    });
    return migration.version;
  }

  return null;
};
