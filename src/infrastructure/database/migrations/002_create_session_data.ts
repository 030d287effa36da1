import type { SqliteDatabase } from "../sqlite.js";

/**
 * Migration 002: session key/value rows
 */
export const up = (db: SqliteDatabase): void => {
  db.exec(`
    CREATE TABLE IF NOT EXISTS session_data (
      session_id  TEXT NOT NULL,
      key         TEXT NOT NULL,
      value       TEXT NOT NULL,
      expires_at  INTEGER NOT NULL,
      PRIMARY KEY (session_id, key)
    )
  `);

  db.exec("CREATE INDEX IF NOT EXISTS idx_session_data_expires ON session_data(expires_at)");
};

export const down = (db: SqliteDatabase): void => {
  db.exec("DROP INDEX IF EXISTS idx_session_data_expires");
  db.exec("DROP TABLE IF EXISTS session_data");
};
