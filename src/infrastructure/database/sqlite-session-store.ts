import { type AppError, internal } from "../../core/errors/app-error.js";
import type { SessionStore, SessionValue } from "../../core/ports/session-store.js";
import type { SessionId } from "../../core/types/brand.js";
import { type Result, err, ok } from "../../core/types/result.js";
import { decodeSessionValue, encodeSessionValue } from "../session/session-value.js";
import type { SqliteDatabase } from "./sqlite.js";

/**
 * SQLite-backed session store: persists across restarts.
 * Requires migration 002_create_session_data to be applied.
 */
export const createSqliteSessionStore = (db: SqliteDatabase, ttlMs: number): SessionStore => {
  const getStmt = db.prepare<[string, string, number], { value: string }>(
    "SELECT value FROM session_data WHERE session_id = ? AND key = ? AND expires_at > ?",
  );
  const upsertStmt = db.prepare<[string, string, string, number]>(`
    INSERT INTO session_data (session_id, key, value, expires_at) VALUES (?, ?, ?, ?)
    ON CONFLICT (session_id, key) DO UPDATE SET value = excluded.value, expires_at = excluded.expires_at
  `);
  const touchStmt = db.prepare<[number, string]>(
    "UPDATE session_data SET expires_at = ? WHERE session_id = ?",
  );
  const deleteStmt = db.prepare<[string, string]>(
    "DELETE FROM session_data WHERE session_id = ? AND key = ?",
  );
  const destroyStmt = db.prepare<[string]>("DELETE FROM session_data WHERE session_id = ?");
  const pruneStmt = db.prepare<[number]>("DELETE FROM session_data WHERE expires_at <= ?");

  const write = db.transaction((sessionId: string, key: string, value: string, expiresAt: number) => {
    upsertStmt.run(sessionId, key, value, expiresAt);
    touchStmt.run(expiresAt, sessionId);
  });

  return {
    async get(sessionId: SessionId, key: string): Promise<Result<SessionValue | undefined, AppError>> {
      try {
        const row = getStmt.get(sessionId, key, Date.now());
        return ok(row ? decodeSessionValue(row.value) : undefined);
      } catch (e: unknown) {
        return err(internal("Failed to read session", e));
      }
    },

    async set(sessionId: SessionId, key: string, value: SessionValue): Promise<Result<void, AppError>> {
      try {
        write(sessionId, key, encodeSessionValue(value), Date.now() + ttlMs);
        return ok(undefined);
      } catch (e: unknown) {
        return err(internal("Failed to write session", e));
      }
    },

    async delete(sessionId: SessionId, key: string): Promise<Result<boolean, AppError>> {
      try {
        return ok(deleteStmt.run(sessionId, key).changes > 0);
      } catch (e: unknown) {
        return err(internal("Failed to delete session key", e));
      }
    },

    async destroy(sessionId: SessionId): Promise<Result<void, AppError>> {
      try {
        destroyStmt.run(sessionId);
        return ok(undefined);
      } catch (e: unknown) {
        return err(internal("Failed to destroy session", e));
      }
    },

    async prune(): Promise<Result<number, AppError>> {
      try {
        return ok(pruneStmt.run(Date.now()).changes);
      } catch (e: unknown) {
        return err(internal("Failed to prune sessions", e));
      }
    },
  };
};
