/**
 * SQL Server session store adapter.
 */

import type sql from "mssql";
import { type AppError, internal } from "../../../core/errors/app-error.js";
import type { SessionStore, SessionValue } from "../../../core/ports/session-store.js";
import type { SessionId } from "../../../core/types/brand.js";
import { type Result, err, ok } from "../../../core/types/result.js";
import { decodeSessionValue, encodeSessionValue } from "../../session/session-value.js";

export const createMssqlSessionStore = (pool: sql.ConnectionPool, ttlMs: number): SessionStore => ({
  async get(sessionId: SessionId, key: string): Promise<Result<SessionValue | undefined, AppError>> {
    try {
      const result = await pool
        .request()
        .input("sessionId", sessionId)
        .input("key", key)
        .input("now", Date.now())
        .query<{ value: string }>(
          "SELECT value FROM session_data WHERE session_id = @sessionId AND [key] = @key AND expires_at > @now",
        );
      const row = result.recordset[0];
      return ok(row ? decodeSessionValue(row.value) : undefined);
    } catch (e: unknown) {
      return err(internal("Database error", e));
    }
  },

  async set(sessionId: SessionId, key: string, value: SessionValue): Promise<Result<void, AppError>> {
    try {
      // One batch: the upsert and the TTL refresh commit together
      await pool
        .request()
        .input("sessionId", sessionId)
        .input("key", key)
        .input("value", encodeSessionValue(value))
        .input("expiresAt", Date.now() + ttlMs)
        .query(`
          SET XACT_ABORT ON;
          BEGIN TRANSACTION;
          MERGE session_data WITH (HOLDLOCK) AS target
          USING (SELECT @sessionId AS session_id, @key AS [key]) AS source
            ON target.session_id = source.session_id AND target.[key] = source.[key]
          WHEN MATCHED THEN UPDATE SET value = @value, expires_at = @expiresAt
          WHEN NOT MATCHED THEN INSERT (session_id, [key], value, expires_at)
            VALUES (@sessionId, @key, @value, @expiresAt);
          UPDATE session_data SET expires_at = @expiresAt WHERE session_id = @sessionId;
          COMMIT TRANSACTION;
        `);
      return ok(undefined);
    } catch (e: unknown) {
      return err(internal("Database error", e));
    }
  },

  async delete(sessionId: SessionId, key: string): Promise<Result<boolean, AppError>> {
    try {
      const result = await pool
        .request()
        .input("sessionId", sessionId)
        .input("key", key)
        .query("DELETE FROM session_data WHERE session_id = @sessionId AND [key] = @key");
      return ok((result.rowsAffected[0] ?? 0) > 0);
    } catch (e: unknown) {
      return err(internal("Database error", e));
    }
  },

  async destroy(sessionId: SessionId): Promise<Result<void, AppError>> {
    try {
      await pool
        .request()
        .input("sessionId", sessionId)
        .query("DELETE FROM session_data WHERE session_id = @sessionId");
      return ok(undefined);
    } catch (e: unknown) {
      return err(internal("Database error", e));
    }
  },

  async prune(): Promise<Result<number, AppError>> {
    try {
      const result = await pool
        .request()
        .input("now", Date.now())
        .query("DELETE FROM session_data WHERE expires_at <= @now");
      return ok(result.rowsAffected[0] ?? 0);
    } catch (e: unknown) {
      return err(internal("Database error", e));
    }
  },
});
