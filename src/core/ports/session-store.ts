import type { AppError } from "../errors/app-error.js";
import type { SessionId } from "../types/brand.js";
import type { Result } from "../types/result.js";

/**
 * JSON-compatible value kept in a session.
 */
export type SessionValue =
  | string
  | number
  | boolean
  | null
  | SessionValue[]
  | { [key: string]: SessionValue };

/**
 * Port: SessionStore: durable key/value state per browser session.
 * Implementations: in-memory, SQLite, SQL Server.
 *
 * Every write replaces the whole value for one key; a reader never observes a
 * partially written value. Reads are consistent with prior writes in the same
 * session.
 */
export interface SessionStore {
  get(sessionId: SessionId, key: string): Promise<Result<SessionValue | undefined, AppError>>;
  set(sessionId: SessionId, key: string, value: SessionValue): Promise<Result<void, AppError>>;
  /** Returns true if the key existed. */
  delete(sessionId: SessionId, key: string): Promise<Result<boolean, AppError>>;
  /** Remove every key of a session (logout). */
  destroy(sessionId: SessionId): Promise<Result<void, AppError>>;
  /** Drop sessions idle for longer than the configured TTL. */
  prune(): Promise<Result<number, AppError>>;
}

/** Well-known session keys */
export const SessionKey = {
  USER_ID: "user_id",
  TENANT_ID: "tenant_id",
  JUST_AUTHENTICATED: "just_authenticated",
  FLASH: "flash",
} as const;

/**
 * One session's view of the store, bound per request.
 */
export interface SessionHandle {
  readonly id: SessionId;
  get(key: string): Promise<Result<SessionValue | undefined, AppError>>;
  set(key: string, value: SessionValue): Promise<Result<void, AppError>>;
  delete(key: string): Promise<Result<boolean, AppError>>;
  destroy(): Promise<Result<void, AppError>>;
}
