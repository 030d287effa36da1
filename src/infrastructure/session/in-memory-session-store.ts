import { type AppError, internal } from "../../core/errors/app-error.js";
import type { SessionStore, SessionValue } from "../../core/ports/session-store.js";
import type { SessionId } from "../../core/types/brand.js";
import { type Result, err, ok } from "../../core/types/result.js";
import { decodeSessionValue, encodeSessionValue } from "./session-value.js";

interface SessionEntry {
  readonly values: Map<string, string>;
  expiresAt: number;
}

interface InMemorySessionStoreOptions {
  readonly ttlMs: number;
  /** Injectable clock for tests */
  readonly now?: () => number;
}

/**
 * In-memory session store: for development, tests and single-process use.
 * Values are stored encoded so callers never share object references.
 */
export const createInMemorySessionStore = (options: InMemorySessionStoreOptions): SessionStore => {
  const store = new Map<SessionId, SessionEntry>();
  const now = options.now ?? Date.now;

  const live = (sessionId: SessionId): SessionEntry | undefined => {
    const entry = store.get(sessionId);
    if (entry && entry.expiresAt <= now()) {
      store.delete(sessionId);
      return undefined;
    }
    return entry;
  };

  return {
    async get(sessionId: SessionId, key: string): Promise<Result<SessionValue | undefined, AppError>> {
      const raw = live(sessionId)?.values.get(key);
      return ok(raw === undefined ? undefined : decodeSessionValue(raw));
    },

    async set(sessionId: SessionId, key: string, value: SessionValue): Promise<Result<void, AppError>> {
      try {
        const encoded = encodeSessionValue(value);
        const entry = live(sessionId) ?? { values: new Map<string, string>(), expiresAt: 0 };
        entry.values.set(key, encoded);
        entry.expiresAt = now() + options.ttlMs;
        store.set(sessionId, entry);
        return ok(undefined);
      } catch (e: unknown) {
        return err(internal("Session write failed", e));
      }
    },

    async delete(sessionId: SessionId, key: string): Promise<Result<boolean, AppError>> {
      const entry = live(sessionId);
      return ok(entry ? entry.values.delete(key) : false);
    },

    async destroy(sessionId: SessionId): Promise<Result<void, AppError>> {
      store.delete(sessionId);
      return ok(undefined);
    },

    async prune(): Promise<Result<number, AppError>> {
      const cutoff = now();
      let removed = 0;
      for (const [id, entry] of store) {
        if (entry.expiresAt <= cutoff) {
          store.delete(id);
          removed++;
        }
      }
      return ok(removed);
    },
  };
};
