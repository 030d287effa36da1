import type { AppError } from "../../core/errors/app-error.js";
import type { IdentityProvider } from "../../core/ports/identity.js";
import { type SessionStore, SessionKey } from "../../core/ports/session-store.js";
import { type SessionId, type UserId, brand } from "../../core/types/brand.js";
import { type Result, ok } from "../../core/types/result.js";

/**
 * Reads the caller id an external login stored under `user_id`.
 */
export const createSessionIdentityProvider = (store: SessionStore): IdentityProvider => ({
  async resolve(sessionId: SessionId): Promise<Result<UserId | null, AppError>> {
    const stored = await store.get(sessionId, SessionKey.USER_ID);
    if (!stored.ok) return stored;
    const value = stored.value;
    if (typeof value === "string" && value.length > 0) return ok(brand<string, "UserId">(value));
    if (typeof value === "number") return ok(brand<string, "UserId">(String(value)));
    return ok(null);
  },
});

/**
 * Development stand-in for a login service: every session is the same caller,
 * unless the session names one.
 */
export const createStaticIdentityProvider = (
  userId: string,
  fallback: IdentityProvider,
): IdentityProvider => ({
  async resolve(sessionId: SessionId): Promise<Result<UserId | null, AppError>> {
    const resolved = await fallback.resolve(sessionId);
    if (!resolved.ok) return resolved;
    return ok(resolved.value ?? brand<string, "UserId">(userId));
  },
});
