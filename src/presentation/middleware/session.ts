import type { AppConfig } from "../../infrastructure/config/config.js";
import { type SessionId, brand } from "../../core/types/brand.js";
import { generateId } from "../../shared/utils/id.js";

const SESSION_ID_PATTERN = /^[A-Za-z0-9-]{16,64}$/;

/** Parse a Cookie header into name/value pairs. Later duplicates lose. */
export const parseCookies = (header: string | null): Map<string, string> => {
  const cookies = new Map<string, string>();
  if (!header) return cookies;
  for (const part of header.split(";")) {
    const eq = part.indexOf("=");
    if (eq === -1) continue;
    const name = part.slice(0, eq).trim();
    if (name.length === 0 || cookies.has(name)) continue;
    const value = part.slice(eq + 1).trim();
    try {
      cookies.set(name, decodeURIComponent(value));
    } catch {
      cookies.set(name, value);
    }
  }
  return cookies;
};

export interface SessionCookie {
  readonly id: SessionId;
  /** The browser sent no usable id; a Set-Cookie must go out */
  readonly issued: boolean;
}

/**
 * Read the session id from the request, minting a new one when the cookie is
 * missing or does not look like one of ours.
 */
export const readSessionCookie = (req: Request, cookieName: string): SessionCookie => {
  const existing = parseCookies(req.headers.get("cookie")).get(cookieName);
  if (existing !== undefined && SESSION_ID_PATTERN.test(existing)) {
    return { id: brand<string, "SessionId">(existing), issued: false };
  }
  return { id: brand<string, "SessionId">(generateId()), issued: true };
};

export const serializeSessionCookie = (
  config: Pick<AppConfig, "session">,
  id: SessionId,
): string => {
  const { cookieName, ttlMs, secureCookie } = config.session;
  const parts = [
    `${cookieName}=${id}`,
    "Path=/",
    "HttpOnly",
    "SameSite=Lax",
    `Max-Age=${Math.floor(ttlMs / 1000)}`,
  ];
  if (secureCookie) parts.push("Secure");
  return parts.join("; ");
};
