import type { AppConfig } from "../../infrastructure/config/config.js";

/**
 * Security headers set on every response.
 * Applied to every response. Pages load the fragment client from its CDN.
 */
export const securityHeaders = (config: Pick<AppConfig, "env">): Record<string, string> => {
  const headers: Record<string, string> = {
    "X-Content-Type-Options": "nosniff",
    "X-Frame-Options": "DENY",
    "Content-Security-Policy":
      "default-src 'self'; script-src 'self' https://unpkg.com; style-src 'self' 'unsafe-inline'; frame-ancestors 'none'",
    "Referrer-Policy": "strict-origin-when-cross-origin",
    "Permissions-Policy": "camera=(), microphone=(), geolocation=()",
    // Full pages and fragments share URLs; caches must key on the marker
    Vary: "HX-Request",
    "Cache-Control": "no-store",
  };
  if (config.env === "production") {
    headers["Strict-Transport-Security"] = "max-age=63072000; includeSubDomains";
  }
  return headers;
};
