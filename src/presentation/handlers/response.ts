import type { RequestContext } from "../context.js";
import { HTML_CONTENT_TYPE } from "../views/view-dispatcher.js";

/** HTML response helper */
export const htmlResponse = (body: string, status = 200): Response =>
  new Response(body, { status, headers: { "Content-Type": HTML_CONTENT_TYPE } });

/**
 * Redirect the browser. The fragment client cannot follow a 302 into a full
 * document, so fragment requests get `HX-Redirect` with a 200 instead.
 */
export const redirect = (ctx: RequestContext, location: string): Response =>
  ctx.isFragment
    ? new Response(null, { status: 200, headers: { "HX-Redirect": location } })
    : new Response(null, { status: 302, headers: { Location: location } });

/** Login URL that returns the caller to `next` afterwards */
export const loginRedirectUrl = (loginUrl: string, next: string): string =>
  `${loginUrl}${loginUrl.includes("?") ? "&" : "?"}next=${encodeURIComponent(next)}`;
