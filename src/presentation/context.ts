import type { NotificationQueue } from "../application/services/notification-queue.js";
import type { Logger } from "../core/ports/logger.js";
import type { SessionHandle } from "../core/ports/session-store.js";
import type { RequestId, UserId } from "../core/types/brand.js";

/**
 * Typed request context threaded from the server into views.
 * Built once per request by the server; the fields are never reassigned.
 */
export interface RequestContext {
  readonly requestId: RequestId;
  readonly startTime: number;
  readonly ip: string;
  readonly method: string;
  readonly path: string;
  readonly query: URLSearchParams;
  /** `HX-Request: true` was sent by the fragment client */
  readonly isFragment: boolean;
  /** Value of `HX-Target`, when the client sent one */
  readonly fragmentTarget: string | null;
  readonly session: SessionHandle;
  /** Caller identity established by an external login, if any */
  readonly userId: UserId | null;
  readonly notifications: NotificationQueue;
  /** Aborted when the client goes away */
  readonly signal: AbortSignal;
  /** Request-scoped logger with requestId pre-bound */
  readonly logger: Logger;
}

/** Path plus query string, as the browser addressed it */
export const requestUrl = (ctx: RequestContext): string => {
  const search = ctx.query.toString();
  return search.length > 0 ? `${ctx.path}?${search}` : ctx.path;
};
