import { type Server, createServer as createHttpServer } from "node:http";
import { createRequestListener } from "@remix-run/node-fetch-server";
import type { AppError } from "../core/errors/app-error.js";
import type { IdentityProvider } from "../core/ports/identity.js";
import type { Logger } from "../core/ports/logger.js";
import type { SessionStore } from "../core/ports/session-store.js";
import { type SessionId, brand } from "../core/types/brand.js";
import { type Result, ok } from "../core/types/result.js";
import type { AppConfig } from "../infrastructure/config/config.js";
import { bindSession } from "../infrastructure/session/bind-session.js";
import { formatAccessLog } from "../shared/log-format.js";
import { generateId } from "../shared/utils/id.js";
import type { RequestContext } from "./context.js";
import { htmlResponse } from "./handlers/response.js";
import { stashFlash, takeFlash } from "./middleware/flash.js";
import { readFragmentMarker } from "./middleware/fragment.js";
import { securityHeaders } from "./middleware/security-headers.js";
import { readSessionCookie, serializeSessionCookie } from "./middleware/session.js";
import type { Router } from "./routes/router.js";

interface ServerDeps {
  readonly config: AppConfig;
  readonly logger: Logger;
  readonly router: Router;
  readonly sessions: SessionStore;
  readonly identity: IdentityProvider;
}

/** Peer address as the HTTP adapter reports it */
interface ClientInfo {
  readonly address: string;
}

/**
 * Split a full URL string into pathname and query WITHOUT allocating a URL object.
 */
const splitUrl = (url: string): { path: string; query: string } => {
  // url format: "http://host:port/path?query"
  const start = url.indexOf("/", url.indexOf("//") + 2);
  if (start === -1) return { path: "/", query: "" };
  const qIdx = url.indexOf("?", start);
  return qIdx === -1
    ? { path: url.substring(start), query: "" }
    : { path: url.substring(start, qIdx), query: url.substring(qIdx + 1) };
};

const internalErrorBody =
  "<!doctype html><title>Error</title><h1>Something went wrong</h1><p>Please try again.</p>";

export const createServer = (deps: ServerDeps) => {
  const { config, logger, router, sessions, identity } = deps;

  // ── Pre-compute at boot, not per-request ──

  const secHeaderEntries: ReadonlyArray<readonly [string, string]> = Object.freeze(
    Object.entries(securityHeaders(config)),
  );

  // ── Batched logger: accumulate access lines, flush in bulk ──
  // In production: batches to avoid a stdout write per request
  // In development: writes immediately so logs appear instantly in the terminal
  let logBuffer: string[] = [];
  let logFlushScheduled = false;
  const isDev = config.env !== "production";
  const LOG_FLUSH_INTERVAL_MS = 100;

  const flushLogs = (): void => {
    if (logBuffer.length === 0) {
      logFlushScheduled = false;
      return;
    }
    const batch = logBuffer;
    logBuffer = [];
    logFlushScheduled = false;
    process.stdout.write(batch.join(""));
  };

  const writeLog = (line: string): void => {
    if (isDev) {
      process.stdout.write(line);
      return;
    }
    logBuffer.push(line);
    if (!logFlushScheduled) {
      logFlushScheduled = true;
      setTimeout(flushLogs, LOG_FLUSH_INTERVAL_MS).unref();
    }
  };

  // Tests and "fatal" level run without access lines
  const shouldLog = config.log.level !== "fatal" && config.env !== "test";

  /** Everything a view needs before routing: session, identity, flash */
  const openContext = async (
    req: Request,
    sessionId: SessionId,
    request: { requestId: string; startTime: number; ip: string; path: string; query: string },
  ): Promise<Result<RequestContext, AppError>> => {
    const { requestId, startTime, ip, path, query } = request;
    const session = bindSession(sessions, sessionId);

    const userId = await identity.resolve(sessionId);
    if (!userId.ok) return userId;

    const notifications = await takeFlash(session);
    if (!notifications.ok) return notifications;

    const marker = readFragmentMarker(req);
    return ok({
      requestId: brand<string, "RequestId">(requestId),
      startTime,
      ip,
      method: req.method,
      path,
      query: new URLSearchParams(query),
      isFragment: marker.isFragment,
      fragmentTarget: marker.target,
      session,
      userId: userId.value,
      notifications: notifications.value,
      signal: req.signal,
      logger: logger.child({ requestId }),
    });
  };

  // ── Hot path ──

  const handleRequest = async (req: Request, client?: ClientInfo): Promise<Response> => {
    const startTime = performance.now();
    const { path, query } = splitUrl(req.url);
    const requestId = req.headers.get("x-request-id") ?? generateId();
    const ip = client?.address ?? "0";
    const cookie = readSessionCookie(req, config.session.cookieName);

    let response: Response;
    let ctx: RequestContext | null = null;
    try {
      const opened = await openContext(req, cookie.id, { requestId, startTime, ip, path, query });
      if (opened.ok) {
        ctx = opened.value;
        response = await router.handle(req, ctx);
        // Notifications this response did not render wait for the next request
        const stashed = await stashFlash(ctx.session, ctx.notifications);
        if (!stashed.ok) {
          ctx.logger.error("Failed to keep undelivered notifications", { code: stashed.error.code });
        }
      } else {
        logger.error("Request setup failed", {
          requestId,
          code: opened.error.code,
          error: opened.error.message,
        });
        response = htmlResponse(internalErrorBody, 500);
      }
    } catch (e: unknown) {
      logger.error("Unhandled error", {
        requestId,
        error: e instanceof Error ? e.message : String(e),
      });
      response = htmlResponse(internalErrorBody, 500);
    }

    // ── Append cross-cutting headers to the response ──
    const resHeaders = response.headers;
    resHeaders.set("X-Request-Id", requestId);
    for (const [k, v] of secHeaderEntries) resHeaders.set(k, v);
    if (cookie.issued) {
      resHeaders.append("Set-Cookie", serializeSessionCookie(config, cookie.id));
    }

    if (shouldLog) {
      const durationMs = Math.round((performance.now() - startTime) * 100) / 100;
      writeLog(
        formatAccessLog({
          method: req.method,
          path,
          status: response.status,
          durationMs,
          requestId,
          fragment: ctx?.isFragment ?? false,
          target: ctx?.fragmentTarget,
        }),
      );
    }

    return response;
  };

  let server: Server | null = null;

  return {
    handleRequest,

    start(): Promise<Server> {
      const listener = createHttpServer(createRequestListener(handleRequest));
      listener.keepAliveTimeout = 30_000;
      server = listener;
      return new Promise((resolve, reject) => {
        listener.once("error", reject);
        listener.listen(config.port, config.host, () => {
          listener.off("error", reject);
          resolve(listener);
        });
      });
    },

    /** Stop accepting connections and wait for in-flight requests */
    stop(): Promise<void> {
      const current = server;
      server = null;
      flushLogs();
      if (current === null) return Promise.resolve();
      return new Promise((resolve, reject) => {
        current.close((e) => (e ? reject(e) : resolve()));
        current.closeIdleConnections();
      });
    },

    /** Force-flush any buffered access logs (call before exit) */
    flush: flushLogs,
  };
};

export type AppServer = ReturnType<typeof createServer>;
