import {
  type AppError,
  ErrorCode,
  describeCause,
  httpStatus,
  isServerFault,
} from "../../core/errors/app-error.js";
import type { TemplateEngine } from "../../core/ports/template-engine.js";
import type { RequestContext } from "../context.js";
import { TemplateName } from "../templates/names.js";
import { HTML_CONTENT_TYPE } from "./view-dispatcher.js";

export interface ErrorResponder {
  /** Full error page inside the document shell */
  page(ctx: RequestContext, error: AppError): Response;
  /** Error block swapped into the element the request targeted */
  fragment(ctx: RequestContext, error: AppError, targetId: string): Response;
}

interface Deps {
  readonly engine: TemplateEngine;
  /** Show server fault messages to the browser (development only) */
  readonly exposeDetails: boolean;
}

const TITLES: Partial<Record<number, string>> = {
  400: "Bad request",
  404: "Not found",
  422: "Invalid input",
  499: "Request cancelled",
};

const LAST_RESORT = "<!doctype html><title>Error</title><h1>Something went wrong</h1>";

export const createErrorResponder = (deps: Deps): ErrorResponder => {
  const { engine, exposeDetails } = deps;
  const base = engine.ref(TemplateName.LAYOUT_BASE);
  const pageRef = engine.ref(TemplateName.ERROR_PAGE);
  const fragmentRef = engine.ref(TemplateName.ERROR_FRAGMENT);

  const report = (ctx: RequestContext, error: AppError): void => {
    const meta: Record<string, unknown> = { code: error.code, path: ctx.path };
    if (error.details !== undefined) meta["details"] = error.details;
    if (error.cause !== undefined) meta["cause"] = describeCause(error.cause);

    if (error.code === ErrorCode.CANCELLED) ctx.logger.debug(error.message, meta);
    else if (isServerFault(error)) ctx.logger.error(error.message, meta);
    else ctx.logger.warn(error.message, meta);
  };

  const errorValues = (ctx: RequestContext, error: AppError) => {
    const status = httpStatus(error.code);
    const hidden = isServerFault(error) && !exposeDetails;
    return {
      status,
      title: TITLES[status] ?? "Something went wrong",
      message: hidden ? "An unexpected error occurred. Please try again." : error.message,
      request_id: ctx.requestId,
    };
  };

  return {
    page(ctx, error): Response {
      report(ctx, error);
      const values = errorValues(ctx, error);
      const headers = { "Content-Type": HTML_CONTENT_TYPE };

      const content = engine.render(pageRef, values);
      const document = content.ok
        ? engine.render(base, { content: content.value, title: values.title })
        : content;
      if (!document.ok) {
        ctx.logger.error("Error page failed to render", { code: document.error.code });
        return new Response(LAST_RESORT, { status: values.status, headers });
      }
      return new Response(document.value, { status: values.status, headers });
    },

    fragment(ctx, error, targetId): Response {
      report(ctx, error);
      const values = errorValues(ctx, error);
      const rendered = engine.render(fragmentRef, values);
      const body = rendered.ok ? rendered.value : "";
      if (!rendered.ok) {
        ctx.logger.error("Error fragment failed to render", { code: rendered.error.code });
      }
      return new Response(body, {
        status: values.status,
        headers: {
          "Content-Type": HTML_CONTENT_TYPE,
          "HX-Retarget": `#${targetId}`,
          "HX-Reswap": "innerHTML",
        },
      });
    },
  };
};
