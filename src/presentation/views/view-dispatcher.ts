import type { AppError } from "../../core/errors/app-error.js";
import { SessionKey } from "../../core/ports/session-store.js";
import type { RenderValues, TemplateEngine, TemplateRef } from "../../core/ports/template-engine.js";
import { type Result, ok } from "../../core/types/result.js";
import { TemplateName } from "../templates/names.js";
import { type RequestContext, requestUrl } from "../context.js";
import { type RenderContext, createRenderContext, snapshot } from "./render-context.js";

export const HTML_CONTENT_TYPE = "text/html; charset=utf-8";

export interface ViewDispatcher {
  /**
   * Open the render context for a request: picks the shell from the fragment
   * marker and consumes the one-shot "just authenticated" flag.
   */
  dispatch(ctx: RequestContext): Promise<Result<RenderContext, AppError>>;
  /** Render one template inside the selected shell. No fragment composition. */
  render(
    ctx: RequestContext,
    rc: RenderContext,
    ref: TemplateRef,
    extra?: RenderValues,
    status?: number,
  ): Result<Response, AppError>;
}

export const createViewDispatcher = (engine: TemplateEngine): ViewDispatcher => {
  const base = engine.ref(TemplateName.LAYOUT_BASE);
  const partial = engine.ref(TemplateName.LAYOUT_PARTIAL);

  return {
    async dispatch(ctx: RequestContext): Promise<Result<RenderContext, AppError>> {
      const flag = await ctx.session.get(SessionKey.JUST_AUTHENTICATED);
      if (!flag.ok) return flag;

      const justAuthenticated = flag.value === true;
      if (flag.value !== undefined) {
        const removed = await ctx.session.delete(SessionKey.JUST_AUTHENTICATED);
        if (!removed.ok) return removed;
      }

      const shell = ctx.isFragment ? "empty" : "full";
      return ok(
        createRenderContext(shell, justAuthenticated, {
          url: requestUrl(ctx),
          base_template: shell === "full" ? TemplateName.LAYOUT_BASE : TemplateName.LAYOUT_PARTIAL,
          is_oob: false,
          just_authenticated: justAuthenticated,
        }),
      );
    },

    render(ctx, rc, ref, extra = {}, status = 200): Result<Response, AppError> {
      const values = snapshot(rc, extra);
      const content = engine.render(ref, values);
      if (!content.ok) return content;

      // Both shells show whatever is still queued; rendering is what delivers it
      const messages = ctx.notifications.entries();
      const document = engine.render(rc.shell === "full" ? base : partial, {
        ...values,
        content: content.value,
        messages,
      });
      if (!document.ok) return document;
      ctx.notifications.drainAll();

      const headers = new Headers({ "Content-Type": HTML_CONTENT_TYPE });
      if (ctx.isFragment && rc.historyUrl !== undefined) {
        headers.set("HX-Push-Url", rc.historyUrl);
      }
      return ok(new Response(document.value, { status, headers }));
    },
  };
};
