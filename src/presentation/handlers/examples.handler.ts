import { navSectionDto } from "../../application/dtos/team.dto.js";
import type { TemplateEngine } from "../../core/ports/template-engine.js";
import { err } from "../../core/types/result.js";
import { badRequest } from "../../core/errors/app-error.js";
import { TargetId, TemplateName } from "../templates/names.js";
import type { FragmentComposer } from "../views/fragment-composer.js";
import type { ViewDispatcher } from "../views/view-dispatcher.js";
import type { RouteHandler, Views } from "../views/view.js";

interface Deps {
  readonly views: Views;
  readonly dispatcher: ViewDispatcher;
  readonly composer: FragmentComposer;
  readonly engine: TemplateEngine;
}

/**
 * Small views showing each kind of out-of-band update on its own.
 */
export const exampleHandlers = (deps: Deps) => {
  const { views, dispatcher, composer, engine } = deps;
  const indexRef = engine.ref(TemplateName.EXAMPLES);
  const resultRef = engine.ref(TemplateName.EXAMPLE_RESULT);
  const output = { primaryTarget: TargetId.EXAMPLE_OUTPUT, requireIdentity: false } as const;

  const index: RouteHandler = views.page(
    async ({ ctx, rc }) => {
      rc.values.set("active_section", "examples");
      return dispatcher.render(ctx, rc, indexRef);
    },
    { requireIdentity: false },
  );

  /** Nothing but a toast */
  const toast: RouteHandler = views.fragment(async ({ ctx, rc }) => {
    ctx.notifications.success("Saved.");
    return composer.render(ctx, rc, {
      primary: { targetId: TargetId.EXAMPLE_OUTPUT, template: null },
    });
  }, output);

  const modal: RouteHandler = views.fragment(async ({ ctx, rc }) => {
    rc.values.set("modal", {
      title: "Example dialog",
      body: "This dialog arrived out of band.",
    });
    return composer.render(ctx, rc, {
      primary: {
        targetId: TargetId.EXAMPLE_OUTPUT,
        template: resultRef,
        values: { message: "Modal opened." },
      },
      includeModals: true,
    });
  }, output);

  const nav: RouteHandler = views.fragment(async ({ ctx, rc }) => {
    const parsed = navSectionDto.safeParse({ section: ctx.query.get("section") ?? undefined });
    if (!parsed.success) return err(badRequest("Unknown section"));
    const { section } = parsed.data;
    return composer.render(ctx, rc, {
      primary: {
        targetId: TargetId.EXAMPLE_OUTPUT,
        template: resultRef,
        values: { message: `Navigation marked: ${section}` },
      },
      activeSection: section,
    });
  }, output);

  return { index, toast, modal, nav };
};
