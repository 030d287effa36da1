import type { TeamService } from "../../application/services/team.service.js";
import type { TemplateEngine } from "../../core/ports/template-engine.js";
import { TemplateName } from "../templates/names.js";
import type { ViewDispatcher } from "../views/view-dispatcher.js";
import type { RouteHandler, Views } from "../views/view.js";

interface Deps {
  readonly views: Views;
  readonly dispatcher: ViewDispatcher;
  readonly engine: TemplateEngine;
  readonly teams: TeamService;
}

export const homeHandlers = (deps: Deps): { home: RouteHandler } => {
  const { views, dispatcher, engine, teams } = deps;
  const homeRef = engine.ref(TemplateName.HOME);

  const home = views.page(
    async ({ ctx, rc, userId }) => {
      rc.values.set("active_section", "home");
      rc.values.set("user_id", userId);
      if (userId !== null) {
        const listed = await teams.listTeams(userId);
        if (!listed.ok) return listed;
        rc.values.set("teams", listed.value);
      }
      return dispatcher.render(ctx, rc, homeRef);
    },
    { requireIdentity: false },
  );

  return { home };
};
