import type { HealthService } from "../../application/services/health.service.js";
import type { TeamService } from "../../application/services/team.service.js";
import type { TenantResolver } from "../../application/services/tenant-resolver.js";
import { notFound } from "../../core/errors/app-error.js";
import type { Logger } from "../../core/ports/logger.js";
import type { TemplateEngine } from "../../core/ports/template-engine.js";
import type { RequestContext } from "../context.js";
import { exampleHandlers } from "../handlers/examples.handler.js";
import { healthHandler } from "../handlers/health.handler.js";
import { homeHandlers } from "../handlers/home.handler.js";
import { teamHandlers } from "../handlers/team.handler.js";
import { TargetId } from "../templates/names.js";
import type { ErrorResponder } from "../views/error-responder.js";
import type { FragmentComposer } from "../views/fragment-composer.js";
import type { ViewDispatcher } from "../views/view-dispatcher.js";
import type { RouteHandler, RouteParams, Views } from "../views/view.js";

/**
 * Static routes use O(1) map lookup.
 * Parametric team routes use prefix matching.
 */
interface RouterDeps {
  readonly views: Views;
  readonly dispatcher: ViewDispatcher;
  readonly composer: FragmentComposer;
  readonly errors: ErrorResponder;
  readonly engine: TemplateEngine;
  readonly resolver: TenantResolver;
  readonly teamService: TeamService;
  readonly healthService: HealthService;
  readonly logger: Logger;
}

/** Team route prefix for parametric matching */
const TEAMS_PREFIX = "/teams/";

const NO_PARAMS: RouteParams = Object.freeze({});

export const createRouter = (deps: RouterDeps) => {
  const { views, dispatcher, composer, errors, engine, logger } = deps;
  const health = healthHandler(deps.healthService);
  const home = homeHandlers({ views, dispatcher, engine, teams: deps.teamService });
  const teams = teamHandlers({
    views,
    dispatcher,
    composer,
    engine,
    teams: deps.teamService,
    resolver: deps.resolver,
    logger: logger.child({ layer: "handler", handler: "team" }),
  });
  const examples = exampleHandlers({ views, dispatcher, composer, engine });

  /** Static route table */
  const routes = new Map<string, RouteHandler>([
    // Health: shallow (instant) for probes, deep for readiness
    ["GET /health", async () => health.shallowCheck()],
    ["GET /readiness", async () => health.deepCheck()],

    ["GET /", home.home],
    ["GET /dashboard", teams.dashboard],
    ["GET /teams/new", teams.newTeam],
    ["POST /teams", teams.createTeam],

    ["GET /examples", examples.index],
    ["GET /examples/toast", examples.toast],
    ["GET /examples/modal", examples.modal],
    ["GET /examples/nav", examples.nav],
  ]);

  /**
   * Match parametric team routes: /teams/:tenantId/{switch}
   * Returns the handler and its params, or null.
   */
  const matchTeam = (
    method: string,
    path: string,
  ): { handler: RouteHandler; params: RouteParams } | null => {
    if (method !== "GET" || !path.startsWith(TEAMS_PREFIX)) return null;

    const rest = path.substring(TEAMS_PREFIX.length);
    const slashIdx = rest.indexOf("/");
    if (slashIdx <= 0) return null;

    const tenantId = decodeURIComponent(rest.substring(0, slashIdx));
    const action = rest.substring(slashIdx + 1);
    const params: RouteParams = { tenantId };

    if (action === "") return { handler: teams.showTeam, params };
    if (action === "switch") return { handler: teams.switchTeam, params };
    return null;
  };

  const notFound404 = (ctx: RequestContext): Response => {
    logger.debug("Route not found", { method: ctx.method, path: ctx.path });
    const error = notFound(`${ctx.method} ${ctx.path}`);
    return ctx.isFragment
      ? errors.fragment(ctx, error, ctx.fragmentTarget ?? TargetId.MAIN)
      : errors.page(ctx, error);
  };

  return {
    handle(req: Request, ctx: RequestContext): Promise<Response> {
      // 1. Try static routes first (O(1))
      const handler = routes.get(`${req.method} ${ctx.path}`);
      if (handler) return handler(req, ctx, NO_PARAMS);

      // 2. Try parametric team routes
      let matched: ReturnType<typeof matchTeam>;
      try {
        matched = matchTeam(req.method, ctx.path);
      } catch {
        // Malformed percent-encoding in the tenant segment
        matched = null;
      }
      if (matched) return matched.handler(req, ctx, matched.params);

      return Promise.resolve(notFound404(ctx));
    },
  };
};

export type Router = ReturnType<typeof createRouter>;
