import { createTeamDto } from "../../application/dtos/team.dto.js";
import type { TeamService } from "../../application/services/team.service.js";
import { toTeamView } from "../../application/services/team.service.js";
import type { TenantContext, TenantResolver } from "../../application/services/tenant-resolver.js";
import { type AppError, badRequest, internal } from "../../core/errors/app-error.js";
import type { Logger } from "../../core/ports/logger.js";
import type { TemplateEngine } from "../../core/ports/template-engine.js";
import type { UserId } from "../../core/types/brand.js";
import { type Result, err, ok } from "../../core/types/result.js";
import type { RequestContext } from "../context.js";
import { validateForm, validationMessages } from "../middleware/validate.js";
import { TargetId, TemplateName } from "../templates/names.js";
import type { FragmentComposer } from "../views/fragment-composer.js";
import type { RenderContext } from "../views/render-context.js";
import type { ViewDispatcher } from "../views/view-dispatcher.js";
import { type RouteHandler, TenantRequirement, type Views } from "../views/view.js";
import { redirect } from "./response.js";

interface Deps {
  readonly views: Views;
  readonly dispatcher: ViewDispatcher;
  readonly composer: FragmentComposer;
  readonly engine: TemplateEngine;
  readonly teams: TeamService;
  readonly resolver: TenantResolver;
  readonly logger: Logger;
}

export interface TeamHandlers {
  readonly newTeam: RouteHandler;
  readonly createTeam: RouteHandler;
  readonly showTeam: RouteHandler;
  readonly dashboard: RouteHandler;
  readonly switchTeam: RouteHandler;
}

const teamPath = (tenantId: string): string => `/teams/${tenantId}/`;

/**
 * Team pages: onboarding form, dashboard (full page) and the in-place
 * switcher (fragment).
 */
export const teamHandlers = (deps: Deps): TeamHandlers => {
  const { views, dispatcher, composer, engine, teams, resolver, logger } = deps;
  const createRef = engine.ref(TemplateName.TEAM_CREATE);
  const dashboardRef = engine.ref(TemplateName.TEAM_DASHBOARD);
  const panelRef = engine.ref(TemplateName.TEAM_PANEL);
  const headerRef = engine.ref(TemplateName.TEAM_HEADER);

  /** Values the dashboard and the panel share */
  const fillTeamValues = async (
    rc: RenderContext,
    userId: UserId,
    tenant: TenantContext,
  ): Promise<Result<void, AppError>> => {
    const listed = await teams.listTeams(userId);
    if (!listed.ok) return listed;
    rc.values.set("tenant", toTeamView(tenant.tenant));
    rc.values.set("tenant_source", tenant.source);
    rc.values.set("teams", listed.value);
    rc.values.set("active_section", "dashboard");
    return ok(undefined);
  };

  /** Mandatory tenant views always receive one; anything else is a wiring fault */
  const requireTenant = (
    tenant: TenantContext | null,
    userId: UserId | null,
  ): Result<{ tenant: TenantContext; userId: UserId }, AppError> =>
    tenant !== null && userId !== null
      ? ok({ tenant, userId })
      : err(internal("Tenant view ran without a bound tenant"));

  const renderDashboard = async (
    ctx: RequestContext,
    rc: RenderContext,
    tenant: TenantContext | null,
    userId: UserId | null,
  ): Promise<Result<Response, AppError>> => {
    const bound = requireTenant(tenant, userId);
    if (!bound.ok) return bound;
    const filled = await fillTeamValues(rc, bound.value.userId, bound.value.tenant);
    if (!filled.ok) return filled;
    return dispatcher.render(ctx, rc, dashboardRef);
  };

  const newTeam = views.page(async ({ ctx, rc }) => {
    rc.values.set("active_section", "teams");
    return dispatcher.render(ctx, rc, createRef);
  });

  const createTeam = views.page(async ({ req, ctx, rc, userId }) => {
    if (userId === null) return err(internal("Team creation ran without identity"));

    let form: FormData;
    try {
      form = await req.formData();
    } catch (e: unknown) {
      ctx.logger.debug("Unreadable form body", { error: String(e) });
      return err(badRequest("Expected a form submission"));
    }

    const input = validateForm(createTeamDto, form);
    if (!input.ok) {
      rc.values.set("active_section", "teams");
      const submitted = form.get("name");
      return dispatcher.render(
        ctx,
        rc,
        createRef,
        {
          name: typeof submitted === "string" ? submitted : "",
          errors: validationMessages(input.error),
        },
        422,
      );
    }

    const created = await teams.create(userId, input.value);
    if (!created.ok) return created;

    const persisted = await resolver.persist(ctx.session, created.value.id);
    if (!persisted.ok) return persisted;

    ctx.notifications.success(`Team "${created.value.name}" created.`);
    return ok(redirect(ctx, teamPath(created.value.id)));
  });

  const showTeam = views.page(
    ({ ctx, rc, tenant, userId }) => renderDashboard(ctx, rc, tenant, userId),
    { tenant: TenantRequirement.MANDATORY, tenantParam: "tenantId" },
  );

  const dashboard = views.page(
    ({ ctx, rc, tenant, userId }) => renderDashboard(ctx, rc, tenant, userId),
    { tenant: TenantRequirement.MANDATORY },
  );

  const switchTeam = views.fragment(
    async ({ ctx, rc, tenant, userId }) => {
      const bound = requireTenant(tenant, userId);
      if (!bound.ok) return bound;
      const filled = await fillTeamValues(rc, bound.value.userId, bound.value.tenant);
      if (!filled.ok) return filled;

      ctx.notifications.info(`Switched to ${bound.value.tenant.tenant.name}.`);
      logger.debug("Team switched", {
        tenantId: bound.value.tenant.tenant.id,
        source: bound.value.tenant.source,
      });

      return composer.render(ctx, rc, {
        primary: { targetId: TargetId.TEAM_PANEL, template: panelRef },
        secondary: [{ targetId: TargetId.TEAM_HEADER, template: headerRef }],
        pushUrl: teamPath(bound.value.tenant.tenant.id),
        activeSection: "dashboard",
      });
    },
    {
      tenant: TenantRequirement.MANDATORY,
      tenantParam: "tenantId",
      primaryTarget: TargetId.TEAM_PANEL,
    },
  );

  return { newTeam, createTeam, showTeam, dashboard, switchTeam };
};
