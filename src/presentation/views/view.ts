import {
  type TenantContext,
  type TenantResolver,
  isBound,
  toTenantContext,
} from "../../application/services/tenant-resolver.js";
import type { AppError } from "../../core/errors/app-error.js";
import type { UserId } from "../../core/types/brand.js";
import type { Result } from "../../core/types/result.js";
import { type RequestContext, requestUrl } from "../context.js";
import { loginRedirectUrl, redirect } from "../handlers/response.js";
import { TargetId } from "../templates/names.js";
import type { ErrorResponder } from "./error-responder.js";
import type { FragmentComposer } from "./fragment-composer.js";
import type { RenderContext } from "./render-context.js";
import type { ViewDispatcher } from "./view-dispatcher.js";

export type RouteParams = Readonly<Record<string, string>>;

export type RouteHandler = (
  req: Request,
  ctx: RequestContext,
  params: RouteParams,
) => Promise<Response>;

export const TenantRequirement = {
  NONE: "none",
  OPTIONAL: "optional",
  MANDATORY: "mandatory",
} as const;

export type TenantRequirement = (typeof TenantRequirement)[keyof typeof TenantRequirement];

export interface ViewArgs {
  readonly req: Request;
  readonly ctx: RequestContext;
  readonly rc: RenderContext;
  readonly params: RouteParams;
  readonly userId: UserId | null;
  /** Always set for mandatory views */
  readonly tenant: TenantContext | null;
}

export type ViewHandler = (args: ViewArgs) => Promise<Result<Response, AppError>>;

export interface ViewOptions {
  /** Redirect anonymous callers to the login URL. Default on. */
  readonly requireIdentity?: boolean;
  readonly tenant?: TenantRequirement;
  /** Route parameter naming the tenant in the URL */
  readonly tenantParam?: string;
  /** Element a fragment view swaps; error fragments go here too */
  readonly primaryTarget?: string;
}

interface Deps {
  readonly dispatcher: ViewDispatcher;
  readonly composer: FragmentComposer;
  readonly resolver: TenantResolver;
  readonly errors: ErrorResponder;
  readonly loginUrl: string;
}

type ViewKind = "page" | "fragment";

/**
 * Wraps handlers with the per-request pipeline:
 * fragment check → identity → render context → tenant → handler.
 * Notifications left at a redirect are kept for the next request.
 */
export const createViews = (deps: Deps) => {
  const { dispatcher, composer, resolver, errors, loginUrl } = deps;

  const respond = async (
    kind: ViewKind,
    handler: ViewHandler,
    options: ViewOptions,
    req: Request,
    ctx: RequestContext,
    params: RouteParams,
  ): Promise<Response> => {
    const primaryTarget = options.primaryTarget ?? TargetId.MAIN;
    const fail = (error: AppError): Response =>
      kind === "fragment" ? errors.fragment(ctx, error, primaryTarget) : errors.page(ctx, error);

    // Fragment endpoints reject full navigations before anything else runs
    if (kind === "fragment") {
      const checked = composer.assertFragmentRequest(ctx);
      if (!checked.ok) return errors.page(ctx, checked.error);
    }

    const requirement = options.tenant ?? TenantRequirement.NONE;
    const needsIdentity =
      (options.requireIdentity ?? true) || requirement === TenantRequirement.MANDATORY;
    if (needsIdentity && ctx.userId === null) {
      return redirect(ctx, loginRedirectUrl(loginUrl, requestUrl(ctx)));
    }

    const rc = await dispatcher.dispatch(ctx);
    if (!rc.ok) return fail(rc.error);

    let tenant: TenantContext | null = null;
    if (requirement !== TenantRequirement.NONE && ctx.userId !== null) {
      const state = await resolver.resolve({
        userId: ctx.userId,
        urlTenantId: options.tenantParam !== undefined ? params[options.tenantParam] : undefined,
        session: ctx.session,
        notifications: ctx.notifications,
        mandatory: requirement === TenantRequirement.MANDATORY,
      });
      if (!state.ok) return fail(state.error);
      if (state.value.kind === "Blocked" && state.value.redirectTo !== null) {
        return redirect(ctx, state.value.redirectTo);
      }
      if (isBound(state.value)) tenant = toTenantContext(state.value);
    }

    const result = await handler({ req, ctx, rc: rc.value, params, userId: ctx.userId, tenant });
    return result.ok ? result.value : fail(result.error);
  };

  const wrap =
    (kind: ViewKind) =>
    (handler: ViewHandler, options: ViewOptions = {}): RouteHandler =>
    (req, ctx, params) =>
      respond(kind, handler, options, req, ctx, params);

  return {
    /** Full page or partial, depending on the fragment marker */
    page: wrap("page"),
    /** Reachable only through fragment requests */
    fragment: wrap("fragment"),
  };
};

export type Views = ReturnType<typeof createViews>;
