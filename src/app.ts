import { createHealthService } from "./application/services/health.service.js";
import { createTeamService } from "./application/services/team.service.js";
import { createTenantResolver } from "./application/services/tenant-resolver.js";
import type { IdentityProvider } from "./core/ports/identity.js";
import type { Logger } from "./core/ports/logger.js";
import type { MembershipRepository } from "./core/ports/membership.repository.js";
import type { SessionStore } from "./core/ports/session-store.js";
import { brand } from "./core/types/brand.js";
import type { AppConfig } from "./infrastructure/config/config.js";
import { createTemplateRegistry } from "./infrastructure/templates/template-registry.js";
import {
  createSessionIdentityProvider,
  createStaticIdentityProvider,
} from "./presentation/middleware/identity.js";
import { createRouter } from "./presentation/routes/router.js";
import { type AppServer, createServer } from "./presentation/server.js";
import { templates } from "./presentation/templates/index.js";
import { createErrorResponder } from "./presentation/views/error-responder.js";
import { createFragmentComposer } from "./presentation/views/fragment-composer.js";
import { createViewDispatcher } from "./presentation/views/view-dispatcher.js";
import { createViews } from "./presentation/views/view.js";

export const VERSION = "0.1.0";

interface AppDeps {
  readonly config: AppConfig;
  readonly logger: Logger;
  readonly sessions: SessionStore;
  readonly memberships: MembershipRepository;
  /** Overrides the identity read from the session, e.g. in tests */
  readonly identity?: IdentityProvider;
}

/**
 * Compose the dependency graph from config and opened stores.
 * Starting and stopping the HTTP listener is left to the caller.
 */
export const createApp = (deps: AppDeps): AppServer => {
  const { config, logger, sessions, memberships } = deps;
  const production = config.env === "production";

  const engine = createTemplateRegistry(templates);

  const sessionIdentity = createSessionIdentityProvider(sessions);
  const identity =
    deps.identity ??
    (config.devUserId !== undefined
      ? createStaticIdentityProvider(config.devUserId, sessionIdentity)
      : sessionIdentity);

  const resolver = createTenantResolver({
    memberships,
    tenantCreateUrl: config.urls.tenantCreate,
    logger: logger.child({ service: "tenant" }),
  });
  const teamService = createTeamService({
    memberships,
    logger: logger.child({ service: "team" }),
  });
  const probeSession = brand<string, "SessionId">("readiness-probe");
  const healthService = createHealthService({
    logger: logger.child({ service: "health" }),
    version: VERSION,
    probes: [
      {
        name: "sessions",
        check: () => sessions.get(probeSession, "ping"),
      },
    ],
  });

  const dispatcher = createViewDispatcher(engine);
  const composer = createFragmentComposer({
    engine,
    logger: logger.child({ layer: "composer" }),
    lenientDuplicates: production,
  });
  const errors = createErrorResponder({ engine, exposeDetails: !production });
  const views = createViews({
    dispatcher,
    composer,
    resolver,
    errors,
    loginUrl: config.urls.login,
  });

  const router = createRouter({
    views,
    dispatcher,
    composer,
    errors,
    engine,
    resolver,
    teamService,
    healthService,
    logger,
  });

  return createServer({ config, logger, router, sessions, identity });
};
