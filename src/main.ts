import { VERSION, createApp } from "./app.js";
import { loadConfig } from "./infrastructure/config/config.js";
import { openStores } from "./infrastructure/database/stores.js";
import { createLogger } from "./infrastructure/logging/logger.js";
import { printShutdown, printStartupBanner } from "./shared/cli.js";

/**
 * Bootstrap: compose the dependency graph, then start the server.
 * Single entry point, fail-fast on misconfiguration.
 */
const bootstrap = async (): Promise<void> => {
  const bootStart = performance.now();

  // 1. Config (validated, fails fast)
  const config = loadConfig();

  // 2. Logger
  const logger = createLogger({
    level: config.log.level,
    format: config.log.format,
    bindings: { version: VERSION },
  });

  // 3. Stores, migrated
  const stores = await openStores(config, logger);

  // 4. Compose and listen
  const app = createApp({
    config,
    logger,
    sessions: stores.sessions,
    memberships: stores.memberships,
  });
  await app.start();

  printStartupBanner({ config, bootTimeMs: performance.now() - bootStart });

  // 5. Periodic pruning of idle sessions
  const pruneInterval = setInterval(() => {
    stores.sessions
      .prune()
      .then((result) => {
        if (!result.ok) {
          logger.warn("Session prune failed", { code: result.error.code, error: result.error.message });
        } else if (result.value > 0) {
          logger.debug("Pruned idle sessions", { count: result.value });
        }
      })
      .catch((e: unknown) => {
        logger.error("Session prune threw", { error: e instanceof Error ? e.message : String(e) });
      });
  }, config.session.pruneIntervalMs);
  pruneInterval.unref();

  // 6. Graceful shutdown
  let stopping = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (stopping) return;
    stopping = true;
    printShutdown(signal);
    clearInterval(pruneInterval);
    await app.stop();
    app.flush(); // flush buffered access logs before exit
    await stores.close();
  };

  const onSignal = (signal: string) => () => {
    shutdown(signal)
      .then(() => process.exit(0))
      .catch((e: unknown) => {
        logger.error("Shutdown failed", { error: e instanceof Error ? e.message : String(e) });
        process.exit(1);
      });
  };
  process.on("SIGINT", onSignal("SIGINT"));
  process.on("SIGTERM", onSignal("SIGTERM"));

  // 7. Unhandled rejection safety net
  process.on("unhandledRejection", (reason) => {
    logger.fatal("Unhandled promise rejection", {
      error: reason instanceof Error ? reason.message : String(reason),
      stack: reason instanceof Error ? reason.stack : undefined,
    });
  });
};

bootstrap().catch((e: unknown) => {
  process.stderr.write(`Failed to start: ${e instanceof Error ? (e.stack ?? e.message) : String(e)}\n`);
  process.exit(1);
});
