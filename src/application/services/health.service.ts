import type { AppError } from "../../core/errors/app-error.js";
import type { Logger } from "../../core/ports/logger.js";
import type { Result } from "../../core/types/result.js";

export interface HealthStatus {
  readonly status: "ok" | "degraded" | "down";
  readonly version: string;
  readonly uptime: number;
  readonly timestamp: string;
  readonly checks: Record<string, ComponentHealth>;
}

export interface ComponentHealth {
  readonly status: "ok" | "degraded" | "down";
  readonly latencyMs?: number | undefined;
  readonly details?: string | undefined;
}

export interface HealthService {
  check(): Promise<HealthStatus>;
}

/** A dependency the service needs to answer requests, e.g. the session store */
export interface HealthProbe {
  readonly name: string;
  check(): Promise<Result<unknown, AppError>>;
}

interface Deps {
  readonly logger: Logger;
  readonly version: string;
  readonly probes?: readonly HealthProbe[];
  /** Probe latency above which a component reports degraded */
  readonly slowMs?: number;
}

const round = (ms: number): number => Math.round(ms * 100) / 100;

export const createHealthService = (deps: Deps): HealthService => {
  const { logger, version } = deps;
  const probes = deps.probes ?? [];
  const slowMs = deps.slowMs ?? 250;

  return {
    async check(): Promise<HealthStatus> {
      logger.debug("Running deep health check");
      const start = performance.now();

      const checks: Record<string, ComponentHealth> = {};

      const results = await Promise.all(
        probes.map(async (probe) => {
          const probeStart = performance.now();
          const result = await probe.check();
          return { probe, result, latencyMs: round(performance.now() - probeStart) };
        }),
      );

      for (const { probe, result, latencyMs } of results) {
        if (!result.ok) {
          checks[probe.name] = { status: "down", latencyMs, details: result.error.message };
        } else if (latencyMs > slowMs) {
          checks[probe.name] = { status: "degraded", latencyMs, details: "slow response" };
        } else {
          checks[probe.name] = { status: "ok", latencyMs };
        }
      }

      // Determine overall status
      const allChecks = Object.entries(checks);
      const downComponents = allChecks.filter(([, c]) => c.status === "down");
      const degradedComponents = allChecks.filter(([, c]) => c.status === "degraded");

      // Sessions are required for every view, so a failed probe means down
      let overallStatus: "ok" | "degraded" | "down" = "ok";
      if (downComponents.length > 0) {
        overallStatus = "down";
      } else if (degradedComponents.length > 0) {
        overallStatus = "degraded";
      }

      const overall: HealthStatus = {
        status: overallStatus,
        version,
        uptime: process.uptime(),
        timestamp: new Date().toISOString(),
        checks,
      };

      if (overallStatus !== "ok") {
        const failedNames = [...downComponents, ...degradedComponents].map(([name]) => name);
        logger.warn("Health check degraded", { failedComponents: failedNames });
      } else {
        logger.debug("Health check passed", {
          latencyMs: round(performance.now() - start),
        });
      }

      return overall;
    },
  };
};
