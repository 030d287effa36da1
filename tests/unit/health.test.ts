import { describe, expect, it } from "vitest";
import { createHealthService } from "../../src/application/services/health.service.js";
import { internal } from "../../src/core/errors/app-error.js";
import { err, ok } from "../../src/core/types/result.js";
import { createLogger } from "../../src/infrastructure/logging/logger.js";

describe("Health service", () => {
  const logger = createLogger({ level: "fatal" });

  it("reports ok with no probes", async () => {
    const hs = createHealthService({ logger, version: "test" });
    const status = await hs.check();
    expect(status.status).toBe("ok");
    expect(status.version).toBe("test");
    expect(status.checks).toEqual({});
  });

  it("reports ok when every probe answers", async () => {
    const hs = createHealthService({
      logger,
      version: "test",
      probes: [{ name: "sessions", check: async () => ok(undefined) }],
    });
    const status = await hs.check();
    expect(status.status).toBe("ok");
    expect(status.checks["sessions"]?.status).toBe("ok");
  });

  it("reports down when a probe fails", async () => {
    const hs = createHealthService({
      logger,
      version: "test",
      probes: [
        { name: "sessions", check: async () => err(internal("connection refused")) },
        { name: "other", check: async () => ok(1) },
      ],
    });
    const status = await hs.check();
    expect(status.status).toBe("down");
    expect(status.checks["sessions"]?.status).toBe("down");
    expect(status.checks["sessions"]?.details).toBe("connection refused");
    expect(status.checks["other"]?.status).toBe("ok");
  });

  it("reports degraded when a probe is slow", async () => {
    const hs = createHealthService({
      logger,
      version: "test",
      slowMs: 0,
      probes: [
        {
          name: "sessions",
          check: () => new Promise((resolve) => setTimeout(() => resolve(ok(undefined)), 5)),
        },
      ],
    });
    const status = await hs.check();
    expect(status.status).toBe("degraded");
    expect(status.checks["sessions"]?.details).toBe("slow response");
  });
});
