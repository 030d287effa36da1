import { describe, expect, it } from "vitest";
import { parseConfig } from "../../src/infrastructure/config/config.js";

describe("parseConfig", () => {
  it("applies defaults to an empty environment", () => {
    const result = parseConfig({});
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    const { config } = result;
    expect(config.env).toBe("development");
    expect(config.port).toBe(3000);
    expect(config.session).toEqual({
      cookieName: "sid",
      ttlMs: 1_209_600_000,
      secureCookie: false,
      pruneIntervalMs: 3_600_000,
    });
    expect(config.store).toEqual({ driver: "sqlite", path: "data/fragments.sqlite" });
    expect(config.urls).toEqual({ login: "/accounts/login/", tenantCreate: "/teams/new" });
    expect(config.devUserId).toBeUndefined();
  });

  it("reads values from the environment", () => {
    const result = parseConfig({
      NODE_ENV: "test",
      PORT: "4000",
      STORE_DRIVER: "memory",
      SESSION_SECURE_COOKIE: "true",
      DEV_USER_ID: "dev-user",
      LOG_FORMAT: "json",
    });
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.config.port).toBe(4000);
    expect(result.config.store.driver).toBe("memory");
    expect(result.config.session.secureCookie).toBe(true);
    expect(result.config.devUserId).toBe("dev-user");
    expect(result.config.log.format).toBe("json");
  });

  it("collects errors by field", () => {
    const result = parseConfig({ PORT: "70000", LOGIN_URL: "accounts" });
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(Object.keys(result.errors).sort()).toEqual(["port", "urls.login"]);
  });

  it("requires a connection string for SQL Server", () => {
    const result = parseConfig({ STORE_DRIVER: "mssql" });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.errors["store.url"]).toEqual(["DATABASE_URL is required when STORE_DRIVER=mssql"]);
    }
  });

  it("refuses a fixed development identity in production", () => {
    const result = parseConfig({ NODE_ENV: "production", DEV_USER_ID: "dev-user" });
    expect(result.ok).toBe(false);
    if (!result.ok) expect(Object.keys(result.errors)).toEqual(["devUserId"]);
  });
});
