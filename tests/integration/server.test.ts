import { beforeEach, describe, expect, it } from "vitest";
import { createApp } from "../../src/app.js";
import type { SessionStore } from "../../src/core/ports/session-store.js";
import { brand } from "../../src/core/types/brand.js";
import { parseConfig } from "../../src/infrastructure/config/config.js";
import { createInMemoryMembershipRepository } from "../../src/infrastructure/database/in-memory-membership.repository.js";
import { createInMemorySessionStore } from "../../src/infrastructure/session/in-memory-session-store.js";
import type { AppServer } from "../../src/presentation/server.js";
import { quietLogger } from "../helpers/context.js";

const SID = "0b6f2a1e-4c1d-4f7a-9d52-3c8e5b7a1f00";
const BASE = "http://localhost";

const parsed = parseConfig({ NODE_ENV: "test", STORE_DRIVER: "memory", LOG_LEVEL: "fatal" });
if (!parsed.ok) throw new Error("test config is invalid");
const config = parsed.config;

const HX = { "HX-Request": "true" };

describe("Server", () => {
  let app: AppServer;
  let sessions: SessionStore;

  const request = (path: string, init: { headers?: Record<string, string>; method?: string; body?: string } = {}) =>
    app.handleRequest(
      new Request(`${BASE}${path}`, {
        method: init.method ?? "GET",
        headers: { cookie: `sid=${SID}`, ...init.headers },
        ...(init.body !== undefined ? { body: init.body } : {}),
      }),
    );

  const signIn = (userId: string) =>
    sessions.set(brand<string, "SessionId">(SID), "user_id", userId);

  const createTeam = async (name: string): Promise<string> => {
    const res = await request("/teams", {
      method: "POST",
      headers: { "Content-Type": "application/x-www-form-urlencoded" },
      body: `name=${encodeURIComponent(name)}`,
    });
    expect(res.status).toBe(302);
    const location = res.headers.get("Location") ?? "";
    const match = /^\/teams\/([^/]+)\/$/.exec(location);
    if (!match?.[1]) throw new Error(`unexpected redirect ${location}`);
    return match[1];
  };

  beforeEach(() => {
    sessions = createInMemorySessionStore({ ttlMs: 60_000 });
    app = createApp({
      config,
      logger: quietLogger,
      sessions,
      memberships: createInMemoryMembershipRepository(),
    });
  });

  describe("health", () => {
    it("answers the shallow check", async () => {
      const res = await app.handleRequest(new Request(`${BASE}/health`));
      expect(res.status).toBe(200);
      const body: unknown = await res.json();
      expect(body).toMatchObject({ data: { status: "ok" } });
    });

    it("probes the session store on readiness", async () => {
      const res = await request("/readiness");
      expect(res.status).toBe(200);
      const body: unknown = await res.json();
      expect(body).toMatchObject({ data: { status: "ok", checks: { sessions: { status: "ok" } } } });
    });
  });

  describe("cross-cutting headers", () => {
    it("issues a session cookie to a new browser", async () => {
      const res = await app.handleRequest(new Request(`${BASE}/`));
      expect(res.status).toBe(200);
      expect(res.headers.get("Set-Cookie")).toMatch(/^sid=[0-9a-f-]{36}; Path=\/; HttpOnly; SameSite=Lax; Max-Age=\d+$/);
    });

    it("keeps an existing session cookie", async () => {
      const res = await request("/");
      expect(res.headers.get("Set-Cookie")).toBeNull();
    });

    it("echoes the request id and varies on the fragment marker", async () => {
      const res = await request("/", { headers: { "x-request-id": "req-42" } });
      expect(res.headers.get("X-Request-Id")).toBe("req-42");
      expect(res.headers.get("Vary")).toBe("HX-Request");
    });
  });

  describe("identity", () => {
    it("sends anonymous callers to the login page", async () => {
      const res = await request("/dashboard");
      expect(res.status).toBe(302);
      expect(res.headers.get("Location")).toBe("/accounts/login/?next=%2Fdashboard");
    });

    it("uses a client-side redirect for anonymous fragment requests", async () => {
      const res = await request("/teams/t1/switch", { headers: HX });
      expect(res.status).toBe(200);
      expect(res.headers.get("HX-Redirect")).toBe("/accounts/login/?next=%2Fteams%2Ft1%2Fswitch");
    });
  });

  describe("tenant onboarding", () => {
    it("blocks the dashboard until a team exists and carries the notice across the redirect", async () => {
      await signIn("user-1");

      const blocked = await request("/dashboard");
      expect(blocked.status).toBe(302);
      expect(blocked.headers.get("Location")).toBe("/teams/new");

      const form = await request("/teams/new");
      expect(form.status).toBe(200);
      const html = await form.text();
      expect(html).toContain(
        '<div class="toast toast-info" role="status">Let&#39;s set up your team first.</div>',
      );

      // The notice is delivered once
      const again = await (await request("/teams/new")).text();
      expect(again).not.toContain("toast-info");
    });

    it("keeps the notice for the page after an unrelated request", async () => {
      await signIn("user-1");
      await request("/dashboard");

      const missing = await request("/favicon.ico");
      expect(missing.status).toBe(404);
      expect(await missing.text()).not.toContain("toast-info");

      const health = await request("/health");
      expect(health.status).toBe(200);

      const html = await (await request("/teams/new")).text();
      expect(html).toContain(
        '<div class="toast toast-info" role="status">Let&#39;s set up your team first.</div>',
      );
    });

    it("re-renders the form for an empty name", async () => {
      await signIn("user-1");
      const res = await request("/teams", {
        method: "POST",
        headers: { "Content-Type": "application/x-www-form-urlencoded" },
        body: "name=%20%20",
      });
      expect(res.status).toBe(422);
      expect(await res.text()).toContain('<ul class="form-errors"><li>Team name is required</li></ul>');
    });

    it("creates a team and opens its dashboard", async () => {
      await signIn("user-1");
      const id = await createTeam("Alpha");

      const res = await request(`/teams/${id}/`);
      expect(res.status).toBe(200);
      const html = await res.text();
      expect(html).toContain("Team &quot;Alpha&quot; created.");
      expect(html).toContain('<header id="team-header" class="team-header">');
      expect(html).toContain(`<section id="team-panel" class="dashboard" data-tenant="${id}">`);
    });

    it("remembers the active team for the dashboard", async () => {
      await signIn("user-1");
      const alpha = await createTeam("Alpha");
      await createTeam("Beta");

      await request(`/teams/${alpha}/`);
      const html = await (await request("/dashboard")).text();
      expect(html).toContain(`data-tenant="${alpha}"`);
    });
  });

  describe("team switching", () => {
    it("rejects a full navigation to the fragment endpoint", async () => {
      await signIn("user-1");
      const id = await createTeam("Alpha");

      const res = await request(`/teams/${id}/switch`);
      expect(res.status).toBe(500);
      const html = await res.text();
      expect(html.startsWith("<!doctype html>")).toBe(true);
      expect(html).toContain(`/teams/${id}/switch is only reachable through fragment requests`);
    });

    it("swaps the panel and updates header, navigation and toasts out of band", async () => {
      await signIn("user-1");
      const alpha = await createTeam("Alpha");
      const beta = await createTeam("Beta");
      await request(`/teams/${beta}/`);

      const res = await request(`/teams/${alpha}/switch`, { headers: HX });
      expect(res.status).toBe(200);
      expect(res.headers.get("HX-Push-Url")).toBe(`/teams/${alpha}/`);

      const body = await res.text();
      expect(body.startsWith("<h1>Alpha</h1>")).toBe(true);
      expect(body).not.toContain("<!doctype html>");
      expect(body).toContain('<header id="team-header" class="team-header" hx-swap-oob="true">');
      expect(body).toContain(
        '<span id="nav-active-marker" data-active-section="dashboard" hidden hx-swap-oob="true"></span>',
      );
      expect(body).toContain(
        '<div id="toast-container" hx-swap-oob="true"><div class="toast toast-info" role="status">Switched to Alpha.</div></div>',
      );

      // The switch is remembered
      const dashboard = await (await request("/dashboard")).text();
      expect(dashboard).toContain(`data-tenant="${alpha}"`);
    });

    it("falls back to a team the caller belongs to when the URL names another", async () => {
      await signIn("user-1");
      const alpha = await createTeam("Alpha");
      await signIn("user-2");
      const beta = await createTeam("Beta");

      const html = await (await request(`/teams/${alpha}/`)).text();
      expect(html).toContain(`data-tenant="${beta}"`);
    });
  });

  describe("examples", () => {
    it("answers with toasts only", async () => {
      const res = await request("/examples/toast", { headers: HX });
      expect(res.status).toBe(200);
      expect(await res.text()).toBe(
        '\n<div id="toast-container" hx-swap-oob="true"><div class="toast toast-success" role="status">Saved.</div></div>',
      );
    });

    it("refreshes the modal container", async () => {
      const body = await (await request("/examples/modal", { headers: HX })).text();
      expect(body).toBe(
        '<p class="example-result">Modal opened.</p>\n<div id="modal-container" hx-swap-oob="true"><div class="modal" role="dialog" aria-modal="true"><h2>Example dialog</h2><p>This dialog arrived out of band.</p></div></div>',
      );
    });

    it("returns an error fragment retargeted at the output", async () => {
      const res = await request("/examples/nav?section=BAD", { headers: HX });
      expect(res.status).toBe(400);
      expect(res.headers.get("HX-Retarget")).toBe("#example-output");
      expect(res.headers.get("HX-Reswap")).toBe("innerHTML");
      expect(await res.text()).toContain("<strong>Bad request</strong> Unknown section");
    });
  });

  it("renders a not found page for unknown routes", async () => {
    const res = await request("/nowhere");
    expect(res.status).toBe(404);
    expect(await res.text()).toContain("GET /nowhere not found");
  });
});
