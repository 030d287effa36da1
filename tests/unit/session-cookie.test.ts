import { describe, expect, it } from "vitest";
import { brand } from "../../src/core/types/brand.js";
import { readFragmentMarker } from "../../src/presentation/middleware/fragment.js";
import {
  parseCookies,
  readSessionCookie,
  serializeSessionCookie,
} from "../../src/presentation/middleware/session.js";

const KNOWN_ID = "0b6f2a1e-4c1d-4f7a-9d52-3c8e5b7a1f00";

const request = (headers: Record<string, string>) =>
  new Request("http://localhost/", { headers });

describe("parseCookies", () => {
  it("splits pairs and decodes values", () => {
    const cookies = parseCookies("a=1; b=hello%20world;c");
    expect([...cookies]).toEqual([
      ["a", "1"],
      ["b", "hello world"],
    ]);
  });

  it("keeps the first of duplicate names", () => {
    expect(parseCookies("sid=first; sid=second").get("sid")).toBe("first");
  });

  it("keeps undecodable values as sent", () => {
    expect(parseCookies("a=%E0%A4%A").get("a")).toBe("%E0%A4%A");
  });
});

describe("readSessionCookie", () => {
  it("reuses a well-formed id", () => {
    const cookie = readSessionCookie(request({ cookie: `sid=${KNOWN_ID}` }), "sid");
    expect(cookie).toEqual({ id: KNOWN_ID, issued: false });
  });

  it("issues a new id when none is sent", () => {
    const cookie = readSessionCookie(request({}), "sid");
    expect(cookie.issued).toBe(true);
    expect(cookie.id).toMatch(/^[0-9a-f-]{36}$/);
  });

  it("issues a new id when the sent one is malformed", () => {
    const cookie = readSessionCookie(request({ cookie: "sid=../../etc" }), "sid");
    expect(cookie.issued).toBe(true);
    expect(cookie.id).not.toBe("../../etc");
  });
});

describe("serializeSessionCookie", () => {
  const id = brand<string, "SessionId">(KNOWN_ID);

  it("writes a lax, http-only cookie", () => {
    const header = serializeSessionCookie(
      { session: { cookieName: "sid", ttlMs: 3_600_000, secureCookie: false, pruneIntervalMs: 1 } },
      id,
    );
    expect(header).toBe(`sid=${KNOWN_ID}; Path=/; HttpOnly; SameSite=Lax; Max-Age=3600`);
  });

  it("adds Secure when configured", () => {
    const header = serializeSessionCookie(
      { session: { cookieName: "sid", ttlMs: 1000, secureCookie: true, pruneIntervalMs: 1 } },
      id,
    );
    expect(header.endsWith("; Secure")).toBe(true);
  });
});

describe("readFragmentMarker", () => {
  it("recognises the fragment client", () => {
    expect(readFragmentMarker(request({ "HX-Request": "true", "HX-Target": "team-panel" }))).toEqual({
      isFragment: true,
      target: "team-panel",
    });
  });

  it("treats other values as full navigations", () => {
    expect(readFragmentMarker(request({ "HX-Request": "1", "HX-Target": "x" }))).toEqual({
      isFragment: false,
      target: null,
    });
  });
});
