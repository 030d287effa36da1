import { beforeEach, describe, expect, it } from "vitest";
import { createNotificationQueue } from "../../src/application/services/notification-queue.js";
import {
  TENANT_SETUP_MESSAGE,
  type TenantResolver,
  createTenantResolver,
} from "../../src/application/services/tenant-resolver.js";
import { type Membership, type Tenant, TenantRole } from "../../src/core/entities/tenant.entity.js";
import { SessionKey, type SessionStore } from "../../src/core/ports/session-store.js";
import { brand } from "../../src/core/types/brand.js";
import {
  type InMemoryMembershipRepository,
  createInMemoryMembershipRepository,
} from "../../src/infrastructure/database/in-memory-membership.repository.js";
import { bindSession } from "../../src/infrastructure/session/bind-session.js";
import { createInMemorySessionStore } from "../../src/infrastructure/session/in-memory-session-store.js";
import { quietLogger } from "../helpers/context.js";

const tenant = (id: string, name: string): Tenant => ({
  id: brand<string, "TenantId">(id),
  name,
  slug: name.toLowerCase(),
  createdAt: brand<number, "Timestamp">(1),
});

const member = (tenantId: string, userId: string, joinedAt: number): Membership => ({
  tenantId: brand<string, "TenantId">(tenantId),
  userId: brand<string, "UserId">(userId),
  role: TenantRole.MEMBER,
  joinedAt: brand<number, "Timestamp">(joinedAt),
});

const alpha = tenant("t-alpha", "Alpha");
const beta = tenant("t-beta", "Beta");
const gamma = tenant("t-gamma", "Gamma");

const USER = brand<string, "UserId">("user-1");

/** Session store that counts writes */
const countingStore = (): { store: SessionStore; writes: () => number } => {
  const inner = createInMemorySessionStore({ ttlMs: 60_000 });
  let writes = 0;
  return {
    store: {
      ...inner,
      set: (sessionId, key, value) => {
        writes++;
        return inner.set(sessionId, key, value);
      },
    },
    writes: () => writes,
  };
};

describe("Tenant resolver", () => {
  let memberships: InMemoryMembershipRepository;
  let resolver: TenantResolver;
  let counted: ReturnType<typeof countingStore>;
  const sessionId = brand<string, "SessionId">("session-0000000001");

  const session = () => bindSession(counted.store, sessionId);
  const storedTenant = async () => {
    const got = await session().get(SessionKey.TENANT_ID);
    return got.ok ? got.value : "read failed";
  };

  beforeEach(() => {
    memberships = createInMemoryMembershipRepository();
    // user-1 joined Beta first, then Alpha; Gamma exists but user-1 is not a member
    memberships.seed({
      tenants: [alpha, beta, gamma],
      memberships: [member("t-alpha", "user-1", 20), member("t-beta", "user-1", 10)],
    });
    resolver = createTenantResolver({
      memberships,
      tenantCreateUrl: "/teams/new",
      logger: quietLogger,
    });
    counted = countingStore();
  });

  const resolve = (urlTenantId: string | null, mandatory = true, userId = USER) => {
    const notifications = createNotificationQueue();
    return {
      notifications,
      result: resolver.resolve({ userId, urlTenantId, session: session(), notifications, mandatory }),
    };
  };

  it("binds the tenant named in the URL and remembers it", async () => {
    const { result } = resolve("t-alpha");
    const state = await result;
    expect(state).toEqual({ ok: true, value: { kind: "TenantFromUrl", tenant: alpha } });
    expect(await storedTenant()).toBe("t-alpha");
  });

  it("ignores a URL tenant the caller does not belong to", async () => {
    await session().set(SessionKey.TENANT_ID, "t-alpha");
    const state = await resolve("t-gamma").result;
    expect(state).toEqual({ ok: true, value: { kind: "TenantFromSession", tenant: alpha } });
    expect(await storedTenant()).toBe("t-alpha");
  });

  it("ignores a URL tenant that does not exist", async () => {
    const state = await resolve("t-missing").result;
    expect(state.ok && state.value.kind).toBe("TenantFromFallback");
  });

  it("uses the session tenant while the caller is still a member", async () => {
    await session().set(SessionKey.TENANT_ID, "t-alpha");
    const before = counted.writes();
    const state = await resolve(null).result;
    expect(state).toEqual({ ok: true, value: { kind: "TenantFromSession", tenant: alpha } });
    expect(counted.writes()).toBe(before);
  });

  it("falls back to the earliest membership and stores it", async () => {
    const state = await resolve(null).result;
    expect(state).toEqual({ ok: true, value: { kind: "TenantFromFallback", tenant: beta } });
    expect(await storedTenant()).toBe("t-beta");

    const next = await resolve(null).result;
    expect(next).toEqual({ ok: true, value: { kind: "TenantFromSession", tenant: beta } });
  });

  it("replaces a stale session tenant with the fallback", async () => {
    await session().set(SessionKey.TENANT_ID, "t-gamma");
    const state = await resolve(null).result;
    expect(state.ok && state.value.kind).toBe("TenantFromFallback");
    expect(await storedTenant()).toBe("t-beta");
  });

  it("blocks a mandatory view for a caller without teams", async () => {
    const { result, notifications } = resolve(null, true, brand<string, "UserId">("user-2"));
    expect(await result).toEqual({ ok: true, value: { kind: "Blocked", redirectTo: "/teams/new" } });
    expect(notifications.entries()).toEqual([{ level: "info", text: TENANT_SETUP_MESSAGE }]);
  });

  it("lets an optional view through without a tenant and clears a stale one", async () => {
    await session().set(SessionKey.TENANT_ID, "t-alpha");
    const { result, notifications } = resolve(null, false, brand<string, "UserId">("user-2"));
    expect(await result).toEqual({ ok: true, value: { kind: "Blocked", redirectTo: null } });
    expect(notifications.isEmpty()).toBe(true);
    expect(await storedTenant()).toBeUndefined();
  });

  it("does not write the session when the URL tenant is already stored", async () => {
    await resolve("t-alpha").result;
    const before = counted.writes();
    await resolve("t-alpha").result;
    expect(counted.writes()).toBe(before);
  });

  describe("persist", () => {
    it("writes only when the tenant changes", async () => {
      const id = brand<string, "TenantId">("t-alpha");
      expect(await resolver.persist(session(), id)).toEqual({ ok: true, value: true });
      expect(await resolver.persist(session(), id)).toEqual({ ok: true, value: false });
      expect(counted.writes()).toBe(1);
    });
  });
});
