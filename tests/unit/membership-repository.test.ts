import { describe, expect, it } from "vitest";
import { TenantRole, tenantDraft } from "../../src/core/entities/tenant.entity.js";
import type { MembershipRepository } from "../../src/core/ports/membership.repository.js";
import { brand } from "../../src/core/types/brand.js";
import { createInMemoryMembershipRepository } from "../../src/infrastructure/database/in-memory-membership.repository.js";
import { migrateUp } from "../../src/infrastructure/database/migrations/runner.js";
import { createSqliteMembershipRepository } from "../../src/infrastructure/database/sqlite-membership.repository.js";
import { openSqlite } from "../../src/infrastructure/database/sqlite.js";
import { quietLogger } from "../helpers/context.js";

const OWNER = brand<string, "UserId">("owner-1");
const OTHER = brand<string, "UserId">("other-1");

const sqliteRepo = (): MembershipRepository => {
  const db = openSqlite(":memory:");
  migrateUp(db, quietLogger);
  return createSqliteMembershipRepository(db);
};

const drivers: ReadonlyArray<readonly [string, () => MembershipRepository]> = [
  ["memory", () => createInMemoryMembershipRepository()],
  ["sqlite", sqliteRepo],
];

describe.each(drivers)("Membership repository (%s)", (_name, open) => {
  it("creates a tenant owned by its creator", async () => {
    const repo = open();
    const created = await repo.createTenant(tenantDraft("Acme Widgets"), OWNER);
    expect(created.ok).toBe(true);
    if (!created.ok) return;

    expect(created.value.name).toBe("Acme Widgets");
    expect(created.value.slug).toBe("acme-widgets");
    expect(await repo.isMember(OWNER, created.value.id)).toEqual({ ok: true, value: true });
    expect(await repo.isMember(OTHER, created.value.id)).toEqual({ ok: true, value: false });

    const listed = await repo.listMemberships(OWNER);
    expect(listed.ok && listed.value.map((m) => [m.tenantId, m.role])).toEqual([
      [created.value.id, TenantRole.OWNER],
    ]);
  });

  it("gives tenants with the same name distinct slugs", async () => {
    const repo = open();
    const first = await repo.createTenant(tenantDraft("Acme"), OWNER);
    const second = await repo.createTenant(tenantDraft("Acme"), OTHER);
    expect(first.ok && first.value.slug).toBe("acme");
    expect(second.ok && second.value.slug).toBe("acme-2");
  });

  it("finds tenants by id", async () => {
    const repo = open();
    const created = await repo.createTenant(tenantDraft("Acme"), OWNER);
    if (!created.ok) throw new Error("tenant creation failed");
    expect(await repo.findTenant(created.value.id)).toEqual({ ok: true, value: created.value });
    expect(await repo.findTenant(brand<string, "TenantId">("missing"))).toEqual({
      ok: true,
      value: null,
    });
  });

  it("lists nothing for a caller without teams", async () => {
    expect(await open().listMemberships(OTHER)).toEqual({ ok: true, value: [] });
  });
});
