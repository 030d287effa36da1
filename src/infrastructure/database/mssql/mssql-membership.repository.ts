/**
 * SQL Server membership repository adapter.
 */

import type sql from "mssql";
import {
  type Membership,
  type Tenant,
  type TenantDraft,
  TenantRole,
} from "../../../core/entities/tenant.entity.js";
import { type AppError, internal } from "../../../core/errors/app-error.js";
import type { MembershipRepository } from "../../../core/ports/membership.repository.js";
import type { TenantId, UserId } from "../../../core/types/brand.js";
import { type Result, err, ok } from "../../../core/types/result.js";
import { generateId } from "../../../shared/utils/id.js";
import { slugify } from "../../../shared/utils/slug.js";
import { rowToMembership, rowToTenant } from "../sqlite-membership.repository.js";

interface TenantRow {
  id: string;
  name: string;
  slug: string;
  created_at: number;
}

interface MembershipRow {
  tenant_id: string;
  user_id: string;
  role: string;
  joined_at: number;
}

/** mssql returns BIGINT columns as strings */
const toMillis = (value: number | string): number => Number(value);

export const createMssqlMembershipRepository = (pool: sql.ConnectionPool): MembershipRepository => ({
  async listMemberships(userId: UserId): Promise<Result<readonly Membership[], AppError>> {
    try {
      const result = await pool
        .request()
        .input("userId", userId)
        .query<MembershipRow>(
          "SELECT tenant_id, user_id, role, joined_at FROM memberships WHERE user_id = @userId ORDER BY joined_at, tenant_id",
        );
      return ok(
        result.recordset.map((row) => rowToMembership({ ...row, joined_at: toMillis(row.joined_at) })),
      );
    } catch (e: unknown) {
      return err(internal("Database error", e));
    }
  },

  async isMember(userId: UserId, tenantId: TenantId): Promise<Result<boolean, AppError>> {
    try {
      const result = await pool
        .request()
        .input("userId", userId)
        .input("tenantId", tenantId)
        .query("SELECT 1 FROM memberships WHERE user_id = @userId AND tenant_id = @tenantId");
      return ok(result.recordset.length > 0);
    } catch (e: unknown) {
      return err(internal("Database error", e));
    }
  },

  async findTenant(tenantId: TenantId): Promise<Result<Tenant | null, AppError>> {
    try {
      const result = await pool
        .request()
        .input("tenantId", tenantId)
        .query<TenantRow>("SELECT id, name, slug, created_at FROM tenants WHERE id = @tenantId");
      const row = result.recordset[0];
      return ok(row ? rowToTenant({ ...row, created_at: toMillis(row.created_at) }) : null);
    } catch (e: unknown) {
      return err(internal("Database error", e));
    }
  },

  async createTenant(draft: TenantDraft, ownerId: UserId): Promise<Result<Tenant, AppError>> {
    const tx = pool.transaction();
    try {
      await tx.begin();
      const base = slugify(draft);
      const taken = await tx
        .request()
        .input("base", base)
        .input("pattern", `${base}-%`)
        .query<{ slug: string }>("SELECT slug FROM tenants WHERE slug = @base OR slug LIKE @pattern");
      const takenSlugs = new Set(taken.recordset.map((r) => r.slug));
      let slug = base;
      for (let n = 2; takenSlugs.has(slug); n++) slug = `${base}-${n}`;

      const row: TenantRow = { id: generateId(), name: draft.name, slug, created_at: Date.now() };
      await tx
        .request()
        .input("id", row.id)
        .input("name", row.name)
        .input("slug", row.slug)
        .input("createdAt", row.created_at)
        .query("INSERT INTO tenants (id, name, slug, created_at) VALUES (@id, @name, @slug, @createdAt)");
      await tx
        .request()
        .input("tenantId", row.id)
        .input("userId", ownerId)
        .input("role", TenantRole.OWNER)
        .input("joinedAt", row.created_at)
        .query(
          "INSERT INTO memberships (tenant_id, user_id, role, joined_at) VALUES (@tenantId, @userId, @role, @joinedAt)",
        );
      await tx.commit();
      return ok(rowToTenant(row));
    } catch (e: unknown) {
      await tx.rollback().catch(() => undefined);
      return err(internal("Database error", e));
    }
  },
});
