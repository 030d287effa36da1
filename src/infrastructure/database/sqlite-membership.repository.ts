import {
  type Membership,
  type Tenant,
  type TenantDraft,
  TenantRole,
} from "../../core/entities/tenant.entity.js";
import { type AppError, internal } from "../../core/errors/app-error.js";
import type { MembershipRepository } from "../../core/ports/membership.repository.js";
import { type TenantId, type UserId, brand } from "../../core/types/brand.js";
import { type Result, err, ok } from "../../core/types/result.js";
import { generateId } from "../../shared/utils/id.js";
import { slugify, uniqueSlug } from "../../shared/utils/slug.js";
import type { SqliteDatabase } from "./sqlite.js";

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

const toRole = (raw: string): TenantRole => {
  for (const role of Object.values(TenantRole)) {
    if (role === raw) return role;
  }
  return TenantRole.MEMBER;
};

export const rowToTenant = (row: TenantRow): Tenant => ({
  id: brand<string, "TenantId">(row.id),
  name: row.name,
  slug: row.slug,
  createdAt: brand<number, "Timestamp">(row.created_at),
});

export const rowToMembership = (row: MembershipRow): Membership => ({
  tenantId: brand<string, "TenantId">(row.tenant_id),
  userId: brand<string, "UserId">(row.user_id),
  role: toRole(row.role),
  joinedAt: brand<number, "Timestamp">(row.joined_at),
});

/**
 * SQLite-backed membership repository.
 * Requires migration 001_create_tenants to be applied.
 */
export const createSqliteMembershipRepository = (db: SqliteDatabase): MembershipRepository => {
  const listStmt = db.prepare<[string], MembershipRow>(
    "SELECT tenant_id, user_id, role, joined_at FROM memberships WHERE user_id = ? ORDER BY joined_at, tenant_id",
  );
  const memberStmt = db.prepare<[string, string], { found: number }>(
    "SELECT 1 AS found FROM memberships WHERE user_id = ? AND tenant_id = ?",
  );
  const tenantStmt = db.prepare<[string], TenantRow>(
    "SELECT id, name, slug, created_at FROM tenants WHERE id = ?",
  );
  const slugStmt = db.prepare<[string], { found: number }>(
    "SELECT 1 AS found FROM tenants WHERE slug = ?",
  );
  const insertTenantStmt = db.prepare<[string, string, string, number]>(
    "INSERT INTO tenants (id, name, slug, created_at) VALUES (?, ?, ?, ?)",
  );
  const insertMembershipStmt = db.prepare<[string, string, string, number]>(
    "INSERT INTO memberships (tenant_id, user_id, role, joined_at) VALUES (?, ?, ?, ?)",
  );

  const create = db.transaction((draft: TenantDraft, ownerId: string): TenantRow => {
    const slug = uniqueSlug(slugify(draft), (candidate) => slugStmt.get(candidate) !== undefined);
    const row: TenantRow = { id: generateId(), name: draft.name, slug, created_at: Date.now() };
    insertTenantStmt.run(row.id, row.name, row.slug, row.created_at);
    insertMembershipStmt.run(row.id, ownerId, TenantRole.OWNER, row.created_at);
    return row;
  });

  return {
    async listMemberships(userId: UserId): Promise<Result<readonly Membership[], AppError>> {
      try {
        return ok(listStmt.all(userId).map(rowToMembership));
      } catch (e: unknown) {
        return err(internal("Failed to list memberships", e));
      }
    },

    async isMember(userId: UserId, tenantId: TenantId): Promise<Result<boolean, AppError>> {
      try {
        return ok(memberStmt.get(userId, tenantId) !== undefined);
      } catch (e: unknown) {
        return err(internal("Failed to check membership", e));
      }
    },

    async findTenant(tenantId: TenantId): Promise<Result<Tenant | null, AppError>> {
      try {
        const row = tenantStmt.get(tenantId);
        return ok(row ? rowToTenant(row) : null);
      } catch (e: unknown) {
        return err(internal("Failed to load tenant", e));
      }
    },

    async createTenant(draft: TenantDraft, ownerId: UserId): Promise<Result<Tenant, AppError>> {
      try {
        return ok(rowToTenant(create(draft, ownerId)));
      } catch (e: unknown) {
        return err(internal("Failed to create tenant", e));
      }
    },
  };
};
