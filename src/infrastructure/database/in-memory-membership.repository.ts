import {
  type Membership,
  type Tenant,
  type TenantDraft,
  TenantRole,
  compareMemberships,
} from "../../core/entities/tenant.entity.js";
import type { AppError } from "../../core/errors/app-error.js";
import type { MembershipRepository } from "../../core/ports/membership.repository.js";
import { type TenantId, type UserId, brand } from "../../core/types/brand.js";
import { type Result, ok } from "../../core/types/result.js";
import { generateId } from "../../shared/utils/id.js";
import { slugify, uniqueSlug } from "../../shared/utils/slug.js";

/**
 * In-memory membership repository: for tests and the `memory` store driver.
 * `seed` adds tenants and memberships directly.
 */
export interface InMemoryMembershipRepository extends MembershipRepository {
  seed(data: { readonly tenants?: readonly Tenant[]; readonly memberships?: readonly Membership[] }): void;
}

export const createInMemoryMembershipRepository = (
  now: () => number = Date.now,
): InMemoryMembershipRepository => {
  const tenants = new Map<TenantId, Tenant>();
  const memberships: Membership[] = [];

  return {
    seed(data) {
      for (const tenant of data.tenants ?? []) tenants.set(tenant.id, tenant);
      memberships.push(...(data.memberships ?? []));
    },

    async listMemberships(userId: UserId): Promise<Result<readonly Membership[], AppError>> {
      return ok(memberships.filter((m) => m.userId === userId).sort(compareMemberships));
    },

    async isMember(userId: UserId, tenantId: TenantId): Promise<Result<boolean, AppError>> {
      return ok(memberships.some((m) => m.userId === userId && m.tenantId === tenantId));
    },

    async findTenant(tenantId: TenantId): Promise<Result<Tenant | null, AppError>> {
      return ok(tenants.get(tenantId) ?? null);
    },

    async createTenant(draft: TenantDraft, ownerId: UserId): Promise<Result<Tenant, AppError>> {
      const taken = new Set([...tenants.values()].map((t) => t.slug));
      const createdAt = brand<number, "Timestamp">(now());
      const tenant: Tenant = {
        id: brand<string, "TenantId">(generateId()),
        name: draft.name,
        slug: uniqueSlug(slugify(draft), (slug) => taken.has(slug)),
        createdAt,
      };
      tenants.set(tenant.id, tenant);
      memberships.push({ tenantId: tenant.id, userId: ownerId, role: TenantRole.OWNER, joinedAt: createdAt });
      return ok(tenant);
    },
  };
};
