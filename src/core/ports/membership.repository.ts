import type { Membership, Tenant, TenantDraft } from "../entities/tenant.entity.js";
import type { AppError } from "../errors/app-error.js";
import type { TenantId, UserId } from "../types/brand.js";
import type { Result } from "../types/result.js";

/**
 * Port: MembershipRepository: tenant membership data.
 * The composition engine only reads it; `createTenant` backs the onboarding view.
 */
export interface MembershipRepository {
  /** Memberships of a caller, earliest joined first. */
  listMemberships(userId: UserId): Promise<Result<readonly Membership[], AppError>>;
  isMember(userId: UserId, tenantId: TenantId): Promise<Result<boolean, AppError>>;
  findTenant(tenantId: TenantId): Promise<Result<Tenant | null, AppError>>;
  /** Create a tenant and make `ownerId` its owner. */
  createTenant(draft: TenantDraft, ownerId: UserId): Promise<Result<Tenant, AppError>>;
}
