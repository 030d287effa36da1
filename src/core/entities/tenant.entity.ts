import type { TenantId, Timestamp, UserId } from "../types/index.js";

/**
 * Anything whose URL slug is derived from one of its own fields.
 * Implemented explicitly per entity instead of probing attributes at runtime.
 */
export interface HasSlugSource {
  slugSource(): string;
}

/**
 * Tenant entity: the team/organisation a request operates within.
 */
export interface Tenant {
  readonly id: TenantId;
  readonly name: string;
  readonly slug: string;
  readonly createdAt: Timestamp;
}

export const TenantRole = {
  OWNER: "owner",
  ADMIN: "admin",
  MEMBER: "member",
} as const;

export type TenantRole = (typeof TenantRole)[keyof typeof TenantRole];

/**
 * A caller's membership in a tenant. `joinedAt` orders the fallback choice:
 * the earliest membership wins, ties broken by tenant id.
 */
export interface Membership {
  readonly tenantId: TenantId;
  readonly userId: UserId;
  readonly role: TenantRole;
  readonly joinedAt: Timestamp;
}

/** Input for a tenant that does not exist yet */
export interface TenantDraft extends HasSlugSource {
  readonly name: string;
}

export const tenantDraft = (name: string): TenantDraft => ({
  name,
  slugSource: () => name,
});

/** Stable ordering used wherever "first membership" is meant */
export const compareMemberships = (a: Membership, b: Membership): number => {
  if (a.joinedAt !== b.joinedAt) return a.joinedAt - b.joinedAt;
  if (a.tenantId < b.tenantId) return -1;
  if (a.tenantId > b.tenantId) return 1;
  return 0;
};
