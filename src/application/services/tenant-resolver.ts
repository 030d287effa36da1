import {
  type Membership,
  type Tenant,
  compareMemberships,
} from "../../core/entities/tenant.entity.js";
import type { AppError } from "../../core/errors/app-error.js";
import type { Logger } from "../../core/ports/logger.js";
import type { MembershipRepository } from "../../core/ports/membership.repository.js";
import { type SessionHandle, SessionKey } from "../../core/ports/session-store.js";
import { type TenantId, type UserId, brand } from "../../core/types/brand.js";
import { type Result, ok } from "../../core/types/result.js";
import type { NotificationQueue } from "./notification-queue.js";

export const TENANT_SETUP_MESSAGE = "Let's set up your team first.";

/**
 * Where the active tenant of a request came from.
 * `NoTenant` is the state before resolution; every resolve ends in one of the others.
 */
export type TenantState =
  | { readonly kind: "NoTenant" }
  | { readonly kind: "TenantFromUrl"; readonly tenant: Tenant }
  | { readonly kind: "TenantFromSession"; readonly tenant: Tenant }
  | { readonly kind: "TenantFromFallback"; readonly tenant: Tenant }
  | {
      readonly kind: "Blocked";
      /** Set when the endpoint cannot run without a tenant */
      readonly redirectTo: string | null;
    };

export type BoundTenantState = Extract<TenantState, { tenant: Tenant }>;

/** What a handler receives once a tenant is bound */
export interface TenantContext {
  readonly tenant: Tenant;
  readonly source: BoundTenantState["kind"];
}

export interface ResolveInput {
  readonly userId: UserId;
  readonly urlTenantId?: string | null | undefined;
  readonly session: SessionHandle;
  readonly notifications: NotificationQueue;
  readonly mandatory: boolean;
}

export interface TenantResolver {
  resolve(input: ResolveInput): Promise<Result<TenantState, AppError>>;
  /** Store the active tenant; returns false when it was already stored */
  persist(session: SessionHandle, tenantId: TenantId): Promise<Result<boolean, AppError>>;
}

interface Deps {
  readonly memberships: MembershipRepository;
  readonly tenantCreateUrl: string;
  readonly logger: Logger;
}

export const isBound = (state: TenantState): state is BoundTenantState => "tenant" in state;

export const toTenantContext = (state: BoundTenantState): TenantContext => ({
  tenant: state.tenant,
  source: state.kind,
});

const readTenantId = (value: unknown): TenantId | null =>
  typeof value === "string" && value.length > 0 ? brand<string, "TenantId">(value) : null;

export const createTenantResolver = (deps: Deps): TenantResolver => {
  const { memberships, tenantCreateUrl, logger } = deps;

  const writeIfChanged = async (
    session: SessionHandle,
    tenantId: TenantId,
    current: TenantId | null,
  ): Promise<Result<boolean, AppError>> => {
    if (current === tenantId) return ok(false);
    const written = await session.set(SessionKey.TENANT_ID, tenantId);
    return written.ok ? ok(true) : written;
  };

  /** A membership counts only while its tenant still exists */
  const loadIfMember = async (
    userId: UserId,
    tenantId: TenantId,
  ): Promise<Result<Tenant | null, AppError>> => {
    const member = await memberships.isMember(userId, tenantId);
    if (!member.ok) return member;
    if (!member.value) return ok(null);
    return memberships.findTenant(tenantId);
  };

  const firstMembership = async (
    userId: UserId,
  ): Promise<Result<{ membership: Membership; tenant: Tenant } | null, AppError>> => {
    const listed = await memberships.listMemberships(userId);
    if (!listed.ok) return listed;
    for (const membership of [...listed.value].sort(compareMemberships)) {
      const tenant = await memberships.findTenant(membership.tenantId);
      if (!tenant.ok) return tenant;
      if (tenant.value) return ok({ membership, tenant: tenant.value });
    }
    return ok(null);
  };

  return {
    // biome-ignore lint/complexity/noExcessiveCognitiveComplexity: resolution walks four ordered sources
    async resolve(input: ResolveInput): Promise<Result<TenantState, AppError>> {
      const { userId, session, notifications, mandatory } = input;

      const stored = await session.get(SessionKey.TENANT_ID);
      if (!stored.ok) return stored;
      const sessionTenantId = readTenantId(stored.value);

      // 1. Tenant named in the URL
      const urlTenantId = readTenantId(input.urlTenantId);
      if (urlTenantId !== null) {
        const tenant = await loadIfMember(userId, urlTenantId);
        if (!tenant.ok) return tenant;
        if (tenant.value) {
          const persisted = await writeIfChanged(session, urlTenantId, sessionTenantId);
          if (!persisted.ok) return persisted;
          return ok({ kind: "TenantFromUrl", tenant: tenant.value });
        }
      }

      // 2. Tenant remembered in the session, if still a member
      if (sessionTenantId !== null) {
        const tenant = await loadIfMember(userId, sessionTenantId);
        if (!tenant.ok) return tenant;
        if (tenant.value) {
          return ok({ kind: "TenantFromSession", tenant: tenant.value });
        }
      }

      // 3. Earliest membership
      const first = await firstMembership(userId);
      if (!first.ok) return first;
      if (first.value) {
        const { membership, tenant } = first.value;
        const persisted = await writeIfChanged(session, membership.tenantId, sessionTenantId);
        if (!persisted.ok) return persisted;
        logger.debug("Tenant fell back to first membership", {
          userId,
          tenantId: membership.tenantId,
          staleTenantId: sessionTenantId,
        });
        return ok({ kind: "TenantFromFallback", tenant });
      }

      // 4. No membership at all
      if (mandatory) {
        notifications.info(TENANT_SETUP_MESSAGE);
        return ok({ kind: "Blocked", redirectTo: tenantCreateUrl });
      }
      if (sessionTenantId !== null) {
        const removed = await session.delete(SessionKey.TENANT_ID);
        if (!removed.ok) return removed;
      }
      return ok({ kind: "Blocked", redirectTo: null });
    },

    async persist(session: SessionHandle, tenantId: TenantId): Promise<Result<boolean, AppError>> {
      const stored = await session.get(SessionKey.TENANT_ID);
      if (!stored.ok) return stored;
      return writeIfChanged(session, tenantId, readTenantId(stored.value));
    },
  };
};
