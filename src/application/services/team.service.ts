import { type Tenant, tenantDraft } from "../../core/entities/tenant.entity.js";
import type { AppError } from "../../core/errors/app-error.js";
import type { Logger } from "../../core/ports/logger.js";
import type { MembershipRepository } from "../../core/ports/membership.repository.js";
import type { UserId } from "../../core/types/brand.js";
import { type Result, ok } from "../../core/types/result.js";
import type { CreateTeamDto } from "../dtos/team.dto.js";

/** Template-facing projection of a tenant */
export interface TeamView {
  readonly id: string;
  readonly name: string;
  readonly slug: string;
}

export const toTeamView = (t: Tenant): TeamView => ({ id: t.id, name: t.name, slug: t.slug });

export interface TeamService {
  /** Teams of a caller, earliest joined first */
  listTeams(userId: UserId): Promise<Result<readonly TeamView[], AppError>>;
  create(ownerId: UserId, dto: CreateTeamDto): Promise<Result<Tenant, AppError>>;
}

interface Deps {
  readonly memberships: MembershipRepository;
  readonly logger: Logger;
}

export const createTeamService = (deps: Deps): TeamService => {
  const { memberships, logger } = deps;

  return {
    async listTeams(userId: UserId): Promise<Result<readonly TeamView[], AppError>> {
      const listed = await memberships.listMemberships(userId);
      if (!listed.ok) return listed;

      const teams: TeamView[] = [];
      for (const membership of listed.value) {
        const tenant = await memberships.findTenant(membership.tenantId);
        if (!tenant.ok) return tenant;
        if (tenant.value) teams.push(toTeamView(tenant.value));
      }
      return ok(teams);
    },

    async create(ownerId: UserId, dto: CreateTeamDto): Promise<Result<Tenant, AppError>> {
      const created = await memberships.createTenant(tenantDraft(dto.name), ownerId);
      if (!created.ok) {
        logger.error("Team creation failed", { ownerId, code: created.error.code });
        return created;
      }
      logger.info("Team created", { tenantId: created.value.id, slug: created.value.slug, ownerId });
      return created;
    },
  };
};
