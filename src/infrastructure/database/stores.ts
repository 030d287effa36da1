import sql from "mssql";
import type { Logger } from "../../core/ports/logger.js";
import type { MembershipRepository } from "../../core/ports/membership.repository.js";
import type { SessionStore } from "../../core/ports/session-store.js";
import type { AppConfig } from "../config/config.js";
import { createInMemorySessionStore } from "../session/in-memory-session-store.js";
import { createInMemoryMembershipRepository } from "./in-memory-membership.repository.js";
import { migrateUp } from "./migrations/runner.js";
import {
  createMssqlMembershipRepository,
  createMssqlSessionStore,
  mssqlMigrateUp,
} from "./mssql/index.js";
import { createSqliteMembershipRepository } from "./sqlite-membership.repository.js";
import { createSqliteSessionStore } from "./sqlite-session-store.js";
import { openSqlite } from "./sqlite.js";

/** Storage the application runs on, whichever driver backs it */
export interface Stores {
  readonly sessions: SessionStore;
  readonly memberships: MembershipRepository;
  close(): Promise<void>;
}

const stores = (
  sessions: SessionStore,
  memberships: MembershipRepository,
  close: () => Promise<void>,
): Stores => ({ sessions, memberships, close });

/**
 * Open the configured store driver and bring its schema up to date.
 */
export const openStores = async (
  config: Pick<AppConfig, "store" | "session">,
  logger: Logger,
): Promise<Stores> => {
  const { driver } = config.store;
  const ttlMs = config.session.ttlMs;

  switch (driver) {
    case "memory": {
      logger.warn("Using in-memory stores; sessions and teams are lost on restart");
      return stores(
        createInMemorySessionStore({ ttlMs }),
        createInMemoryMembershipRepository(),
        async () => undefined,
      );
    }

    case "sqlite": {
      const db = openSqlite(config.store.path);
      logger.info("SQLite database opened", { path: config.store.path });
      migrateUp(db, logger);
      return stores(
        createSqliteSessionStore(db, ttlMs),
        createSqliteMembershipRepository(db),
        async () => {
          db.close();
        },
      );
    }

    case "mssql": {
      if (config.store.url === undefined) {
        throw new Error("DATABASE_URL is required when STORE_DRIVER=mssql");
      }
      const pool = await new sql.ConnectionPool(config.store.url).connect();
      logger.info("SQL Server pool connected");
      await mssqlMigrateUp(pool, logger);
      return stores(
        createMssqlSessionStore(pool, ttlMs),
        createMssqlMembershipRepository(pool),
        () => pool.close(),
      );
    }
  }
};
