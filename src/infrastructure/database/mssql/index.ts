/**
 * SQL Server (mssql) adapters: barrel export.
 */

export { createMssqlSessionStore } from "./mssql-session-store.js";
export { createMssqlMembershipRepository } from "./mssql-membership.repository.js";
export { mssqlMigrateUp, mssqlMigrateDown } from "./migrations.js";
