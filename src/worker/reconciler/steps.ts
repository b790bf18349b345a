/**
 * Bootstrap step catalogue for the shared PostgreSQL store.
 *
 * The analytics service needs an admin role, its own database and schema with
 * privileges, and no leftover replication state from an earlier run.
 */

import type { BootstrapNames } from "@/lib/config";
import type { Statement, StoreTarget } from "@/lib/db/ports/data-store";

import type { BootstrapStep } from "./types";

export const quoteIdent = (name: string): string => `"${name.replaceAll('"', '""')}"`;

export const quoteLiteral = (value: string): string => `'${value.replaceAll("'", "''")}'`;

const on = (target: StoreTarget, sql: string): Statement => ({ target, sql });

export interface CatalogueOptions extends BootstrapNames {
  /** Database the bring-up connects to first. */
  primaryDatabase: string;
  /** Role that takes over objects of the admin role on repair. */
  ownerRole: string;
}

export const createBootstrapSteps = (options: CatalogueOptions): readonly BootstrapStep[] => {
  const role = quoteIdent(options.adminRole);
  const roleName = quoteLiteral(options.adminRole);
  const analyticsDb = quoteIdent(options.analyticsDatabase);
  const analyticsDbName = quoteLiteral(options.analyticsDatabase);
  const primaryDb = quoteIdent(options.primaryDatabase);
  const primaryDbName = quoteLiteral(options.primaryDatabase);
  const schema = quoteIdent(options.analyticsSchema);
  const schemaName = quoteLiteral(options.analyticsSchema);
  const pattern = quoteLiteral(options.replicationPattern);

  const roleExists = on("primary", `SELECT 1 FROM pg_catalog.pg_roles WHERE rolname = ${roleName}`);

  return [
    {
      id: "ensure-admin-role",
      description: `Create ${options.adminRole} and re-assert its attributes and password`,
      action: [
        on(
          "primary",
          `DO $$ BEGIN IF NOT EXISTS (SELECT 1 FROM pg_catalog.pg_roles WHERE rolname = ${roleName}) THEN CREATE ROLE ${role} LOGIN; END IF; END $$`,
        ),
        on(
          "primary",
          `ALTER ROLE ${role} WITH LOGIN SUPERUSER CREATEDB CREATEROLE REPLICATION PASSWORD ${quoteLiteral(options.adminPassword)}`,
        ),
      ],
      postcondition: on(
        "primary",
        `SELECT 1 FROM pg_catalog.pg_roles WHERE rolname = ${roleName} AND rolcanlogin AND rolsuper AND rolcreatedb AND rolcreaterole AND rolreplication`,
      ),
      reset: [
        on(
          "primary",
          `SELECT pg_terminate_backend(pid) FROM pg_catalog.pg_stat_activity WHERE usename = ${roleName} AND pid <> pg_backend_pid()`,
        ),
        on(
          "primary",
          `DO $$ BEGIN IF EXISTS (SELECT 1 FROM pg_catalog.pg_roles WHERE rolname = ${roleName}) THEN EXECUTE 'REASSIGN OWNED BY ${role} TO ${quoteIdent(options.ownerRole)}'; EXECUTE 'DROP OWNED BY ${role}'; END IF; END $$`,
        ),
        on("primary", `DROP ROLE IF EXISTS ${role}`),
      ],
    },
    {
      id: "grant-primary-database",
      description: `Grant ${options.adminRole} all privileges on ${options.primaryDatabase}`,
      precondition: roleExists,
      satisfied: on(
        "primary",
        `SELECT 1 WHERE has_database_privilege(${roleName}, ${primaryDbName}, 'CREATE, CONNECT, TEMPORARY')`,
      ),
      action: [on("primary", `GRANT ALL PRIVILEGES ON DATABASE ${primaryDb} TO ${role}`)],
    },
    {
      id: "ensure-analytics-database",
      description: `Create the ${options.analyticsDatabase} database`,
      precondition: roleExists,
      satisfied: on("primary", `SELECT 1 FROM pg_catalog.pg_database WHERE datname = ${analyticsDbName}`),
      action: [on("primary", `CREATE DATABASE ${analyticsDb} OWNER ${role}`)],
      postcondition: on("primary", `SELECT 1 FROM pg_catalog.pg_database WHERE datname = ${analyticsDbName}`),
      reset: [on("primary", `DROP DATABASE IF EXISTS ${analyticsDb} WITH (FORCE)`)],
    },
    {
      id: "grant-analytics-database",
      description: `Grant ${options.adminRole} all privileges on ${options.analyticsDatabase}`,
      precondition: on("primary", `SELECT 1 FROM pg_catalog.pg_database WHERE datname = ${analyticsDbName}`),
      satisfied: on(
        "primary",
        `SELECT 1 WHERE has_database_privilege(${roleName}, ${analyticsDbName}, 'CREATE, CONNECT, TEMPORARY')`,
      ),
      action: [on("primary", `GRANT ALL PRIVILEGES ON DATABASE ${analyticsDb} TO ${role}`)],
    },
    {
      id: "ensure-analytics-schema",
      description: `Create the ${options.analyticsSchema} schema in ${options.analyticsDatabase}`,
      satisfied: on("analytics", `SELECT 1 FROM pg_catalog.pg_namespace WHERE nspname = ${schemaName}`),
      action: [on("analytics", `CREATE SCHEMA IF NOT EXISTS ${schema} AUTHORIZATION ${role}`)],
      postcondition: on("analytics", `SELECT 1 FROM pg_catalog.pg_namespace WHERE nspname = ${schemaName}`),
    },
    {
      id: "grant-schema-privileges",
      description: `Grant ${options.adminRole} all privileges in ${options.analyticsSchema}`,
      action: [
        on("analytics", `GRANT ALL ON SCHEMA ${schema} TO ${role}`),
        on("analytics", `GRANT ALL ON ALL TABLES IN SCHEMA ${schema} TO ${role}`),
        on("analytics", `GRANT ALL ON ALL SEQUENCES IN SCHEMA ${schema} TO ${role}`),
      ],
      postcondition: on("analytics", `SELECT 1 WHERE has_schema_privilege(${roleName}, ${schemaName}, 'USAGE, CREATE')`),
    },
    {
      id: "default-privileges",
      description: `Default privileges for new objects in ${options.analyticsSchema}`,
      action: [
        on("analytics", `ALTER DEFAULT PRIVILEGES IN SCHEMA ${schema} GRANT ALL ON TABLES TO ${role}`),
        on("analytics", `ALTER DEFAULT PRIVILEGES IN SCHEMA ${schema} GRANT ALL ON SEQUENCES TO ${role}`),
        on("analytics", `ALTER DEFAULT PRIVILEGES IN SCHEMA ${schema} GRANT ALL ON FUNCTIONS TO ${role}`),
      ],
    },
    {
      id: "drop-stale-replication-slots",
      description: "Drop inactive analytics replication slots",
      satisfied: on(
        "primary",
        `SELECT 1 WHERE NOT EXISTS (SELECT 1 FROM pg_catalog.pg_replication_slots WHERE slot_name LIKE ${pattern} AND NOT active)`,
      ),
      action: [
        on(
          "primary",
          `SELECT pg_drop_replication_slot(slot_name) FROM pg_catalog.pg_replication_slots WHERE slot_name LIKE ${pattern} AND NOT active`,
        ),
      ],
    },
    {
      id: "drop-stale-publications",
      description: "Drop analytics publications left behind by an earlier run",
      satisfied: on(
        "analytics",
        `SELECT 1 WHERE NOT EXISTS (SELECT 1 FROM pg_catalog.pg_publication WHERE pubname LIKE ${pattern}) OR EXISTS (SELECT 1 FROM pg_catalog.pg_replication_slots WHERE slot_name LIKE ${pattern} AND active)`,
      ),
      action: [
        on(
          "analytics",
          `DO $$ DECLARE pub TEXT; BEGIN FOR pub IN SELECT pubname FROM pg_catalog.pg_publication WHERE pubname LIKE ${pattern} LOOP EXECUTE 'DROP PUBLICATION IF EXISTS ' || quote_ident(pub); END LOOP; END $$`,
        ),
      ],
    },
  ];
};

export const advisoryLockStatement = (lockKey: number): Statement =>
  on("primary", `SELECT pg_try_advisory_lock(${lockKey}) AS acquired`);

export const advisoryUnlockStatement = (lockKey: number): Statement =>
  on("primary", `SELECT pg_advisory_unlock(${lockKey}) AS released`);
