/**
 * In-memory stand-in for the PostgreSQL catalog touched by bootstrap.
 *
 * Understands the statement shapes the bootstrap catalogue emits and keeps
 * roles, databases, schemas, grants and replication state in maps. Anything
 * else fails with a syntax error so a drifted statement shows up in tests.
 */

import type { DataStore, Statement, StoreResult } from "../../ports/data-store";

export interface RoleAttributes {
  login: boolean;
  superuser: boolean;
  createdb: boolean;
  createrole: boolean;
  replication: boolean;
  password: string | null;
}

interface DatabaseState {
  owner: string;
  schemas: Map<string, { owner: string }>;
  /** `schema:KIND:role` */
  defaultPrivileges: Set<string>;
  publications: Set<string>;
}

export interface CatalogStoreConfig {
  primaryDatabase: string;
  analyticsDatabase: string;
  /** Role the store connects as. */
  sessionUser?: string;
}

export interface CatalogStore extends DataStore {
  executed: () => readonly Statement[];
  role: (name: string) => RoleAttributes | undefined;
  hasDatabase: (name: string) => boolean;
  databaseOwner: (name: string) => string | undefined;
  hasSchema: (database: string, schema: string) => boolean;
  hasDatabaseGrant: (role: string, database: string) => boolean;
  hasSchemaGrant: (role: string, database: string, schema: string) => boolean;
  defaultPrivileges: (database: string) => readonly string[];
  publications: (database: string) => readonly string[];
  slots: () => readonly { name: string; active: boolean }[];
  /** Seed helpers for drifted or half-finished states. */
  seedRole: (name: string, attributes?: Partial<RoleAttributes>) => void;
  seedDatabase: (name: string, owner: string) => void;
  seedSlot: (name: string, active: boolean) => void;
  seedPublication: (database: string, name: string) => void;
  /** Simulate another session holding an advisory lock. */
  holdLockElsewhere: (key: number) => void;
  heldLocks: () => readonly number[];
  /** Fail the next statement containing `fragment`. */
  failOn: (fragment: string, error: { code: string; message: string }) => void;
  closed: () => boolean;
}

const rows = (...values: Record<string, unknown>[]): StoreResult => ({ ok: true, rows: values });

const fail = (code: string, message: string): StoreResult => ({ ok: false, error: { code, message } });

const likeToRegExp = (pattern: string): RegExp =>
  new RegExp(
    `^${pattern
      .split("%")
      .map((part) => part.replace(/[.*+?^${}()|[\]\\]/g, "\\$&").replaceAll("_", "."))
      .join(".*")}$`,
  );

const ROLE_FLAGS: Record<string, keyof Omit<RoleAttributes, "password">> = {
  rolcanlogin: "login",
  rolsuper: "superuser",
  rolcreatedb: "createdb",
  rolcreaterole: "createrole",
  rolreplication: "replication",
};

const ALTER_FLAGS: Record<string, [keyof Omit<RoleAttributes, "password">, boolean]> = {
  LOGIN: ["login", true],
  NOLOGIN: ["login", false],
  SUPERUSER: ["superuser", true],
  NOSUPERUSER: ["superuser", false],
  CREATEDB: ["createdb", true],
  NOCREATEDB: ["createdb", false],
  CREATEROLE: ["createrole", true],
  NOCREATEROLE: ["createrole", false],
  REPLICATION: ["replication", true],
  NOREPLICATION: ["replication", false],
};

const newRole = (attributes: Partial<RoleAttributes> = {}): RoleAttributes => ({
  login: false,
  superuser: false,
  createdb: false,
  createrole: false,
  replication: false,
  password: null,
  ...attributes,
});

const newDatabase = (owner: string): DatabaseState => ({
  owner,
  schemas: new Map([["public", { owner }]]),
  defaultPrivileges: new Set(),
  publications: new Set(),
});

type Handler = (match: RegExpMatchArray, database: string) => StoreResult;

export const createCatalogStore = (config: CatalogStoreConfig): CatalogStore => {
  const sessionUser = config.sessionUser ?? "postgres";
  const roles = new Map<string, RoleAttributes>([[sessionUser, newRole({ login: true, superuser: true })]]);
  const databases = new Map<string, DatabaseState>([[config.primaryDatabase, newDatabase(sessionUser)]]);
  const databaseGrants = new Set<string>();
  const schemaGrants = new Set<string>();
  const slots = new Map<string, { active: boolean }>();
  const ownLocks = new Set<number>();
  const foreignLocks = new Set<number>();
  const executed: Statement[] = [];
  const failures: { fragment: string; error: { code: string; message: string } }[] = [];
  let isClosed = false;

  const missingRole = (name: string): StoreResult => fail("42704", `role "${name}" does not exist`);

  const dropOwned = (role: string): void => {
    for (const key of [...databaseGrants]) {
      if (key.startsWith(`${role}@`)) databaseGrants.delete(key);
    }
    for (const key of [...schemaGrants]) {
      if (key.startsWith(`${role}@`)) schemaGrants.delete(key);
    }
    for (const state of databases.values()) {
      for (const [schema, info] of [...state.schemas]) {
        if (info.owner === role) state.schemas.delete(schema);
      }
      for (const entry of [...state.defaultPrivileges]) {
        if (entry.endsWith(`:${role}`)) state.defaultPrivileges.delete(entry);
      }
    }
  };

  const handlers: [RegExp, Handler][] = [
    [
      /^SELECT pg_try_advisory_lock\((\d+)\) AS acquired$/,
      ([, key]) => {
        const lock = Number(key);
        if (foreignLocks.has(lock)) {
          return rows({ acquired: false });
        }
        ownLocks.add(lock);
        return rows({ acquired: true });
      },
    ],
    [/^SELECT pg_advisory_unlock\((\d+)\) AS released$/, ([, key]) => rows({ released: ownLocks.delete(Number(key)) })],
    [
      /^DO \$\$ BEGIN IF NOT EXISTS \(SELECT 1 FROM pg_catalog\.pg_roles WHERE rolname = '([^']+)'\) THEN CREATE ROLE "[^"]+" LOGIN; END IF; END \$\$$/,
      ([, name = ""]) => {
        if (!roles.has(name)) {
          roles.set(name, newRole({ login: true }));
        }
        return rows();
      },
    ],
    [
      /^ALTER ROLE "([^"]+)" WITH ([A-Z ]+?) PASSWORD '((?:[^']|'')*)'$/,
      ([, name = "", flags = "", password = ""]) => {
        const role = roles.get(name);
        if (!role) return missingRole(name);
        for (const flag of flags.split(" ")) {
          const entry = ALTER_FLAGS[flag];
          if (!entry) return fail("42601", `syntax error at or near "${flag}"`);
          role[entry[0]] = entry[1];
        }
        role.password = password.replaceAll("''", "'");
        return rows();
      },
    ],
    [
      /^SELECT 1 FROM pg_catalog\.pg_roles WHERE rolname = '([^']+)'((?: AND \w+)*)$/,
      ([, name = "", conditions = ""]) => {
        const role = roles.get(name);
        if (!role) return rows();
        const flags = conditions.split(" AND ").filter((part) => part.length > 0);
        return flags.every((flag) => {
          const attribute = ROLE_FLAGS[flag.trim()];
          return attribute !== undefined && role[attribute];
        })
          ? rows({ "?column?": 1 })
          : rows();
      },
    ],
    [
      /^SELECT pg_terminate_backend\(pid\) FROM pg_catalog\.pg_stat_activity WHERE usename = '([^']+)' AND pid <> pg_backend_pid\(\)$/,
      () => rows(),
    ],
    [
      /^DO \$\$ BEGIN IF EXISTS \(SELECT 1 FROM pg_catalog\.pg_roles WHERE rolname = '([^']+)'\) THEN EXECUTE 'REASSIGN OWNED BY "[^"]+" TO "([^"]+)"'; EXECUTE 'DROP OWNED BY "[^"]+"'; END IF; END \$\$$/,
      ([, name = "", successor = ""]) => {
        if (!roles.has(name)) return rows();
        if (!roles.has(successor)) return missingRole(successor);
        for (const state of databases.values()) {
          if (state.owner === name) state.owner = successor;
          for (const info of state.schemas.values()) {
            if (info.owner === name) info.owner = successor;
          }
        }
        dropOwned(name);
        return rows();
      },
    ],
    [
      /^DROP ROLE IF EXISTS "([^"]+)"$/,
      ([, name = ""]) => {
        if (!roles.has(name)) return rows();
        const owned = [...databases.entries()].find(([, state]) => state.owner === name);
        if (owned) {
          return fail("2BP01", `role "${name}" cannot be dropped because some objects depend on it`);
        }
        dropOwned(name);
        roles.delete(name);
        return rows();
      },
    ],
    [
      /^SELECT 1 WHERE has_database_privilege\('([^']+)', '([^']+)', '[A-Z, ]+'\)$/,
      ([, role = "", database = ""]) => {
        const attributes = roles.get(role);
        if (!attributes) return missingRole(role);
        const state = databases.get(database);
        if (!state) return fail("3D000", `database "${database}" does not exist`);
        const granted = attributes.superuser || state.owner === role || databaseGrants.has(`${role}@${database}`);
        return granted ? rows({ "?column?": 1 }) : rows();
      },
    ],
    [
      /^SELECT 1 FROM pg_catalog\.pg_database WHERE datname = '([^']+)'$/,
      ([, name = ""]) => (databases.has(name) ? rows({ "?column?": 1 }) : rows()),
    ],
    [
      /^CREATE DATABASE "([^"]+)" OWNER "([^"]+)"$/,
      ([, name = "", owner = ""]) => {
        if (databases.has(name)) return fail("42P04", `database "${name}" already exists`);
        if (!roles.has(owner)) return missingRole(owner);
        databases.set(name, newDatabase(owner));
        return rows();
      },
    ],
    [
      /^GRANT ALL PRIVILEGES ON DATABASE "([^"]+)" TO "([^"]+)"$/,
      ([, database = "", role = ""]) => {
        if (!databases.has(database)) return fail("3D000", `database "${database}" does not exist`);
        if (!roles.has(role)) return missingRole(role);
        databaseGrants.add(`${role}@${database}`);
        return rows();
      },
    ],
    [
      /^DROP DATABASE IF EXISTS "([^"]+)" WITH \(FORCE\)$/,
      ([, name = ""]) => {
        databases.delete(name);
        for (const key of [...schemaGrants]) {
          if (key.includes(`@${name}.`)) schemaGrants.delete(key);
        }
        for (const key of [...databaseGrants]) {
          if (key.endsWith(`@${name}`)) databaseGrants.delete(key);
        }
        return rows();
      },
    ],
    [
      /^SELECT 1 FROM pg_catalog\.pg_namespace WHERE nspname = '([^']+)'$/,
      ([, schema = ""], database) => (databases.get(database)?.schemas.has(schema) ? rows({ "?column?": 1 }) : rows()),
    ],
    [
      /^CREATE SCHEMA IF NOT EXISTS "([^"]+)" AUTHORIZATION "([^"]+)"$/,
      ([, schema = "", owner = ""], database) => {
        const state = databases.get(database);
        if (!state) return fail("3D000", `database "${database}" does not exist`);
        if (!roles.has(owner)) return missingRole(owner);
        if (!state.schemas.has(schema)) state.schemas.set(schema, { owner });
        return rows();
      },
    ],
    [
      /^GRANT ALL ON (SCHEMA|ALL TABLES IN SCHEMA|ALL SEQUENCES IN SCHEMA) "([^"]+)" TO "([^"]+)"$/,
      ([, kind = "", schema = "", role = ""], database) => {
        const state = databases.get(database);
        if (!state?.schemas.has(schema)) return fail("3F000", `schema "${schema}" does not exist`);
        if (!roles.has(role)) return missingRole(role);
        if (kind === "SCHEMA") schemaGrants.add(`${role}@${database}.${schema}`);
        return rows();
      },
    ],
    [
      /^SELECT 1 WHERE has_schema_privilege\('([^']+)', '([^']+)', '[A-Z, ]+'\)$/,
      ([, role = "", schema = ""], database) => {
        const attributes = roles.get(role);
        if (!attributes) return missingRole(role);
        const info = databases.get(database)?.schemas.get(schema);
        if (!info) return fail("3F000", `schema "${schema}" does not exist`);
        const granted =
          attributes.superuser || info.owner === role || schemaGrants.has(`${role}@${database}.${schema}`);
        return granted ? rows({ "?column?": 1 }) : rows();
      },
    ],
    [
      /^ALTER DEFAULT PRIVILEGES IN SCHEMA "([^"]+)" GRANT ALL ON (TABLES|SEQUENCES|FUNCTIONS) TO "([^"]+)"$/,
      ([, schema = "", kind = "", role = ""], database) => {
        const state = databases.get(database);
        if (!state?.schemas.has(schema)) return fail("3F000", `schema "${schema}" does not exist`);
        if (!roles.has(role)) return missingRole(role);
        state.defaultPrivileges.add(`${schema}:${kind}:${role}`);
        return rows();
      },
    ],
    [
      /^SELECT 1 WHERE NOT EXISTS \(SELECT 1 FROM pg_catalog\.pg_replication_slots WHERE slot_name LIKE '([^']+)' AND NOT active\)$/,
      ([, pattern = ""]) => {
        const like = likeToRegExp(pattern);
        const stale = [...slots].some(([name, slot]) => like.test(name) && !slot.active);
        return stale ? rows() : rows({ "?column?": 1 });
      },
    ],
    [
      /^SELECT pg_drop_replication_slot\(slot_name\) FROM pg_catalog\.pg_replication_slots WHERE slot_name LIKE '([^']+)' AND NOT active$/,
      ([, pattern = ""]) => {
        const like = likeToRegExp(pattern);
        const dropped = [...slots].filter(([name, slot]) => like.test(name) && !slot.active);
        for (const [name] of dropped) slots.delete(name);
        return rows(...dropped.map(() => ({ pg_drop_replication_slot: "" })));
      },
    ],
    [
      /^SELECT 1 WHERE NOT EXISTS \(SELECT 1 FROM pg_catalog\.pg_publication WHERE pubname LIKE '([^']+)'\) OR EXISTS \(SELECT 1 FROM pg_catalog\.pg_replication_slots WHERE slot_name LIKE '[^']+' AND active\)$/,
      ([, pattern = ""], database) => {
        const like = likeToRegExp(pattern);
        const hasPublication = [...(databases.get(database)?.publications ?? [])].some((name) => like.test(name));
        const hasActiveSlot = [...slots].some(([name, slot]) => like.test(name) && slot.active);
        return !hasPublication || hasActiveSlot ? rows({ "?column?": 1 }) : rows();
      },
    ],
    [
      /^DO \$\$ DECLARE pub TEXT; BEGIN FOR pub IN SELECT pubname FROM pg_catalog\.pg_publication WHERE pubname LIKE '([^']+)' LOOP/,
      ([, pattern = ""], database) => {
        const like = likeToRegExp(pattern);
        const state = databases.get(database);
        for (const name of [...(state?.publications ?? [])]) {
          if (like.test(name)) state?.publications.delete(name);
        }
        return rows();
      },
    ],
  ];

  const run = (statement: Statement): StoreResult => {
    const database = statement.target === "primary" ? config.primaryDatabase : config.analyticsDatabase;
    if (!databases.has(database)) {
      return fail("3D000", `database "${database}" does not exist`);
    }
    for (const [pattern, handler] of handlers) {
      const match = statement.sql.match(pattern);
      if (match) {
        return handler(match, database);
      }
    }
    return fail("42601", `syntax error in statement: ${statement.sql.slice(0, 60)}`);
  };

  return {
    execute: async (statement: Statement): Promise<StoreResult> => {
      executed.push(statement);
      if (isClosed) {
        return fail("08003", "connection does not exist");
      }
      const failureIndex = failures.findIndex((failure) => statement.sql.includes(failure.fragment));
      const failure = failures[failureIndex];
      if (failure) {
        failures.splice(failureIndex, 1);
        return { ok: false, error: failure.error };
      }
      return run(statement);
    },

    close: async (): Promise<void> => {
      isClosed = true;
      ownLocks.clear();
    },

    executed: () => executed,
    role: (name) => {
      const role = roles.get(name);
      return role ? { ...role } : undefined;
    },
    hasDatabase: (name) => databases.has(name),
    databaseOwner: (name) => databases.get(name)?.owner,
    hasSchema: (database, schema) => databases.get(database)?.schemas.has(schema) ?? false,
    hasDatabaseGrant: (role, database) => databaseGrants.has(`${role}@${database}`),
    hasSchemaGrant: (role, database, schema) => schemaGrants.has(`${role}@${database}.${schema}`),
    defaultPrivileges: (database) => [...(databases.get(database)?.defaultPrivileges ?? [])].sort(),
    publications: (database) => [...(databases.get(database)?.publications ?? [])],
    slots: () => [...slots].map(([name, slot]) => ({ name, active: slot.active })),
    seedRole: (name, attributes) => {
      roles.set(name, newRole(attributes));
    },
    seedDatabase: (name, owner) => {
      databases.set(name, newDatabase(owner));
    },
    seedSlot: (name, active) => {
      slots.set(name, { active });
    },
    seedPublication: (database, name) => {
      databases.get(database)?.publications.add(name);
    },
    holdLockElsewhere: (key) => {
      foreignLocks.add(key);
    },
    heldLocks: () => [...ownLocks],
    failOn: (fragment, error) => {
      failures.push({ fragment, error });
    },
    closed: () => isClosed,
  };
};
