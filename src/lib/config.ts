import type { StackDefinition } from "@/domains/services/definition";

import type { Env } from "./env/env";
import type { LogFormat, LogLevel } from "./logger/schema";

type DeepReadonly<T> = T extends readonly (infer U)[]
  ? readonly DeepReadonly<U>[]
  : T extends object
    ? { readonly [K in keyof T]: DeepReadonly<T[K]> }
    : T;

export interface StoreConnection {
  host: string;
  port: number;
  user: string;
  password: string;
  /** Primary database; bootstrap connects here first. */
  database: string;
}

export interface BootstrapNames {
  adminRole: string;
  adminPassword: string;
  analyticsDatabase: string;
  analyticsSchema: string;
  /** LIKE pattern for the analytics service's replication slots and publications. */
  replicationPattern: string;
  /** Key for `pg_try_advisory_lock`, shared by every bootstrap run against the store. */
  lockKey: number;
}

export type StackConfig = DeepReadonly<{
  nodeEnv: Env["NODE_ENV"];
  compose: {
    file: string;
    projectDir: string;
  };
  store: StoreConnection;
  bootstrap: BootstrapNames;
  logging: {
    level: LogLevel;
    format: LogFormat;
  };
  server: {
    port: number;
  };
}> & {
  /** Frozen as well; its own types are already read-only. */
  readonly stack: StackDefinition;
};

const BOOTSTRAP_LOCK_KEY = 740_021;

const deepFreeze = <T>(value: T): T => {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
    Object.freeze(value);
  }
  return value;
};

/**
 * Build the single configuration object handed to every component. Nothing
 * downstream reads `process.env`.
 */
export const createStackConfig = (
  env: Env,
  stack: StackDefinition,
  options: { cwd?: string } = {},
): StackConfig =>
  deepFreeze({
    nodeEnv: env.NODE_ENV,
    compose: {
      file: env.COMPOSE_FILE,
      projectDir: env.COMPOSE_PROJECT_DIR ?? options.cwd ?? process.cwd(),
    },
    store: {
      host: env.POSTGRES_HOST,
      port: env.POSTGRES_PORT,
      user: env.POSTGRES_USER,
      password: env.POSTGRES_PASSWORD,
      database: env.POSTGRES_DB,
    },
    bootstrap: {
      adminRole: "supabase_admin",
      adminPassword: env.POSTGRES_PASSWORD,
      analyticsDatabase: "_supabase",
      analyticsSchema: "_analytics",
      replicationPattern: "%logflare%",
      lockKey: BOOTSTRAP_LOCK_KEY,
    },
    stack: {
      services: stack.services.map((node) => ({ ...node, dependsOn: [...node.dependsOn] })),
      caveats: stack.caveats.map((caveat) => ({ ...caveat })),
      storeService: stack.storeService,
    },
    logging: {
      level: env.LOG_LEVEL ?? "info",
      format: env.LOG_FORMAT ?? (env.NODE_ENV === "production" ? "json" : "pretty"),
    },
    server: {
      port: env.STATUS_PORT,
    },
  });
