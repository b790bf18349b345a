import { sql } from "drizzle-orm";
import * as v from "valibot";

import type { StoreConnection } from "../../../config";
import { type DatabaseInstance, createDatabase } from "../../client";
import type { DataStore, Statement, StoreError, StoreResult, StoreTarget } from "../../ports/data-store";

const errorShapeSchema = v.object({
  code: v.string(),
  message: v.string(),
});

/**
 * Map a driver failure to `{ code, message }`, following `cause` links to the
 * first error that carries a code.
 */
export const toStoreError = (error: unknown): StoreError => {
  let current: unknown = error;
  for (let depth = 0; depth < 5 && current !== undefined; depth++) {
    if (v.is(errorShapeSchema, current)) {
      return { code: current.code, message: current.message };
    }
    current = current instanceof Error ? current.cause : undefined;
  }
  return { code: "UNKNOWN", message: error instanceof Error ? error.message : String(error) };
};

export interface PostgresDataStoreConfig {
  connection: StoreConnection;
  /** Database behind the `analytics` target. */
  analyticsDatabase: string;
}

/**
 * One single-connection client per target database, opened on first use.
 */
export const createPostgresDataStore = (config: PostgresDataStoreConfig): DataStore => {
  const databases = new Map<StoreTarget, DatabaseInstance>();

  const databaseFor = (target: StoreTarget): DatabaseInstance => {
    const existing = databases.get(target);
    if (existing) {
      return existing;
    }
    const name = target === "primary" ? config.connection.database : config.analyticsDatabase;
    const instance = createDatabase(config.connection, name);
    databases.set(target, instance);
    return instance;
  };

  return {
    execute: async (statement: Statement): Promise<StoreResult> => {
      try {
        const rows = await databaseFor(statement.target).db.execute<Record<string, unknown>>(sql.raw(statement.sql));
        return { ok: true, rows: Array.from(rows) };
      } catch (error) {
        return { ok: false, error: toStoreError(error) };
      }
    },

    close: async (): Promise<void> => {
      const open = [...databases.values()];
      databases.clear();
      await Promise.all(open.map((instance) => instance.close()));
    },
  };
};
