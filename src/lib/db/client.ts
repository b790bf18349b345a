import { drizzle } from "drizzle-orm/postgres-js";
import postgres from "postgres";

import type { StoreConnection } from "../config";

export const createDatabaseClient = (connection: StoreConnection, database: string) =>
  postgres({
    host: connection.host,
    port: connection.port,
    user: connection.user,
    password: connection.password,
    database,
    // Session state (advisory locks) must stay on one connection.
    max: 1,
    idle_timeout: 20,
    connect_timeout: 10,
    onnotice: () => undefined,
  });

const createDrizzle = (client: ReturnType<typeof createDatabaseClient>) => drizzle(client);

export type Database = ReturnType<typeof createDrizzle>;

export interface DatabaseInstance {
  db: Database;
  close: () => Promise<void>;
}

export const createDatabase = (connection: StoreConnection, database: string): DatabaseInstance => {
  const postgresClient = createDatabaseClient(connection, database);

  return {
    db: createDrizzle(postgresClient),
    close: async (): Promise<void> => {
      await postgresClient.end();
    },
  };
};
