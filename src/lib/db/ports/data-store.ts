/**
 * Statement-level access to the stack's PostgreSQL store.
 */

export type StoreTarget = "primary" | "analytics";

export interface Statement {
  /** Database the statement runs in. */
  target: StoreTarget;
  sql: string;
}

export interface StoreError {
  /** SQLSTATE for server errors, errno-style code for connection errors. */
  code: string;
  message: string;
}

export type StoreResult =
  | { ok: true; rows: readonly Record<string, unknown>[] }
  | { ok: false; error: StoreError };

export interface DataStore {
  /** Never throws; failures come back as `{ ok: false }`. */
  execute: (statement: Statement) => Promise<StoreResult>;
  close: () => Promise<void>;
}
