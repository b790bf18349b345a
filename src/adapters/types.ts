/**
 * Execution environment: the container runtime services are started in.
 */

import type { RuntimeState, ServiceNode } from "@/domains/services/types";

export interface ExecResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface LogOptions {
  /** Number of trailing lines; all lines when absent. */
  tail?: number;
  follow?: boolean;
  signal?: AbortSignal;
}

export interface ExecutionEnvironment {
  /** Throws RuntimeUnavailableError when the runtime cannot be reached. */
  ping: () => Promise<void>;
  /** Start the given services without starting their dependencies. Throws ServiceStartError. */
  start: (nodes: readonly ServiceNode[]) => Promise<void>;
  inspect: (node: ServiceNode) => Promise<RuntimeState>;
  exec: (node: ServiceNode, command: readonly string[], signal?: AbortSignal) => Promise<ExecResult>;
  /** Log lines in order; ends when the stream ends or `signal` aborts. */
  logs: (node: ServiceNode, options?: LogOptions) => AsyncIterable<string>;
  restart: (node: ServiceNode) => Promise<void>;
}
