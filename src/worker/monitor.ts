/**
 * Monitor: on-demand view of the stack.
 *
 * `status` probes every registered service once, concurrently, and records the
 * results. It never retries or waits. `logs` and `restart` hand straight through
 * to the execution environment.
 */

import type { ExecutionEnvironment, LogOptions } from "@/adapters/types";
import type { ServiceNode, StackStatus } from "@/domains/services/types";
import type { ServiceRegistry, StatusStore } from "@/domains/services";
import type { Logger } from "@/lib/logger";

import type { Probe } from "./health";

export interface MonitorDeps {
  registry: ServiceRegistry;
  environment: ExecutionEnvironment;
  statusStore: StatusStore;
  probeFor: (node: ServiceNode) => Probe;
  logger: Logger;
}

export interface Monitor {
  /** One probe pass over every service, in declaration order. */
  status: (signal?: AbortSignal) => Promise<StackStatus>;
  /** Last recorded status, without probing. */
  snapshot: () => StackStatus;
  /** @throws {UnknownServiceError} */
  logs: (name: string, options?: LogOptions) => AsyncIterable<string>;
  /** @throws {UnknownServiceError} */
  restart: (name: string) => Promise<void>;
}

export const createMonitor = (deps: MonitorDeps): Monitor => {
  const { registry, environment, statusStore, probeFor, logger } = deps;

  return {
    status: async (signal) => {
      const results = await Promise.all(registry.list().map((node) => probeFor(node)(signal)));
      for (const result of results) {
        statusStore.record(result);
      }
      logger.debug("Status pass complete", {
        healthy: results.filter((result) => result.state === "HEALTHY").length,
        total: results.length,
      });
      return statusStore.snapshot();
    },

    snapshot: () => statusStore.snapshot(),

    logs: (name, options) => environment.logs(registry.get(name), options),

    restart: async (name) => {
      const node = registry.get(name);
      logger.info("Restarting service", { service: name, container: node.container });
      await environment.restart(node);
    },
  };
};
