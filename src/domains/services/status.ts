/**
 * Per-run store of the last known health of every registered service.
 */

import type { ServiceRegistry } from "./registry";
import type { ProbeResult, ServiceStatus, StackStatus } from "./types";

export interface StatusStore {
  record: (result: ProbeResult) => void;
  get: (name: string) => ServiceStatus;
  snapshot: () => StackStatus;
}

const toStatus = (result: ProbeResult): ServiceStatus => ({
  state: result.state,
  checkedAt: result.checkedAt,
  ...(result.caveat !== undefined && { caveat: result.caveat }),
  ...(result.detail !== undefined && { detail: result.detail }),
  ...(result.statusCode !== undefined && { statusCode: result.statusCode }),
});

export const createStatusStore = (registry: ServiceRegistry): StatusStore => {
  const statuses = new Map<string, ServiceStatus>();
  for (const name of registry.names()) {
    statuses.set(name, { state: "UNKNOWN", checkedAt: null });
  }

  return {
    record: (result) => {
      // Throws for services outside the registry.
      registry.get(result.service);
      statuses.set(result.service, toStatus(result));
    },
    get: (name) => {
      registry.get(name);
      return statuses.get(name) ?? { state: "UNKNOWN", checkedAt: null };
    },
    snapshot: () => new Map(statuses),
  };
};
