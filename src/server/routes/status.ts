import { Hono } from "hono";

import type { ServiceRegistry } from "@/domains/services";
import type { HealthState, StackStatus } from "@/domains/services/types";
import type { Monitor } from "@/worker/monitor";

export interface ServiceStatusBody {
  service: string;
  state: HealthState;
  mandatory: boolean;
  checkedAt: string | null;
  caveat?: string;
  detail?: string;
  statusCode?: number;
}

export const serializeStatus = (status: StackStatus, registry: ServiceRegistry): ServiceStatusBody[] =>
  [...status.entries()].map(([service, entry]) => ({
    service,
    state: entry.state,
    mandatory: registry.get(service).mandatory,
    checkedAt: entry.checkedAt?.toISOString() ?? null,
    ...(entry.caveat !== undefined && { caveat: entry.caveat }),
    ...(entry.detail !== undefined && { detail: entry.detail }),
    ...(entry.statusCode !== undefined && { statusCode: entry.statusCode }),
  }));

export const createStatusRoute = (monitor: Monitor, registry: ServiceRegistry): Hono => {
  const status = new Hono();

  // Probes every service once per request.
  status.get("/", async (c) => {
    const snapshot = await monitor.status(c.req.raw.signal);
    return c.json({ services: serializeStatus(snapshot, registry) });
  });

  return status;
};
