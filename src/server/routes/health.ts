import { Hono } from "hono";

import type { ServiceRegistry } from "@/domains/services";
import type { Monitor } from "@/worker/monitor";

import { serializeStatus } from "./status";

export const createHealthRoute = (monitor: Monitor, registry: ServiceRegistry): Hono => {
  const health = new Hono();

  health.get("/", async (c) => {
    const timestamp = new Date().toISOString();
    try {
      const services = serializeStatus(await monitor.status(c.req.raw.signal), registry);
      const failing = services
        .filter((service) => service.mandatory && service.state !== "HEALTHY")
        .map((service) => service.service);
      const healthy = failing.length === 0;

      return c.json(
        { status: healthy ? "healthy" : "unhealthy", timestamp, failing, services },
        healthy ? 200 : 503,
      );
    } catch (error) {
      return c.json(
        {
          status: "unhealthy",
          timestamp,
          error: error instanceof Error ? error.message : String(error),
        },
        503,
      );
    }
  });

  return health;
};
