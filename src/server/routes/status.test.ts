import { describe, expect, it, vi } from "vitest";

import { createSimulatedEnvironment } from "@/adapters/simulated/environment";
import { createServiceRegistry, createStatusStore } from "@/domains/services";
import type { ServiceNode, ServiceStatus } from "@/domains/services/types";
import type { Clock } from "@/lib/clock";
import type { Logger } from "@/lib/logger";
import { createProbe } from "@/worker/health";
import { createMonitor } from "@/worker/monitor";

import { type ServiceStatusBody, createStatusRoute, serializeStatus } from "./status";

const createMockLogger = (): Logger => {
  const logger: Logger = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    child: () => logger,
  };
  return logger;
};

const clock: Clock = { now: () => 0, sleep: async () => undefined };

const node = (name: string, mandatory: boolean): ServiceNode => ({
  name,
  container: `stack-${name}`,
  description: name,
  dependsOn: [],
  timeoutMs: 10_000,
  intervalMs: 2_000,
  mandatory,
});

const registry = createServiceRegistry([node("db", true), node("studio", false)]);

describe("status route", () => {
  it("should probe and return every service in declaration order", async () => {
    const environment = createSimulatedEnvironment({ clock, services: { db: { running: true } } });
    const monitor = createMonitor({
      registry,
      environment,
      statusStore: createStatusStore(registry),
      probeFor: (service) => createProbe(service, { environment, clock }),
      logger: createMockLogger(),
    });
    const app = createStatusRoute(monitor, registry);

    const res = await app.fetch(new Request("http://localhost/"));
    const body = (await res.json()) as { services: ServiceStatusBody[] };

    expect(res.status).toBe(200);
    expect(body.services).toEqual([
      { service: "db", state: "HEALTHY", mandatory: true, checkedAt: "1970-01-01T00:00:00.000Z", detail: "running" },
      { service: "studio", state: "NOT_FOUND", mandatory: false, checkedAt: "1970-01-01T00:00:00.000Z", detail: "absent" },
    ]);
  });
});

describe("serializeStatus", () => {
  it("should keep caveats and status codes and leave unprobed services without timestamp", () => {
    const status = new Map<string, ServiceStatus>([
      [
        "db",
        {
          state: "HEALTHY",
          checkedAt: new Date("2026-03-01T10:00:00.000Z"),
          caveat: "accepted",
          statusCode: 403,
        },
      ],
      ["studio", { state: "UNKNOWN", checkedAt: null }],
    ]);

    expect(serializeStatus(status, registry)).toEqual([
      {
        service: "db",
        state: "HEALTHY",
        mandatory: true,
        checkedAt: "2026-03-01T10:00:00.000Z",
        caveat: "accepted",
        statusCode: 403,
      },
      { service: "studio", state: "UNKNOWN", mandatory: false, checkedAt: null },
    ]);
  });
});
