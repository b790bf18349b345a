import { describe, expect, it } from "vitest";

import { UnknownServiceError } from "@/lib/errors";

import { createServiceRegistry } from "./registry";
import { createStatusStore } from "./status";
import type { ServiceNode } from "./types";

const service = (name: string): ServiceNode => ({
  name,
  container: name,
  description: name,
  dependsOn: [],
  timeoutMs: 1_000,
  intervalMs: 100,
  mandatory: true,
});

describe("createStatusStore", () => {
  const registry = createServiceRegistry([service("db"), service("auth")]);

  it("should start every service as UNKNOWN", () => {
    const store = createStatusStore(registry);

    expect([...store.snapshot().entries()]).toEqual([
      ["db", { state: "UNKNOWN", checkedAt: null }],
      ["auth", { state: "UNKNOWN", checkedAt: null }],
    ]);
  });

  it("should record the latest probe result", () => {
    const store = createStatusStore(registry);
    const checkedAt = new Date("2026-03-01T10:00:00.000Z");

    store.record({ service: "auth", state: "HEALTHY", checkedAt, caveat: "403 accepted", statusCode: 403 });

    expect(store.get("auth")).toEqual({ state: "HEALTHY", checkedAt, caveat: "403 accepted", statusCode: 403 });
    expect(store.get("db").state).toBe("UNKNOWN");
  });

  it("should hand out snapshots that later records do not change", () => {
    const store = createStatusStore(registry);
    const before = store.snapshot();

    store.record({ service: "db", state: "STARTING", checkedAt: new Date(0) });

    expect(before.get("db")?.state).toBe("UNKNOWN");
    expect(store.snapshot().get("db")?.state).toBe("STARTING");
  });

  it("should reject results for unregistered services", () => {
    const store = createStatusStore(registry);

    expect(() => store.record({ service: "ghost", state: "HEALTHY", checkedAt: new Date(0) })).toThrow(
      UnknownServiceError,
    );
  });
});
