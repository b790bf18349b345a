import { describe, expect, it } from "vitest";

import { ConfigurationError, UnknownServiceError } from "@/lib/errors";

import { createServiceRegistry } from "./registry";
import type { ServiceNode } from "./types";

const service = (name: string, dependsOn: string[] = [], overrides?: Partial<ServiceNode>): ServiceNode => ({
  name,
  container: `stack-${name}`,
  description: name,
  dependsOn,
  timeoutMs: 10_000,
  intervalMs: 2_000,
  mandatory: true,
  ...overrides,
});

describe("createServiceRegistry", () => {
  it("should keep declaration order", () => {
    const registry = createServiceRegistry([service("db"), service("auth", ["db"]), service("rest", ["db"])]);

    expect(registry.names()).toEqual(["db", "auth", "rest"]);
    expect(registry.list().map((node) => node.container)).toEqual(["stack-db", "stack-auth", "stack-rest"]);
  });

  it("should reject duplicate names", () => {
    expect(() => createServiceRegistry([service("db"), service("db")])).toThrow(
      "Duplicate service name: db",
    );
  });

  it("should reject undeclared dependencies", () => {
    try {
      createServiceRegistry([service("auth", ["db", "cache"]), service("db")]);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      if (error instanceof ConfigurationError) {
        expect(error.message).toBe("Service auth depends on undeclared services: cache");
        expect(error.subject).toBe("auth");
      }
    }
  });

  it("should reject non-positive durations", () => {
    expect(() => createServiceRegistry([service("db", [], { intervalMs: 0 })])).toThrow(ConfigurationError);
  });

  it("should reject caveats for unknown services", () => {
    expect(() =>
      createServiceRegistry(
        [service("db")],
        [{ service: "realtime", note: "403", statusCodes: [403], runtimeHealth: [] }],
      ),
    ).toThrow("Caveat allowlist references undeclared service: realtime");
  });

  it("should fail lookups of unknown services with the available names", () => {
    const registry = createServiceRegistry([service("db"), service("auth", ["db"])]);

    expect(() => registry.get("kong")).toThrow(UnknownServiceError);
    try {
      registry.get("kong");
    } catch (error) {
      if (error instanceof UnknownServiceError) {
        expect(error.hint).toBe("Available services: db, auth");
      }
    }
  });

  it("should return caveats by service", () => {
    const caveat = { service: "db", note: "slow", statusCodes: [], runtimeHealth: ["starting" as const] };
    const registry = createServiceRegistry([service("db"), service("auth")], [caveat]);

    expect(registry.caveatFor("db")).toBe(caveat);
    expect(registry.caveatFor("auth")).toBeUndefined();
  });
});
