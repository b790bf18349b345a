import { describe, expect, it, vi } from "vitest";

import { type SimulatedService, createSimulatedEnvironment } from "@/adapters";
import { parseStackDefinition } from "@/domains/services";
import { systemClock } from "@/lib/clock";
import { createStackConfig } from "@/lib/config";
import { createCatalogStore } from "@/lib/db/adapters/memory/catalog-store";
import { REQUIRED_KEYS, createConfigSource, parseEnv } from "@/lib/env";
import type { Logger } from "@/lib/logger";
import type { ServiceStatusBody } from "@/server/routes/status";
import { createDryRunStack, createStack } from "@/worker/stack";

import { REPAIR_CONFIRMATION } from "./commands";
import { createProgram } from "./program";
import { type CliRuntime, createSession } from "./runtime";

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

const definition = parseStackDefinition({
  services: [
    { name: "db", container: "stack-db" },
    { name: "rest", container: "stack-rest", dependsOn: ["db"] },
    { name: "studio", container: "stack-studio", dependsOn: ["rest"], mandatory: false },
  ],
  bootstrap: { storeService: "db" },
});

const completeValues = (): Record<string, string> =>
  Object.fromEntries(REQUIRED_KEYS.map((key) => [key, "test-secret"]));

interface TestRuntimeOptions {
  values?: Record<string, string>;
  services?: Record<string, SimulatedService>;
}

const createTestRuntime = (options: TestRuntimeOptions = {}) => {
  const out: string[] = [];
  const err: string[] = [];
  let exitCode = 0;

  const values = options.values ?? completeValues();
  const config = createStackConfig(parseEnv(values), definition, { cwd: "/srv/stack" });
  const configSource = createConfigSource(values);
  const environment = createSimulatedEnvironment({ clock: systemClock, services: options.services ?? {} });
  const store = createCatalogStore({ primaryDatabase: "postgres", analyticsDatabase: "_supabase" });
  const logger = createMockLogger();

  const runtime: CliRuntime = {
    open: () =>
      createSession({
        config,
        configSource,
        logger,
        createStack: () => createStack({ config, configSource, logger, environment, store }),
        createDryRunStack: () => createDryRunStack({ config, configSource, logger }),
      }),
    out: (text) => {
      out.push(text);
    },
    err: (text) => {
      err.push(text);
    },
    setExitCode: (code) => {
      exitCode = code;
    },
    interrupt: () => ({ signal: new AbortController().signal, dispose: () => undefined }),
    colorLevel: 0,
  };

  const run = async (...args: string[]): Promise<void> => {
    await createProgram(runtime).exitOverride().parseAsync(args, { from: "user" });
  };

  return { run, out, err, exitCode: () => exitCode, environment, store };
};

describe("stackctl", () => {
  describe("plan", () => {
    it("should print the startup waves", async () => {
      const cli = createTestRuntime();

      await cli.run("plan");

      expect(cli.out).toEqual(["wave 0  db\nwave 1  rest\nwave 2  studio"]);
      expect(cli.environment.startCalls()).toEqual([]);
    });
  });

  describe("check-env", () => {
    it("should pass a complete environment", async () => {
      const cli = createTestRuntime();

      await cli.run("check-env");

      expect(cli.out[0]?.split("\n")[0]).toBe("✔ Environment is ready");
      expect(cli.exitCode()).toBe(0);
    });

    it("should fail on missing keys", async () => {
      const values = completeValues();
      delete values.JWT_SECRET;
      const cli = createTestRuntime({ values });

      await cli.run("check-env");

      expect(cli.out[0]?.split("\n").slice(0, 2)).toEqual(["✖ Environment is not ready", "  missing: JWT_SECRET"]);
      expect(cli.exitCode()).toBe(1);
    });
  });

  describe("status", () => {
    it("should print the state table", async () => {
      const cli = createTestRuntime({ services: { db: { running: true } } });

      await cli.run("status");

      expect(cli.out[0]?.split("\n")).toEqual([
        "SERVICE  STATE      DETAIL",
        "db       HEALTHY    running",
        "rest     NOT_FOUND  absent",
        "studio   NOT_FOUND  absent; optional",
      ]);
    });

    it("should print JSON on request", async () => {
      const cli = createTestRuntime({ services: { db: { running: true } } });

      await cli.run("status", "--json");

      const body = JSON.parse(cli.out[0] ?? "[]") as ServiceStatusBody[];
      expect(body.map((entry) => [entry.service, entry.state, entry.mandatory])).toEqual([
        ["db", "HEALTHY", true],
        ["rest", "NOT_FOUND", true],
        ["studio", "NOT_FOUND", false],
      ]);
    });
  });

  describe("logs", () => {
    it("should print the requested tail", async () => {
      const cli = createTestRuntime({ services: { db: { logs: ["booting", "ready", "accepting connections"] } } });

      await cli.run("logs", "db", "--tail", "2");

      expect(cli.out).toEqual(["ready", "accepting connections"]);
    });
  });

  describe("restart", () => {
    it("should restart the service", async () => {
      const cli = createTestRuntime();

      await cli.run("restart", "db");

      expect(cli.environment.restarts()).toEqual(["db"]);
      expect(cli.out).toEqual(["✔ Restarted db"]);
    });

    it("should name the known services for an unknown one", async () => {
      const cli = createTestRuntime();

      await cli.run("restart", "ghost");

      expect(cli.err).toEqual(["✖ Unknown service: ghost\n  hint: Available services: db, rest, studio"]);
      expect(cli.exitCode()).toBe(1);
    });
  });

  describe("repair", () => {
    it("should refuse without confirmation", async () => {
      const cli = createTestRuntime();

      await cli.run("repair");

      expect(cli.err).toEqual([REPAIR_CONFIRMATION]);
      expect(cli.exitCode()).toBe(1);
      expect(cli.store.executed()).toEqual([]);
    });

    it("should reset and rebuild the bootstrap objects when confirmed", async () => {
      const cli = createTestRuntime();

      await cli.run("repair", "--yes");

      expect(cli.out[0]?.split("\n")[1]).toBe("  reset: ensure-analytics-database, ensure-admin-role");
      expect(cli.store.role("supabase_admin")?.superuser).toBe(true);
      expect(cli.exitCode()).toBe(0);
    });
  });

  describe("up", () => {
    it("should bring the stack up and close the store", async () => {
      const cli = createTestRuntime();

      await cli.run("up");

      const lines = cli.out[0]?.split("\n") ?? [];
      expect(lines.slice(0, 2)).toEqual(["store wave 0  started db", "stack wave 0  already healthy db"]);
      expect(lines[lines.length - 1]).toMatch(/^✔ Stack is up in \d+\.\ds$/);
      expect(cli.exitCode()).toBe(0);
      expect(cli.store.closed()).toBe(true);
    });

    it("should rehearse on a dry run without touching the runtime or the database", async () => {
      const cli = createTestRuntime();

      await cli.run("up", "--dry-run");

      expect(cli.out[0]).toBe("Dry run: simulated runtime and in-memory database, nothing is started");
      expect(cli.out[1]?.split("\n").slice(0, 4)).toEqual([
        "store wave 0  started db",
        "stack wave 0  already healthy db",
        "stack wave 1  started rest",
        "stack wave 2  started studio",
      ]);
      expect(cli.environment.startCalls()).toEqual([]);
      expect(cli.store.executed()).toEqual([]);
      expect(cli.exitCode()).toBe(0);
    });

    it("should exit 1 when a mandatory service fails", async () => {
      const cli = createTestRuntime({ services: { rest: { health: "unhealthy" } } });

      await cli.run("up");

      const lines = cli.out[0]?.split("\n") ?? [];
      expect(lines).toContain("✖ rest reported unhealthy: running (unhealthy)");
      expect(cli.environment.startedAt("studio")).toBeUndefined();
      expect(cli.exitCode()).toBe(1);
    });
  });
});
