import { describe, expect, it, vi } from "vitest";

import type { Clock } from "@/lib/clock";
import { createCatalogStore } from "@/lib/db/adapters/memory/catalog-store";
import { BootstrapStepError, ConcurrentRunError } from "@/lib/errors";
import type { Logger } from "@/lib/logger";

import { createBootstrapReconciler } from "./reconcile";
import { createBootstrapSteps } from "./steps";

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

const LOCK_KEY = 42;

const steps = createBootstrapSteps({
  primaryDatabase: "postgres",
  ownerRole: "postgres",
  adminRole: "supabase_admin",
  adminPassword: "test-secret",
  analyticsDatabase: "_supabase",
  analyticsSchema: "_analytics",
  replicationPattern: "%logflare%",
  lockKey: LOCK_KEY,
});

const setup = (stepList = steps) => {
  const store = createCatalogStore({ primaryDatabase: "postgres", analyticsDatabase: "_supabase" });
  const reconciler = createBootstrapReconciler({
    store,
    steps: stepList,
    lockKey: LOCK_KEY,
    clock,
    logger: createMockLogger(),
  });
  return { store, reconciler };
};

const CANONICAL_ROLE = {
  login: true,
  superuser: true,
  createdb: true,
  createrole: true,
  replication: true,
  password: "test-secret",
};

const catalogState = (store: ReturnType<typeof createCatalogStore>) => ({
  role: store.role("supabase_admin"),
  analyticsOwner: store.databaseOwner("_supabase"),
  schema: store.hasSchema("_supabase", "_analytics"),
  schemaGrant: store.hasSchemaGrant("supabase_admin", "_supabase", "_analytics"),
  defaults: store.defaultPrivileges("_supabase"),
});

describe("createBootstrapReconciler", () => {
  describe("reconcile", () => {
    it("should bootstrap an empty store", async () => {
      const { store, reconciler } = setup();

      const report = await reconciler.reconcile();

      expect(report.mode).toBe("reconcile");
      expect(report.reset).toEqual([]);
      expect(report.steps.map((step) => [step.id, step.outcome])).toEqual([
        ["ensure-admin-role", "applied"],
        ["grant-primary-database", "skipped"],
        ["ensure-analytics-database", "applied"],
        ["grant-analytics-database", "skipped"],
        ["ensure-analytics-schema", "applied"],
        ["grant-schema-privileges", "applied"],
        ["default-privileges", "applied"],
        ["drop-stale-replication-slots", "skipped"],
        ["drop-stale-publications", "skipped"],
      ]);
      expect(catalogState(store)).toEqual({
        role: CANONICAL_ROLE,
        analyticsOwner: "supabase_admin",
        schema: true,
        schemaGrant: true,
        defaults: [
          "_analytics:FUNCTIONS:supabase_admin",
          "_analytics:SEQUENCES:supabase_admin",
          "_analytics:TABLES:supabase_admin",
        ],
      });
    });

    it("should leave the store unchanged when run twice", async () => {
      const { store, reconciler } = setup();

      await reconciler.reconcile();
      const afterFirst = catalogState(store);
      const second = await reconciler.reconcile();

      expect(catalogState(store)).toEqual(afterFirst);
      expect(second.steps.filter((step) => step.outcome === "applied").map((step) => step.id)).toEqual([
        "ensure-admin-role",
        "grant-schema-privileges",
        "default-privileges",
      ]);
      expect(store.executed().filter((statement) => statement.sql.startsWith("CREATE DATABASE"))).toHaveLength(1);
    });

    it("should converge a drifted role onto its canonical attributes", async () => {
      const { store, reconciler } = setup();
      store.seedRole("supabase_admin", { login: false, password: "old" });

      await reconciler.reconcile();

      expect(store.role("supabase_admin")).toEqual(CANONICAL_ROLE);
    });

    it("should drop inactive replication slots and stale publications", async () => {
      const { store, reconciler } = setup();
      await reconciler.reconcile();
      store.seedSlot("logflare_slot", false);
      store.seedSlot("other_slot", false);
      store.seedPublication("_supabase", "logflare_pub");

      const report = await reconciler.reconcile();

      expect(store.slots()).toEqual([{ name: "other_slot", active: false }]);
      expect(store.publications("_supabase")).toEqual([]);
      expect(report.steps.slice(-2).map((step) => step.outcome)).toEqual(["applied", "applied"]);
    });

    it("should keep the publication of a running analytics service", async () => {
      const { store, reconciler } = setup();
      await reconciler.reconcile();
      store.seedSlot("logflare_slot", true);
      store.seedPublication("_supabase", "logflare_pub");

      await reconciler.reconcile();

      expect(store.slots()).toEqual([{ name: "logflare_slot", active: true }]);
      expect(store.publications("_supabase")).toEqual(["logflare_pub"]);
    });

    it("should stop at the failing step and report it", async () => {
      const { store, reconciler } = setup();
      store.failOn("CREATE DATABASE", { code: "42501", message: "permission denied to create database" });

      const failure = reconciler.reconcile();

      await expect(failure).rejects.toBeInstanceOf(BootstrapStepError);
      await expect(failure).rejects.toMatchObject({
        subject: "ensure-analytics-database",
        phase: "action",
        code: "42501",
        message: "Bootstrap step ensure-analytics-database failed during action: permission denied to create database",
      });
      expect(store.hasSchema("_supabase", "_analytics")).toBe(false);
      expect(store.heldLocks()).toEqual([]);
    });

    it("should complete on re-run after a partial failure", async () => {
      const { store, reconciler } = setup();
      store.failOn("GRANT ALL ON SCHEMA", { code: "57P01", message: "terminating connection" });

      await expect(reconciler.reconcile()).rejects.toBeInstanceOf(BootstrapStepError);
      const report = await reconciler.reconcile();

      expect(report.steps.find((step) => step.id === "ensure-analytics-database")?.outcome).toBe("skipped");
      expect(report.steps.find((step) => step.id === "ensure-analytics-schema")?.outcome).toBe("skipped");
      expect(catalogState(store).schemaGrant).toBe(true);
    });

    it("should fail a step whose precondition is not met", async () => {
      const { reconciler } = setup(steps.filter((step) => step.id !== "ensure-analytics-database"));

      await expect(reconciler.reconcile()).rejects.toMatchObject({
        subject: "grant-analytics-database",
        phase: "precondition",
      });
    });

    it("should refuse to run while another session holds the lock", async () => {
      const { store, reconciler } = setup();
      store.holdLockElsewhere(LOCK_KEY);

      await expect(reconciler.reconcile()).rejects.toBeInstanceOf(ConcurrentRunError);
      expect(store.executed()).toEqual([{ target: "primary", sql: "SELECT pg_try_advisory_lock(42) AS acquired" }]);
    });

    it("should refuse a second run in this process while one is in flight", async () => {
      const { store, reconciler } = setup();

      const results = await Promise.allSettled([reconciler.reconcile(), reconciler.repair()]);

      expect(results[0]?.status).toBe("fulfilled");
      expect(results[1]?.status).toBe("rejected");
      expect(results[1]?.status === "rejected" ? results[1].reason : undefined).toBeInstanceOf(ConcurrentRunError);
      expect(
        store.executed().filter((statement) => statement.sql === "SELECT pg_try_advisory_lock(42) AS acquired"),
      ).toHaveLength(1);
    });

    it("should report an unreachable store at the lock", async () => {
      const { store, reconciler } = setup();
      store.failOn("pg_try_advisory_lock", { code: "ECONNREFUSED", message: "connect ECONNREFUSED 127.0.0.1:5432" });

      await expect(reconciler.reconcile()).rejects.toMatchObject({
        subject: "advisory-lock",
        phase: "lock",
        code: "ECONNREFUSED",
      });
    });
  });

  describe("repair", () => {
    it("should drop and recreate the analytics database and admin role", async () => {
      const { store, reconciler } = setup();
      await reconciler.reconcile();
      const before = catalogState(store);

      const report = await reconciler.repair();

      expect(report.mode).toBe("repair");
      expect(report.reset).toEqual(["ensure-analytics-database", "ensure-admin-role"]);
      expect(report.steps.find((step) => step.id === "ensure-analytics-database")?.outcome).toBe("applied");
      expect(catalogState(store)).toEqual(before);
    });

    it("should bring a broken store back to the canonical state", async () => {
      const { store, reconciler } = setup();
      store.seedRole("supabase_admin", { login: false });
      store.seedDatabase("_supabase", "supabase_admin");
      store.seedPublication("_supabase", "logflare_pub");

      await reconciler.repair();

      expect(catalogState(store)).toEqual({
        role: CANONICAL_ROLE,
        analyticsOwner: "supabase_admin",
        schema: true,
        schemaGrant: true,
        defaults: [
          "_analytics:FUNCTIONS:supabase_admin",
          "_analytics:SEQUENCES:supabase_admin",
          "_analytics:TABLES:supabase_admin",
        ],
      });
      expect(store.publications("_supabase")).toEqual([]);
    });

    it("should run resets before any normal step", async () => {
      const { store, reconciler } = setup();

      await reconciler.repair();

      const sql = store.executed().map((statement) => statement.sql);
      expect(sql.indexOf('DROP DATABASE IF EXISTS "_supabase" WITH (FORCE)')).toBeLessThan(
        sql.indexOf('DROP ROLE IF EXISTS "supabase_admin"'),
      );
      expect(sql.indexOf('DROP ROLE IF EXISTS "supabase_admin"')).toBeLessThan(
        sql.findIndex((statement) => statement.startsWith("ALTER ROLE")),
      );
    });
  });
});
