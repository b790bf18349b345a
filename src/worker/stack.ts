/**
 * Composition root: wires configuration into the runtime adapter, the data
 * store, the bootstrap reconciler, the monitor and the orchestrator.
 */

import { createComposeEnvironment } from "@/adapters/docker";
import { createSimulatedEnvironment } from "@/adapters/simulated/environment";
import type { ExecutionEnvironment } from "@/adapters/types";
import {
  type ServiceRegistry,
  type StatusStore,
  createServiceRegistry,
  createStatusStore,
} from "@/domains/services";
import type { ServiceNode, StatusClass } from "@/domains/services/types";
import { type Clock, systemClock } from "@/lib/clock";
import type { StackConfig } from "@/lib/config";
import { createCatalogStore } from "@/lib/db/adapters/memory/catalog-store";
import { createPostgresDataStore } from "@/lib/db/adapters/postgres/data-store";
import type { DataStore } from "@/lib/db/ports/data-store";
import type { ConfigSource } from "@/lib/env";
import type { Logger } from "@/lib/logger";

import { type FetchFn, type Probe, createProbe } from "./health";
import { type Monitor, createMonitor } from "./monitor";
import { type Orchestrator, createOrchestrator } from "./orchestrator";
import { type OperationQueue, createOperationQueue } from "./queue";
import { type BootstrapReconciler, type BootstrapReport, createBootstrapReconciler, createBootstrapSteps } from "./reconciler";

export interface StackDeps {
  config: StackConfig;
  configSource: ConfigSource;
  logger: Logger;
  /** Defaults to Docker Compose. */
  environment?: ExecutionEnvironment;
  /** Defaults to PostgreSQL at `config.store`. */
  store?: DataStore;
  clock?: Clock;
  fetch?: FetchFn;
}

export interface Stack {
  registry: ServiceRegistry;
  statusStore: StatusStore;
  environment: ExecutionEnvironment;
  monitor: Monitor;
  orchestrator: Orchestrator;
  reconciler: BootstrapReconciler;
  queue: OperationQueue;
  /** Destructive bootstrap reset; single-flight with every other operation. */
  repair: (signal?: AbortSignal) => Promise<BootstrapReport>;
  /** Restart through the operation queue so it never overlaps a bring-up. */
  restart: (name: string) => Promise<void>;
  close: () => Promise<void>;
}

export const createStack = (deps: StackDeps): Stack => {
  const { config, configSource, logger } = deps;
  const clock = deps.clock ?? systemClock;

  const registry = createServiceRegistry(config.stack.services, config.stack.caveats);
  const statusStore = createStatusStore(registry);
  const queue = createOperationQueue();

  const environment =
    deps.environment ??
    createComposeEnvironment({
      composeFile: config.compose.file,
      projectDir: config.compose.projectDir,
      logger: logger.child({ component: "compose" }),
    });

  const store =
    deps.store ??
    createPostgresDataStore({
      connection: config.store,
      analyticsDatabase: config.bootstrap.analyticsDatabase,
    });

  const reconciler = createBootstrapReconciler({
    store,
    steps: createBootstrapSteps({
      ...config.bootstrap,
      primaryDatabase: config.store.database,
      ownerRole: config.store.user,
    }),
    lockKey: config.bootstrap.lockKey,
    clock,
    logger: logger.child({ component: "bootstrap" }),
  });

  const probeFor = (node: ServiceNode): Probe =>
    createProbe(node, {
      environment,
      clock,
      caveat: registry.caveatFor(node.name),
      ...(deps.fetch && { fetch: deps.fetch }),
    });

  const monitor = createMonitor({
    registry,
    environment,
    statusStore,
    probeFor,
    logger: logger.child({ component: "monitor" }),
  });

  const orchestrator = createOrchestrator({
    registry,
    environment,
    statusStore,
    config: configSource,
    probeFor,
    reconciler,
    storeService: config.stack.storeService,
    queue,
    clock,
    logger: logger.child({ component: "orchestrator" }),
  });

  return {
    registry,
    statusStore,
    environment,
    monitor,
    orchestrator,
    reconciler,
    queue,
    repair: (signal) => queue.runExclusive("repair", () => reconciler.repair(), signal),
    restart: (name) => queue.runExclusive("restart", () => monitor.restart(name)),
    close: async () => {
      queue.cancelAll();
      await store.close();
    },
  };
};

/** First status an HTTP probe accepts; `4xx` answers 400. */
const acceptedStatus = (expect: readonly (number | StatusClass)[]): number => {
  const first = expect[0];
  if (first === undefined) {
    return 200;
  }
  return typeof first === "number" ? first : Number.parseInt(first, 10) * 100;
};

/**
 * Stack on a simulated runtime and an in-memory database where every service
 * comes up at once. A bring-up on it shows the waves and bootstrap steps a real
 * one would take without touching Docker or PostgreSQL.
 */
export const createDryRunStack = (deps: Pick<StackDeps, "config" | "configSource" | "logger">): Stack => {
  const { config } = deps;
  const answers = new Map<string, number>();
  for (const node of config.stack.services) {
    if (node.probe?.kind === "http") {
      answers.set(node.probe.url, acceptedStatus(node.probe.expect));
    }
  }

  return createStack({
    ...deps,
    environment: createSimulatedEnvironment({ clock: systemClock }),
    store: createCatalogStore({
      primaryDatabase: config.store.database,
      analyticsDatabase: config.bootstrap.analyticsDatabase,
      sessionUser: config.store.user,
    }),
    fetch: async (url) => ({ status: answers.get(url) ?? 200 }),
  });
};
