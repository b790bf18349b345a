/**
 * Orchestrator: full stack bring-up.
 *
 * 1. Check the container runtime is reachable and the environment is complete.
 * 2. Plan the startup waves; a cycle aborts before anything starts.
 * 3. Bring up the data-store service and its dependencies, then bootstrap the store.
 * 4. Run every wave: start the services that are not already healthy, then wait
 *    for all of them concurrently.
 *
 * A mandatory failure stops the remaining waves. Nothing that was started is
 * stopped again. Errors are returned in the result, never thrown.
 */

import type { ExecutionEnvironment } from "@/adapters/types";
import { type StartupPlan, dependencyClosure, planStartup } from "@/domains/planner";
import type { ServiceRegistry, StatusStore } from "@/domains/services";
import type { ServiceNode, StackStatus } from "@/domains/services/types";
import type { Clock } from "@/lib/clock";
import type { ConfigSource } from "@/lib/env";
import {
  BringUpCancelledError,
  ConcurrentRunError,
  ProbeTimeoutError,
  ProbeUnhealthyError,
  RuntimeUnavailableError,
  ServiceStartError,
  type StackError,
  isStackError,
} from "@/lib/errors";
import type { Logger } from "@/lib/logger";

import { type Probe, type WaitOutcome, waitForHealthy } from "./health";
import type { OperationQueue } from "./queue";
import type { BootstrapReconciler, BootstrapReport } from "./reconciler";

/** `store` waves bring up the data store before bootstrap; `stack` waves cover everything. */
export type BringUpStage = "store" | "stack";

export interface ServiceFailure {
  service: string;
  mandatory: boolean;
  error: StackError;
}

export interface WaveReport {
  stage: BringUpStage;
  index: number;
  services: readonly string[];
  /** Already healthy; not started again. */
  skipped: readonly string[];
  started: readonly string[];
  healthy: readonly string[];
  failures: readonly ServiceFailure[];
  durationMs: number;
}

export interface BringUpSummary {
  status: StackStatus;
  waves: readonly WaveReport[];
  bootstrap: BootstrapReport | null;
  /** Every service failure, mandatory or not, in the order they were reported. */
  failures: readonly ServiceFailure[];
  durationMs: number;
}

export type BringUpResult = ({ ok: true } & BringUpSummary) | ({ ok: false; error: StackError } & BringUpSummary);

export interface OrchestratorDeps {
  registry: ServiceRegistry;
  environment: ExecutionEnvironment;
  statusStore: StatusStore;
  config: ConfigSource;
  probeFor: (node: ServiceNode) => Probe;
  /** Absent when the stack has no data store to bootstrap. */
  reconciler: BootstrapReconciler | null;
  /** Service hosting the data store; bootstrap waits for it and its dependencies. */
  storeService: string | null;
  queue: OperationQueue;
  clock: Clock;
  logger: Logger;
}

export interface BringUpOptions {
  signal?: AbortSignal;
}

export interface Orchestrator {
  bringUp: (options?: BringUpOptions) => Promise<BringUpResult>;
}

interface WaveOutcome {
  report: WaveReport;
  /** Services whose wait was interrupted. */
  cancelled: readonly string[];
}

const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));

const waitFailure = (node: ServiceNode, outcome: WaitOutcome): StackError | null => {
  switch (outcome.status) {
    case "UNHEALTHY":
      return new ProbeUnhealthyError(
        node.name,
        outcome.lastResult?.state === "STOPPED"
          ? `not running (${outcome.lastResult.detail ?? "stopped"})`
          : outcome.lastResult?.detail,
      );
    case "TIMEOUT":
      return new ProbeTimeoutError(node.name, node.timeoutMs, outcome.lastResult?.state ?? "UNKNOWN");
    default:
      return null;
  }
};

export const createOrchestrator = (deps: OrchestratorDeps): Orchestrator => {
  const { registry, environment, statusStore, config, probeFor, reconciler, storeService, queue, clock, logger } =
    deps;

  const summary = (
    startedAtMs: number,
    waves: readonly WaveReport[],
    bootstrap: BootstrapReport | null,
    failures: readonly ServiceFailure[],
  ): BringUpSummary => ({
    status: statusStore.snapshot(),
    waves,
    bootstrap,
    failures,
    durationMs: clock.now() - startedAtMs,
  });

  const startAll = async (
    nodes: readonly ServiceNode[],
  ): Promise<{ started: ServiceNode[]; failures: ServiceFailure[] }> => {
    // One call per service so a failing start does not hold back its wave peers.
    const settled = await Promise.allSettled(
      nodes.map(async (node) => {
        await environment.start([node]);
        return node;
      }),
    );

    const started: ServiceNode[] = [];
    const failures: ServiceFailure[] = [];
    settled.forEach((result, i) => {
      const node = nodes[i];
      if (!node) {
        return;
      }
      if (result.status === "fulfilled") {
        started.push(node);
        return;
      }
      if (result.reason instanceof RuntimeUnavailableError) {
        throw result.reason;
      }
      const error =
        result.reason instanceof ServiceStartError
          ? result.reason
          : new ServiceStartError(node.name, errorMessage(result.reason), result.reason);
      failures.push({ service: node.name, mandatory: node.mandatory, error });
    });
    return { started, failures };
  };

  const awaitAll = async (
    nodes: readonly ServiceNode[],
    signal: AbortSignal,
  ): Promise<{ healthy: string[]; cancelled: string[]; failures: ServiceFailure[] }> => {
    // A probe error ends every other wait in the wave.
    const wave = new AbortController();
    const relay = (): void => wave.abort();
    if (signal.aborted) {
      wave.abort();
    }
    signal.addEventListener("abort", relay, { once: true });

    try {
      const settled = await Promise.allSettled(
        nodes.map(async (node) => {
          try {
            const outcome = await waitForHealthy(node.name, probeFor(node), {
              policy: node,
              clock,
              signal: wave.signal,
              logger: logger.child({ service: node.name }),
              onProbe: (result) => statusStore.record(result),
            });
            return { node, outcome };
          } catch (error) {
            wave.abort();
            throw error;
          }
        }),
      );

      const healthy: string[] = [];
      const cancelled: string[] = [];
      const failures: ServiceFailure[] = [];
      for (const result of settled) {
        if (result.status === "rejected") {
          throw result.reason;
        }
        const { node, outcome } = result.value;
        if (outcome.status === "HEALTHY") {
          healthy.push(node.name);
          continue;
        }
        if (outcome.status === "CANCELLED") {
          cancelled.push(node.name);
          continue;
        }
        const error = waitFailure(node, outcome);
        if (error) {
          failures.push({ service: node.name, mandatory: node.mandatory, error });
        }
      }
      return { healthy, cancelled, failures };
    } finally {
      signal.removeEventListener("abort", relay);
    }
  };

  const runWave = async (
    stage: BringUpStage,
    index: number,
    names: readonly string[],
    signal: AbortSignal,
  ): Promise<WaveOutcome> => {
    const startedAtMs = clock.now();
    const nodes = names.map((name) => registry.get(name));

    const initial = await Promise.all(nodes.map((node) => probeFor(node)(signal)));
    for (const result of initial) {
      statusStore.record(result);
    }
    const skipped = nodes.filter((_, i) => initial[i]?.state === "HEALTHY");
    const pending = nodes.filter((_, i) => initial[i]?.state !== "HEALTHY");

    if (signal.aborted) {
      logger.info("Wave interrupted before start", { stage, wave: index, pending: pending.map((node) => node.name) });
      return {
        report: {
          stage,
          index,
          services: names,
          skipped: skipped.map((node) => node.name),
          started: [],
          healthy: [],
          failures: [],
          durationMs: clock.now() - startedAtMs,
        },
        cancelled: pending.map((node) => node.name),
      };
    }

    const start = await startAll(pending);
    const wait = await awaitAll(start.started, signal);
    const failures = [...start.failures, ...wait.failures];

    const report: WaveReport = {
      stage,
      index,
      services: names,
      skipped: skipped.map((node) => node.name),
      started: start.started.map((node) => node.name),
      healthy: wait.healthy,
      failures,
      durationMs: clock.now() - startedAtMs,
    };

    logger.info("Wave complete", {
      stage,
      wave: index,
      started: report.started,
      skipped: report.skipped,
      healthy: report.healthy,
      failed: failures.map((failure) => failure.service),
      durationMs: report.durationMs,
    });
    if (failures.length > 0) {
      logger.warn("Wave finished with failures", {
        stage,
        wave: index,
        failures: failures.map(({ service, mandatory, error }) => ({
          service,
          mandatory,
          kind: error.kind,
          message: error.message,
          hint: error.hint,
        })),
      });
    }

    return { report, cancelled: wait.cancelled };
  };

  const execute = async (signal: AbortSignal): Promise<BringUpResult> => {
    const startedAtMs = clock.now();
    const waves: WaveReport[] = [];
    const failures: ServiceFailure[] = [];
    let bootstrap: BootstrapReport | null = null;

    const runPlan = async (stage: BringUpStage, plan: StartupPlan): Promise<StackError | null> => {
      // Optional services that already failed are not waited for twice.
      const failed = new Set(failures.map((failure) => failure.service));

      for (const [index, wave] of plan.waves.entries()) {
        const names = wave.filter((name) => !failed.has(name));
        if (signal.aborted) {
          return new BringUpCancelledError(names);
        }
        if (names.length === 0) {
          continue;
        }
        const outcome = await runWave(stage, index, names, signal);
        waves.push(outcome.report);
        failures.push(...outcome.report.failures);

        if (outcome.cancelled.length > 0 || signal.aborted) {
          return new BringUpCancelledError(outcome.cancelled);
        }
        const mandatory = outcome.report.failures.find((failure) => failure.mandatory);
        if (mandatory) {
          return mandatory.error;
        }
      }
      return null;
    };

    const finish = (error: StackError | null): BringUpResult => {
      const result = summary(startedAtMs, waves, bootstrap, failures);
      if (error) {
        logger.error("Bring-up failed", error, { kind: error.kind, subject: error.subject, hint: error.hint });
        return { ok: false, error, ...result };
      }
      logger.info("Bring-up complete", {
        waves: waves.length,
        failures: failures.length,
        durationMs: result.durationMs,
      });
      return { ok: true, ...result };
    };

    try {
      await environment.ping();
      config.assertValid();

      const nodes = registry.list();
      const plan = planStartup(nodes);
      logger.info("Startup plan ready", { services: nodes.length, waves: plan.waves.map((wave) => wave.join(",")) });

      if (reconciler) {
        if (storeService !== null) {
          registry.get(storeService);
          const storeError = await runPlan("store", planStartup(dependencyClosure(nodes, [storeService])));
          if (storeError) {
            return finish(storeError);
          }
        }
        bootstrap = await reconciler.reconcile();
      }

      return finish(await runPlan("stack", plan));
    } catch (error) {
      if (isStackError(error)) {
        return finish(error);
      }
      throw error;
    }
  };

  return {
    bringUp: async (options = {}) => {
      const { signal } = options;
      if (signal?.aborted) {
        return { ok: false, error: new BringUpCancelledError([]), ...summary(clock.now(), [], null, []) };
      }
      try {
        return await queue.runExclusive("bring-up", execute, signal);
      } catch (error) {
        if (error instanceof ConcurrentRunError) {
          logger.warn("Bring-up rejected", { reason: error.message });
          return { ok: false, error, ...summary(clock.now(), [], null, []) };
        }
        throw error;
      }
    },
  };
};
