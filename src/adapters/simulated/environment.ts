/**
 * Simulated execution environment.
 *
 * Containers become ready a fixed time after they are started, measured on the
 * injected clock. Used to exercise bring-up without a container runtime.
 */

import type { ContainerHealth, RuntimeState, ServiceNode } from "@/domains/services/types";
import type { Clock } from "@/lib/clock";
import { RuntimeUnavailableError, ServiceStartError } from "@/lib/errors";

import type { ExecResult, ExecutionEnvironment, LogOptions } from "../types";

export interface SimulatedService {
  /** Delay between start and readiness. Defaults to 0. */
  readyAfterMs?: number;
  /** Health reported once ready. Defaults to `none` (no health check). */
  health?: ContainerHealth;
  /** Already running before the bring-up. */
  running?: boolean;
  /** Container exits right after it is started. */
  exits?: boolean;
  /** Start fails with this message. */
  failStart?: string;
  /** Exit code of exec probes once ready. Defaults to 0. */
  execExitCode?: number;
  logs?: readonly string[];
}

export interface SimulatedEnvironmentConfig {
  clock: Clock;
  services?: Record<string, SimulatedService>;
  unavailable?: boolean;
}

export interface SimulatedEnvironment extends ExecutionEnvironment {
  /** Service names per `start` call, in call order. */
  startCalls: () => readonly (readonly string[])[];
  startedAt: (name: string) => number | undefined;
  restarts: () => readonly string[];
}

export const createSimulatedEnvironment = (config: SimulatedEnvironmentConfig): SimulatedEnvironment => {
  const { clock } = config;
  const services = config.services ?? {};
  const startedAt = new Map<string, number>();
  const startCalls: string[][] = [];
  const restarts: string[] = [];

  for (const [name, service] of Object.entries(services)) {
    if (service.running) {
      startedAt.set(name, Number.NEGATIVE_INFINITY);
    }
  }

  const spec = (name: string): SimulatedService => services[name] ?? {};

  const isReady = (name: string): boolean => {
    const started = startedAt.get(name);
    return started !== undefined && clock.now() - started >= (spec(name).readyAfterMs ?? 0);
  };

  const assertAvailable = (): void => {
    if (config.unavailable) {
      throw new RuntimeUnavailableError("simulated runtime is down");
    }
  };

  return {
    ping: async (): Promise<void> => {
      assertAvailable();
    },

    start: async (nodes: readonly ServiceNode[]): Promise<void> => {
      assertAvailable();
      startCalls.push(nodes.map((node) => node.name));
      for (const node of nodes) {
        const failure = spec(node.name).failStart;
        if (failure !== undefined) {
          throw new ServiceStartError(node.name, failure);
        }
        if (!startedAt.has(node.name)) {
          startedAt.set(node.name, clock.now());
        }
      }
    },

    inspect: async (node: ServiceNode): Promise<RuntimeState> => {
      assertAvailable();
      if (!startedAt.has(node.name)) {
        return { status: "absent", health: "none" };
      }
      if (spec(node.name).exits) {
        return { status: "exited", health: "none" };
      }
      const health = spec(node.name).health ?? "none";
      if (isReady(node.name)) {
        return { status: "running", health };
      }
      return health === "none" ? { status: "created", health: "none" } : { status: "running", health: "starting" };
    },

    exec: async (node: ServiceNode): Promise<ExecResult> => {
      assertAvailable();
      if (!isReady(node.name)) {
        return { exitCode: 1, stdout: "", stderr: `${node.container} is not accepting connections` };
      }
      const exitCode = spec(node.name).execExitCode ?? 0;
      return { exitCode, stdout: exitCode === 0 ? "accepting connections" : "", stderr: "" };
    },

    async *logs(node: ServiceNode, options: LogOptions = {}) {
      assertAvailable();
      const lines = spec(node.name).logs ?? [];
      yield* options.tail !== undefined ? lines.slice(Math.max(0, lines.length - options.tail)) : lines;
    },

    restart: async (node: ServiceNode): Promise<void> => {
      assertAvailable();
      restarts.push(node.name);
      startedAt.set(node.name, clock.now());
    },

    startCalls: () => startCalls,
    startedAt: (name) => startedAt.get(name),
    restarts: () => restarts,
  };
};
