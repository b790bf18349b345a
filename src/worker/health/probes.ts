/**
 * Health probes: evaluate one service's readiness once.
 *
 * Every probe reads the container state first. Only a running container is
 * asked for its HTTP or exec signal; anything else is classified from the
 * runtime state alone.
 */

import { TaskCancelledError, TimeoutStrategy, timeout } from "cockatiel";

import type { ExecutionEnvironment } from "@/adapters/types";
import { type ObservedSignals, applyCaveat, classifyHttpStatus, classifyRuntime } from "@/domains/health";
import type { CaveatEntry, HealthState, ProbeResult, ServiceNode } from "@/domains/services/types";
import type { Clock } from "@/lib/clock";

export type Probe = (signal?: AbortSignal) => Promise<ProbeResult>;

export type FetchFn = (url: string, init: { signal: AbortSignal; redirect: "manual" }) => Promise<{ status: number }>;

export interface ProbeDeps {
  environment: ExecutionEnvironment;
  clock: Clock;
  caveat?: CaveatEntry;
  fetch?: FetchFn;
  /** Upper bound for one HTTP request. */
  httpTimeoutMs?: number;
}

export const DEFAULT_HTTP_TIMEOUT_MS = 5_000;

interface Observation {
  state: HealthState;
  signals: ObservedSignals;
  statusCode?: number;
  detail?: string;
}

const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));

export const createProbe = (node: ServiceNode, deps: ProbeDeps): Probe => {
  const { environment, clock, caveat } = deps;
  const fetchFn: FetchFn = deps.fetch ?? ((url, init) => fetch(url, init));
  const httpTimeoutMs = deps.httpTimeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS;
  const httpTimeout = timeout(httpTimeoutMs, TimeoutStrategy.Aggressive);

  const observeHttp = async (
    url: string,
    expect: Parameters<typeof classifyHttpStatus>[1],
    signal?: AbortSignal,
  ): Promise<Observation> => {
    try {
      const response = await httpTimeout.execute(
        ({ signal: attemptSignal }) => fetchFn(url, { signal: attemptSignal, redirect: "manual" }),
        signal,
      );
      return {
        state: classifyHttpStatus(response.status, expect),
        signals: { statusCode: response.status },
        statusCode: response.status,
        detail: `HTTP ${response.status}`,
      };
    } catch (error) {
      const detail =
        error instanceof TaskCancelledError ? `no response within ${httpTimeoutMs}ms` : errorMessage(error);
      return { state: "STARTING", signals: {}, detail };
    }
  };

  const observe = async (signal?: AbortSignal): Promise<Observation> => {
    const runtime = await environment.inspect(node);
    const runtimeSignals: ObservedSignals = runtime.status === "running" ? { runtimeHealth: runtime.health } : {};

    if (runtime.status !== "running" || !node.probe || node.probe.kind === "runtime") {
      return {
        state: classifyRuntime(runtime),
        signals: runtimeSignals,
        detail: runtime.health === "none" ? runtime.status : `${runtime.status} (${runtime.health})`,
      };
    }

    if (node.probe.kind === "http") {
      return observeHttp(node.probe.url, node.probe.expect, signal);
    }

    const result = await environment.exec(node, node.probe.command, signal);
    if (result.exitCode === 0) {
      return { state: "HEALTHY", signals: runtimeSignals, detail: result.stdout || undefined };
    }
    return {
      state: "STARTING",
      signals: runtimeSignals,
      detail: result.stderr || result.stdout || `exit code ${result.exitCode}`,
    };
  };

  return async (signal?: AbortSignal): Promise<ProbeResult> => {
    const observation = await observe(signal);
    const result: ProbeResult = {
      service: node.name,
      state: observation.state,
      checkedAt: new Date(clock.now()),
      ...(observation.statusCode !== undefined && { statusCode: observation.statusCode }),
      ...(observation.detail !== undefined && { detail: observation.detail }),
    };
    return applyCaveat(result, caveat, observation.signals);
  };
};
