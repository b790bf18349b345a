/**
 * Fixed-interval readiness wait.
 *
 * Probes immediately, then every `intervalMs` until the probe reports HEALTHY
 * or UNHEALTHY, the deadline passes, or the signal aborts. The last sleep is
 * clamped so a timeout is reported at the deadline, not after it, and a probe
 * call that has not answered by the deadline is abandoned.
 */

import { TaskCancelledError, TimeoutStrategy, timeout } from "cockatiel";

import {
  type WaitEvent,
  type WaitOutcomeStatus,
  type WaitPolicyConfig,
  type WaitState,
  createWaitState,
  isTerminalWaitPhase,
  nextPollDelayMs,
  transitionWait,
} from "@/domains/health";
import type { ProbeResult } from "@/domains/services/types";
import type { Clock } from "@/lib/clock";
import type { Logger } from "@/lib/logger";

import type { Probe } from "./probes";

export interface WaitOptions {
  policy: WaitPolicyConfig;
  clock: Clock;
  signal?: AbortSignal;
  logger?: Logger;
  /** Called with every probe result, in order. */
  onProbe?: (result: ProbeResult) => void;
}

export interface WaitOutcome {
  service: string;
  status: WaitOutcomeStatus;
  attempts: number;
  elapsedMs: number;
  lastResult: ProbeResult | null;
}

const toOutcome = (state: WaitState, status: WaitOutcomeStatus, nowMs: number): WaitOutcome => ({
  service: state.service,
  status,
  attempts: state.attempts,
  elapsedMs: (state.finishedAtMs ?? nowMs) - state.startedAtMs,
  lastResult: state.lastResult,
});

/**
 * Poll `probe` until the service settles. Probe errors (an unreachable
 * runtime) propagate to the caller.
 */
export const waitForHealthy = async (service: string, probe: Probe, options: WaitOptions): Promise<WaitOutcome> => {
  const { policy, clock, signal, logger } = options;
  let state = createWaitState(service, clock.now());

  const apply = (event: WaitEvent): void => {
    const next = transitionWait(state, event, policy);
    if (next.ok) {
      state = next.state;
    }
  };

  const cancelIfAborted = (): boolean => {
    if (signal?.aborted) {
      apply({ type: "CANCEL", atMs: clock.now() });
      return true;
    }
    return false;
  };

  const deadlineMs = state.startedAtMs + policy.timeoutMs;

  /** Runs one probe call, or returns null when the deadline or the signal cut it short. */
  const probeBeforeDeadline = async (): Promise<ProbeResult | null> => {
    const remainingMs = Math.max(0, deadlineMs - clock.now());
    try {
      return await timeout(remainingMs, TimeoutStrategy.Aggressive).execute(
        ({ signal: attemptSignal }) => probe(attemptSignal),
        signal,
      );
    } catch (error) {
      if (error instanceof TaskCancelledError) {
        return null;
      }
      throw error;
    }
  };

  while (!isTerminalWaitPhase(state.phase)) {
    if (cancelIfAborted()) {
      break;
    }

    const result = await probeBeforeDeadline();
    if (result === null) {
      if (cancelIfAborted()) {
        break;
      }
      logger?.warn("Probe did not answer before the deadline", { service, timeoutMs: policy.timeoutMs });
      apply({ type: "TICK", atMs: Math.max(clock.now(), deadlineMs) });
      break;
    }
    options.onProbe?.(result);
    apply({ type: "PROBED", result, atMs: clock.now() });
    logger?.debug("Probe result", {
      service,
      state: result.state,
      attempt: state.attempts,
      ...(result.detail !== undefined && { detail: result.detail }),
    });
    if (isTerminalWaitPhase(state.phase) || cancelIfAborted()) {
      break;
    }

    await clock.sleep(nextPollDelayMs(state, clock.now(), policy), signal);
    if (cancelIfAborted()) {
      break;
    }
    apply({ type: "TICK", atMs: clock.now() });
  }

  const { phase } = state;
  // Loop only exits on a terminal phase.
  const status: WaitOutcomeStatus = isTerminalWaitPhase(phase) ? phase : "CANCELLED";
  return toOutcome(state, status, clock.now());
};
