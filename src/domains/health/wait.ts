/**
 * Readiness wait state machine.
 *
 * `transitionWait` is the pure `poll()` transition: it folds probe results and
 * timer ticks into a wait state. Scheduling (when to probe, how to sleep) lives
 * in the worker that drives it.
 */

import type { ProbeResult } from "@/domains/services/types";

/**
 * Result of a wait transition: the new state, or why the event was rejected.
 */
export type TransitionResult<T> =
  | { ok: true; state: T; from: string; to: string }
  | { ok: false; error: string };

export type WaitPhase = "POLLING" | "HEALTHY" | "UNHEALTHY" | "TIMEOUT" | "CANCELLED";

export type WaitOutcomeStatus = Exclude<WaitPhase, "POLLING">;

export interface WaitPolicyConfig {
  timeoutMs: number;
  /** Fixed delay between polls; there is no backoff. */
  intervalMs: number;
}

export interface WaitState {
  phase: WaitPhase;
  service: string;
  startedAtMs: number;
  attempts: number;
  lastResult: ProbeResult | null;
  finishedAtMs: number | null;
}

export type WaitEvent =
  | { type: "PROBED"; result: ProbeResult; atMs: number }
  | { type: "TICK"; atMs: number }
  | { type: "CANCEL"; atMs: number };

export const isTerminalWaitPhase = (phase: WaitPhase): phase is WaitOutcomeStatus =>
  phase !== "POLLING";

export const createWaitState = (service: string, startedAtMs: number): WaitState => ({
  phase: "POLLING",
  service,
  startedAtMs,
  attempts: 0,
  lastResult: null,
  finishedAtMs: null,
});

const finish = (state: WaitState, phase: WaitOutcomeStatus, atMs: number): WaitState => ({
  ...state,
  phase,
  finishedAtMs: atMs,
});

const deadlineReached = (state: WaitState, atMs: number, policy: WaitPolicyConfig): boolean =>
  atMs - state.startedAtMs >= policy.timeoutMs;

/**
 * Apply one event to a wait.
 *
 * - PROBED: HEALTHY ends the wait. UNHEALTHY and STOPPED end it as UNHEALTHY:
 *   a wait only follows a start, so a container that has exited will not come
 *   up on its own. Any other state keeps polling unless the deadline has passed.
 * - TICK: the timer fired; ends the wait with TIMEOUT once the deadline is reached.
 * - CANCEL: operator interrupt.
 */
export const transitionWait = (
  state: WaitState,
  event: WaitEvent,
  policy: WaitPolicyConfig,
): TransitionResult<WaitState> => {
  if (isTerminalWaitPhase(state.phase)) {
    return { ok: false, error: `Cannot transition from terminal phase: ${state.phase}` };
  }

  const next = applyWaitEvent(state, event, policy);
  return { ok: true, state: next, from: state.phase, to: next.phase };
};

const applyWaitEvent = (state: WaitState, event: WaitEvent, policy: WaitPolicyConfig): WaitState => {
  switch (event.type) {
    case "PROBED": {
      const probed: WaitState = {
        ...state,
        attempts: state.attempts + 1,
        lastResult: event.result,
      };
      if (event.result.state === "HEALTHY") {
        return finish(probed, "HEALTHY", event.atMs);
      }
      if (event.result.state === "UNHEALTHY" || event.result.state === "STOPPED") {
        return finish(probed, "UNHEALTHY", event.atMs);
      }
      return deadlineReached(probed, event.atMs, policy)
        ? finish(probed, "TIMEOUT", event.atMs)
        : probed;
    }
    case "TICK":
      return deadlineReached(state, event.atMs, policy) ? finish(state, "TIMEOUT", event.atMs) : state;
    case "CANCEL":
      return finish(state, "CANCELLED", event.atMs);
    default: {
      const _exhaustive: never = event;
      return _exhaustive;
    }
  }
};

/**
 * Delay until the next poll: the fixed interval, clamped so the wait wakes
 * exactly at its deadline.
 */
export const nextPollDelayMs = (state: WaitState, nowMs: number, policy: WaitPolicyConfig): number => {
  const untilDeadline = state.startedAtMs + policy.timeoutMs - nowMs;
  return Math.max(0, Math.min(policy.intervalMs, untilDeadline));
};
