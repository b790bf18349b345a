/**
 * Health classification and readiness wait state machine.
 */

export type { ObservedSignals } from "./classify";
export { applyCaveat, classifyHttpStatus, classifyRuntime, matchesExpectation } from "./classify";

export type {
  TransitionResult,
  WaitEvent,
  WaitOutcomeStatus,
  WaitPhase,
  WaitPolicyConfig,
  WaitState,
} from "./wait";
export { createWaitState, isTerminalWaitPhase, nextPollDelayMs, transitionWait } from "./wait";
