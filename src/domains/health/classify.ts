/**
 * Pure classification of raw readiness signals into health states.
 */

import type {
  CaveatEntry,
  ContainerHealth,
  HealthState,
  ProbeResult,
  RuntimeState,
  StatusClass,
} from "@/domains/services/types";

/**
 * Map a container's runtime state to a health state.
 *
 * A running container without a health check counts as healthy: the absence
 * of a readiness probe never blocks a bring-up.
 */
export const classifyRuntime = (runtime: RuntimeState): HealthState => {
  switch (runtime.status) {
    case "absent":
      return "NOT_FOUND";
    case "created":
    case "restarting":
      return "STARTING";
    case "paused":
    case "exited":
    case "dead":
    case "removing":
      return "STOPPED";
    case "running":
      return classifyContainerHealth(runtime.health);
  }
};

const classifyContainerHealth = (health: ContainerHealth): HealthState => {
  switch (health) {
    case "healthy":
    case "none":
      return "HEALTHY";
    case "unhealthy":
      return "UNHEALTHY";
    case "starting":
      return "STARTING";
  }
};

const STATUS_CLASS_BASE: Record<StatusClass, number> = {
  "2xx": 200,
  "3xx": 300,
  "4xx": 400,
  "5xx": 500,
};

export const matchesExpectation = (
  statusCode: number,
  expect: readonly (number | StatusClass)[],
): boolean =>
  expect.some((entry) => {
    if (typeof entry === "number") {
      return entry === statusCode;
    }
    const base = STATUS_CLASS_BASE[entry];
    return statusCode >= base && statusCode < base + 100;
  });

/** Gateway-style responses from a service that is still warming up. */
const WARMING_UP_CODES: ReadonlySet<number> = new Set([502, 503, 504]);

export const classifyHttpStatus = (
  statusCode: number,
  expect: readonly (number | StatusClass)[],
): HealthState => {
  if (matchesExpectation(statusCode, expect)) {
    return "HEALTHY";
  }
  return WARMING_UP_CODES.has(statusCode) ? "STARTING" : "UNHEALTHY";
};

/**
 * Signals observed while producing a probe result, matched against the
 * caveat allowlist.
 */
export interface ObservedSignals {
  statusCode?: number;
  /** Only set when the container is running. */
  runtimeHealth?: ContainerHealth;
}

/**
 * Reclassify a non-healthy result as healthy when the service is on the
 * caveat allowlist for the signal it emitted. The caveat note travels with the
 * result for display.
 */
export const applyCaveat = (
  result: ProbeResult,
  caveat: CaveatEntry | undefined,
  signals: ObservedSignals,
): ProbeResult => {
  if (!caveat || result.state === "HEALTHY") {
    return result;
  }
  if (result.state !== "UNHEALTHY" && result.state !== "STARTING") {
    return result;
  }

  const codeMatches =
    signals.statusCode !== undefined && caveat.statusCodes.includes(signals.statusCode);
  const healthMatches =
    signals.runtimeHealth !== undefined && caveat.runtimeHealth.includes(signals.runtimeHealth);

  if (!codeMatches && !healthMatches) {
    return result;
  }

  return { ...result, state: "HEALTHY", caveat: caveat.note };
};
