/**
 * Service, probe and health types for the stack.
 */

import * as v from "valibot";

// --- Health ---

export const healthStateSchema = v.picklist([
  "UNKNOWN",
  "STARTING",
  "HEALTHY",
  "UNHEALTHY",
  "STOPPED",
  "NOT_FOUND",
] as const);

export type HealthState = v.InferOutput<typeof healthStateSchema>;

/**
 * Outcome of one probe evaluation.
 */
export interface ProbeResult {
  service: string;
  state: HealthState;
  /** HTTP status code, for HTTP probes that got a response. */
  statusCode?: number;
  /** Set when a non-standard signal was accepted through the caveat allowlist. */
  caveat?: string;
  detail?: string;
  checkedAt: Date;
}

// --- Probes ---

/** `2xx` style status classes accepted by HTTP probes. */
export const statusClassSchema = v.picklist(["2xx", "3xx", "4xx", "5xx"] as const);

export type StatusClass = v.InferOutput<typeof statusClassSchema>;

const statusCodeSchema = v.pipe(v.number(), v.integer(), v.minValue(100), v.maxValue(599));

export const probeSpecSchema = v.variant("kind", [
  v.object({ kind: v.literal("runtime") }),
  v.object({
    kind: v.literal("http"),
    url: v.pipe(v.string(), v.url()),
    expect: v.pipe(v.array(v.union([statusCodeSchema, statusClassSchema])), v.minLength(1)),
  }),
  v.object({
    kind: v.literal("exec"),
    command: v.pipe(v.array(v.pipe(v.string(), v.minLength(1))), v.minLength(1)),
  }),
]);

export type ProbeSpec = v.InferOutput<typeof probeSpecSchema>;

// --- Services ---

export const serviceNameSchema = v.pipe(
  v.string(),
  v.regex(/^[a-z0-9][a-z0-9_-]*$/, "service names must be lowercase compose service names"),
);

export interface ServiceNode {
  /** Compose service name; stable identifier across the stack. */
  name: string;
  /** Container name reported by the runtime. */
  container: string;
  description: string;
  dependsOn: readonly string[];
  /** Absent means the runtime's own health report is used. */
  probe?: ProbeSpec;
  timeoutMs: number;
  intervalMs: number;
  /** Failure of a mandatory service aborts the remaining waves. */
  mandatory: boolean;
}

export const containerHealthSchema = v.picklist(["healthy", "unhealthy", "starting", "none"] as const);

export type ContainerHealth = v.InferOutput<typeof containerHealthSchema>;

export const containerStatusSchema = v.picklist([
  "created",
  "running",
  "restarting",
  "paused",
  "exited",
  "dead",
  "removing",
  "absent",
] as const);

export type ContainerStatus = v.InferOutput<typeof containerStatusSchema>;

/**
 * Container state as reported by the execution environment.
 */
export interface RuntimeState {
  status: ContainerStatus;
  health: ContainerHealth;
}

/**
 * Non-standard readiness signals a service is known to emit while functional.
 */
export interface CaveatEntry {
  service: string;
  note: string;
  statusCodes: readonly number[];
  runtimeHealth: readonly ContainerHealth[];
}

// --- Status ---

export interface ServiceStatus {
  state: HealthState;
  checkedAt: Date | null;
  caveat?: string;
  detail?: string;
  statusCode?: number;
}

/** Service name to last known status, in declaration order. */
export type StackStatus = ReadonlyMap<string, ServiceStatus>;
