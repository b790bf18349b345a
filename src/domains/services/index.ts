export type {
  CaveatEntry,
  ContainerHealth,
  ContainerStatus,
  HealthState,
  ProbeResult,
  ProbeSpec,
  RuntimeState,
  ServiceNode,
  ServiceStatus,
  StackStatus,
  StatusClass,
} from "./types";
export { healthStateSchema, probeSpecSchema } from "./types";

export type { StackDefinition } from "./definition";
export { DEFAULT_STACK_FILE, loadStackDefinition, parseStackDefinition } from "./definition";

export type { ServiceRegistry } from "./registry";
export { createServiceRegistry } from "./registry";

export type { StatusStore } from "./status";
export { createStatusStore } from "./status";
