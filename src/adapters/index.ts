/**
 * Execution environment adapters.
 */

export type { ExecResult, ExecutionEnvironment, LogOptions } from "./types";

export { createComposeEnvironment, createDockerRunner, parseContainerState } from "./docker";
export type { CommandResult, CommandRunner, ComposeEnvironmentConfig } from "./docker";

export { createSimulatedEnvironment } from "./simulated/environment";
export type { SimulatedEnvironment, SimulatedService } from "./simulated/environment";
