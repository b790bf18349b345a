export * from "./health";
export * from "./reconciler";
export { createMonitor, type Monitor, type MonitorDeps } from "./monitor";
export {
  createOrchestrator,
  type BringUpOptions,
  type BringUpResult,
  type BringUpStage,
  type BringUpSummary,
  type Orchestrator,
  type OrchestratorDeps,
  type ServiceFailure,
  type WaveReport,
} from "./orchestrator";
export { createOperationQueue, type OperationQueue } from "./queue";
export { createDryRunStack, createStack, type Stack, type StackDeps } from "./stack";
