/**
 * Data-store bootstrap.
 */

export type {
  BootstrapMode,
  BootstrapReport,
  BootstrapStep,
  StepOutcome,
  StepReport,
} from "./types";

export {
  advisoryLockStatement,
  advisoryUnlockStatement,
  createBootstrapSteps,
  quoteIdent,
  quoteLiteral,
  type CatalogueOptions,
} from "./steps";

export { createBootstrapReconciler, type BootstrapReconciler, type BootstrapReconcilerDeps } from "./reconcile";
