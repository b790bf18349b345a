/**
 * Bootstrap reconciler types.
 */

import type { Statement } from "@/lib/db/ports/data-store";

// --- Steps ---

/**
 * One named, checked unit of data-store bootstrap.
 *
 * A step whose `satisfied` query returns a row is skipped; a step without one
 * always runs its action, which must then be safe to repeat.
 */
export interface BootstrapStep {
  id: string;
  description: string;
  /** Must return a row before the step may run. */
  precondition?: Statement;
  satisfied?: Statement;
  action: readonly Statement[];
  /** Must return a row after the action. */
  postcondition?: Statement;
  /** Destructive teardown, run in reverse step order by repair only. */
  reset?: readonly Statement[];
}

// --- Report ---

export type BootstrapMode = "reconcile" | "repair";

export type StepOutcome = "applied" | "skipped";

export interface StepReport {
  id: string;
  outcome: StepOutcome;
  durationMs: number;
}

export interface BootstrapReport {
  mode: BootstrapMode;
  /** Steps whose reset ran, in execution order; empty for reconcile. */
  reset: readonly string[];
  steps: readonly StepReport[];
  durationMs: number;
}
