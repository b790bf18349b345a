/**
 * Bootstrap reconciler: converges the data store onto the step catalogue.
 *
 * Every run holds a PostgreSQL advisory lock so two processes never bootstrap
 * the same store at once. The lock is re-entrant within one session, so runs
 * inside this process are also refused while another is in flight. `reconcile` is safe to repeat; `repair` first runs
 * the destructive resets in reverse step order.
 *
 * @see {@link ./steps.ts Step catalogue}
 */

import type { Clock } from "@/lib/clock";
import type { DataStore, Statement } from "@/lib/db/ports/data-store";
import { type BootstrapPhase, BootstrapStepError, ConcurrentRunError } from "@/lib/errors";
import type { Logger } from "@/lib/logger";

import { advisoryLockStatement, advisoryUnlockStatement } from "./steps";
import type { BootstrapMode, BootstrapReport, BootstrapStep, StepReport } from "./types";

export interface BootstrapReconcilerDeps {
  store: DataStore;
  steps: readonly BootstrapStep[];
  lockKey: number;
  clock: Clock;
  logger: Logger;
}

export interface BootstrapReconciler {
  reconcile: () => Promise<BootstrapReport>;
  /** Destructive. Callers must confirm with the operator first. */
  repair: () => Promise<BootstrapReport>;
}

const LOCK_SUBJECT = "advisory-lock";

export const createBootstrapReconciler = (deps: BootstrapReconcilerDeps): BootstrapReconciler => {
  const { store, steps, lockKey, clock, logger } = deps;
  let inFlight = false;

  const run = async (step: string, phase: BootstrapPhase, statement: Statement) => {
    const result = await store.execute(statement);
    if (!result.ok) {
      throw new BootstrapStepError(step, phase, result.error.message, result.error.code);
    }
    return result.rows;
  };

  const requireRow = async (step: string, phase: BootstrapPhase, statement: Statement): Promise<void> => {
    const rows = await run(step, phase, statement);
    if (rows.length === 0) {
      throw new BootstrapStepError(step, phase, `${phase} not met: ${statement.sql}`);
    }
  };

  const applyStep = async (step: BootstrapStep): Promise<StepReport> => {
    const startedAt = clock.now();

    if (step.precondition) {
      await requireRow(step.id, "precondition", step.precondition);
    }

    if (step.satisfied) {
      const rows = await run(step.id, "check", step.satisfied);
      if (rows.length > 0) {
        logger.debug("Bootstrap step already satisfied", { step: step.id });
        return { id: step.id, outcome: "skipped", durationMs: clock.now() - startedAt };
      }
    }

    for (const statement of step.action) {
      await run(step.id, "action", statement);
    }

    if (step.postcondition) {
      await requireRow(step.id, "postcondition", step.postcondition);
    }

    logger.info("Bootstrap step applied", { step: step.id, description: step.description });
    return { id: step.id, outcome: "applied", durationMs: clock.now() - startedAt };
  };

  const resetSteps = async (): Promise<string[]> => {
    const reset: string[] = [];
    for (const step of [...steps].reverse()) {
      if (!step.reset) {
        continue;
      }
      logger.warn("Resetting bootstrap step", { step: step.id });
      for (const statement of step.reset) {
        await run(step.id, "reset", statement);
      }
      reset.push(step.id);
    }
    return reset;
  };

  const withLock = async <T>(fn: () => Promise<T>): Promise<T> => {
    const rows = await run(LOCK_SUBJECT, "lock", advisoryLockStatement(lockKey));
    if (rows[0]?.acquired !== true) {
      throw new ConcurrentRunError("bootstrap");
    }
    try {
      return await fn();
    } finally {
      const released = await store.execute(advisoryUnlockStatement(lockKey));
      if (!released.ok) {
        logger.warn("Failed to release bootstrap lock", { lockKey, error: released.error.message });
      }
    }
  };

  const execute = async (mode: BootstrapMode): Promise<BootstrapReport> => {
    if (inFlight) {
      throw new ConcurrentRunError("bootstrap");
    }
    inFlight = true;
    try {
      return await runLocked(mode);
    } finally {
      inFlight = false;
    }
  };

  const runLocked = async (mode: BootstrapMode): Promise<BootstrapReport> => {
    const startedAt = clock.now();
    logger.info("Bootstrap started", { mode, steps: steps.length });

    return withLock(async () => {
      const reset = mode === "repair" ? await resetSteps() : [];
      const reports: StepReport[] = [];
      for (const step of steps) {
        reports.push(await applyStep(step));
      }

      const report: BootstrapReport = {
        mode,
        reset,
        steps: reports,
        durationMs: clock.now() - startedAt,
      };
      logger.info("Bootstrap completed", {
        mode,
        applied: reports.filter((step) => step.outcome === "applied").length,
        skipped: reports.filter((step) => step.outcome === "skipped").length,
        durationMs: report.durationMs,
      });
      return report;
    });
  };

  return {
    reconcile: () => execute("reconcile"),
    repair: () => execute("repair"),
  };
};
