/**
 * Terminal rendering for stackctl output. Colour is off at level 0, which
 * keeps the text identical apart from escape codes.
 */

import { Chalk, type ChalkInstance, type ColorSupportLevel } from "chalk";

import type { StartupPlan } from "@/domains/planner";
import type { ServiceRegistry } from "@/domains/services";
import type { HealthState, StackStatus } from "@/domains/services/types";
import type { ConfigValidation } from "@/lib/env";
import { isStackError } from "@/lib/errors";
import type { BootstrapReport, BringUpResult } from "@/worker";

export interface Renderer {
  status: (status: StackStatus, registry: ServiceRegistry) => string;
  plan: (plan: StartupPlan) => string;
  validation: (validation: ConfigValidation) => string;
  bootstrap: (report: BootstrapReport) => string;
  bringUp: (result: BringUpResult) => string;
  success: (message: string) => string;
  error: (error: unknown) => string;
}

/** Width of the longest health state name. */
const STATE_WIDTH = 9;

const seconds = (ms: number): string => `${(ms / 1000).toFixed(1)}s`;

const paintState = (chalk: ChalkInstance, state: HealthState, text: string): string => {
  switch (state) {
    case "HEALTHY":
      return chalk.green(text);
    case "STARTING":
    case "UNKNOWN":
      return chalk.yellow(text);
    default:
      return chalk.red(text);
  }
};

export const createRenderer = (level: ColorSupportLevel): Renderer => {
  const chalk = new Chalk({ level });

  const error = (value: unknown): string => {
    if (isStackError(value)) {
      return [chalk.red(`✖ ${value.message}`), chalk.dim(`  hint: ${value.hint}`)].join("\n");
    }
    return chalk.red(`✖ ${value instanceof Error ? value.message : String(value)}`);
  };

  return {
    status: (status, registry) => {
      const names = [...status.keys()];
      const width = Math.max("SERVICE".length, ...names.map((name) => name.length));
      const header = chalk.bold(`${"SERVICE".padEnd(width)}  ${"STATE".padEnd(STATE_WIDTH)}  DETAIL`);

      const rows = [...status.entries()].map(([name, entry]) => {
        const notes = [
          entry.detail,
          entry.caveat !== undefined ? chalk.yellow(`caveat: ${entry.caveat}`) : undefined,
          registry.get(name).mandatory ? undefined : chalk.dim("optional"),
        ].filter((note): note is string => note !== undefined && note !== "");
        const state = paintState(chalk, entry.state, entry.state.padEnd(STATE_WIDTH));
        return `${name.padEnd(width)}  ${state}  ${notes.join("; ")}`.trimEnd();
      });

      return [header, ...rows].join("\n");
    },

    plan: (plan) =>
      plan.waves.map((wave, index) => `${chalk.cyan(`wave ${index}`)}  ${wave.join(", ")}`).join("\n"),

    validation: (validation) => {
      const lines = [
        validation.ok ? chalk.green("✔ Environment is ready") : chalk.red("✖ Environment is not ready"),
      ];
      if (validation.missingKeys.length > 0) {
        lines.push(`  missing: ${validation.missingKeys.join(", ")}`);
      }
      if (validation.placeholderKeys.length > 0) {
        lines.push(`  placeholder values: ${validation.placeholderKeys.join(", ")}`);
      }
      if (validation.optionalMissing.length > 0) {
        lines.push(chalk.dim(`  optional, not set: ${validation.optionalMissing.join(", ")}`));
      }
      return lines.join("\n");
    },

    bootstrap: (report) => {
      const lines = [chalk.bold(`Bootstrap (${report.mode}) finished in ${seconds(report.durationMs)}`)];
      if (report.reset.length > 0) {
        lines.push(chalk.yellow(`  reset: ${report.reset.join(", ")}`));
      }
      for (const step of report.steps) {
        const outcome = step.outcome === "applied" ? chalk.green("applied") : chalk.dim("skipped");
        lines.push(`  ${outcome}  ${step.id}`);
      }
      return lines.join("\n");
    },

    bringUp: (result) => {
      const lines: string[] = [];
      for (const wave of result.waves) {
        const parts = [chalk.cyan(`${wave.stage} wave ${wave.index}`)];
        if (wave.started.length > 0) {
          parts.push(`started ${wave.started.join(", ")}`);
        }
        if (wave.skipped.length > 0) {
          parts.push(chalk.dim(`already healthy ${wave.skipped.join(", ")}`));
        }
        lines.push(parts.join("  "));
        for (const failure of wave.failures) {
          const suffix = failure.mandatory ? "" : " (optional)";
          lines.push(chalk.red(`  ✖ ${failure.error.message}${suffix}`));
        }
      }

      if (result.bootstrap) {
        const applied = result.bootstrap.steps.filter((step) => step.outcome === "applied").length;
        lines.push(`bootstrap  ${applied} of ${result.bootstrap.steps.length} steps applied`);
      }

      lines.push(
        result.ok
          ? chalk.green(`✔ Stack is up in ${seconds(result.durationMs)}`)
          : error(result.error),
      );
      return lines.join("\n");
    },

    success: (message) => chalk.green(`✔ ${message}`),

    error,
  };
};
