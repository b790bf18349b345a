/**
 * stackctl: operator commands for the stack.
 */

import { Command } from "commander";

import {
  createCheckEnvCommand,
  createLogsCommand,
  createPlanCommand,
  createRepairCommand,
  createRestartCommand,
  createServeCommand,
  createStatusCommand,
  createUpCommand,
} from "./commands";
import type { CliRuntime } from "./runtime";

export const createProgram = (runtime: CliRuntime): Command => {
  const program = new Command();

  program
    .name("stackctl")
    .description("Bring a self-hosted container stack up in dependency order and keep an eye on it")
    .version("0.1.0")
    .option("--env-file <path>", "Env file read under the process environment", ".env")
    .option("--stack-file <path>", "Stack definition (default STACK_FILE or the bundled stack.json)");

  program.addCommand(createUpCommand(runtime));
  program.addCommand(createStatusCommand(runtime));
  program.addCommand(createLogsCommand(runtime));
  program.addCommand(createRestartCommand(runtime));
  program.addCommand(createRepairCommand(runtime));
  program.addCommand(createCheckEnvCommand(runtime));
  program.addCommand(createPlanCommand(runtime));
  program.addCommand(createServeCommand(runtime));

  return program;
};
