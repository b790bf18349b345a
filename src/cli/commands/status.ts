import { Command } from "commander";

import { serializeStatus } from "@/server/routes/status";

import { runAction } from "../action";
import type { CliRuntime } from "../runtime";

export const createStatusCommand = (runtime: CliRuntime): Command =>
  new Command("status")
    .description("Probe every service once and print its state")
    .option("--json", "Print JSON instead of a table")
    .action(async (options: { json?: boolean }, command: Command) => {
      await runAction(runtime, command, async (session, render) => {
        const stack = session.stack();
        const status = await stack.monitor.status();
        runtime.out(
          options.json
            ? JSON.stringify(serializeStatus(status, stack.registry), null, 2)
            : render.status(status, stack.registry),
        );
      });
    });
