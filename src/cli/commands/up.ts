import { Command } from "commander";

import { runAction } from "../action";
import type { CliRuntime } from "../runtime";

export const createUpCommand = (runtime: CliRuntime): Command =>
  new Command("up")
    .description("Start every service in dependency order and bootstrap the database")
    .option("--dry-run", "Rehearse on a simulated runtime and in-memory database")
    .action(async (options: { dryRun?: boolean }, command: Command) => {
      await runAction(runtime, command, async (session, render) => {
        const interrupt = runtime.interrupt();
        try {
          if (options.dryRun) {
            runtime.out("Dry run: simulated runtime and in-memory database, nothing is started");
          }
          const stack = options.dryRun ? session.dryRunStack() : session.stack();
          const result = await stack.orchestrator.bringUp({ signal: interrupt.signal });
          runtime.out(render.bringUp(result));
          if (!result.ok) {
            runtime.setExitCode(1);
          }
        } finally {
          interrupt.dispose();
        }
      });
    });
