import { Command } from "commander";

import { runAction } from "../action";
import type { CliRuntime } from "../runtime";

export const REPAIR_CONFIRMATION =
  "Repair drops the analytics database and the admin role, ending their sessions. Stop every database client, then re-run with --yes.";

export const createRepairCommand = (runtime: CliRuntime): Command =>
  new Command("repair")
    .description("Drop and recreate the bootstrap objects (destructive)")
    .option("--yes", "Confirm the destructive reset")
    .action(async (options: { yes?: boolean }, command: Command) => {
      if (!options.yes) {
        runtime.err(REPAIR_CONFIRMATION);
        runtime.setExitCode(1);
        return;
      }
      await runAction(runtime, command, async (session, render) => {
        const interrupt = runtime.interrupt();
        try {
          runtime.out(render.bootstrap(await session.stack().repair(interrupt.signal)));
        } finally {
          interrupt.dispose();
        }
      });
    });
