import { Command } from "commander";

import { runAction } from "../action";
import type { CliRuntime } from "../runtime";

export const createCheckEnvCommand = (runtime: CliRuntime): Command =>
  new Command("check-env")
    .description("Check that every required variable is set to a real value")
    .action(async (_options: unknown, command: Command) => {
      await runAction(runtime, command, async (session, render) => {
        const validation = session.configSource.validate();
        runtime.out(render.validation(validation));
        if (!validation.ok) {
          runtime.setExitCode(1);
        }
      });
    });
