import { Command } from "commander";

import { runAction } from "../action";
import type { CliRuntime } from "../runtime";

export const createRestartCommand = (runtime: CliRuntime): Command =>
  new Command("restart")
    .description("Restart one service")
    .argument("<service>", "Service name")
    .action(async (service: string, _options: unknown, command: Command) => {
      await runAction(runtime, command, async (session, render) => {
        await session.stack().restart(service);
        runtime.out(render.success(`Restarted ${service}`));
      });
    });
