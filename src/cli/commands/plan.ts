import { Command } from "commander";

import { planStartup } from "@/domains/planner";

import { runAction } from "../action";
import type { CliRuntime } from "../runtime";

export const createPlanCommand = (runtime: CliRuntime): Command =>
  new Command("plan")
    .description("Print the startup waves without starting anything")
    .action(async (_options: unknown, command: Command) => {
      await runAction(runtime, command, async (session, render) => {
        runtime.out(render.plan(planStartup(session.config.stack.services)));
      });
    });
