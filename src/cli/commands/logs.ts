import { Command } from "commander";

import { runAction } from "../action";
import type { CliRuntime } from "../runtime";

import { parseCount } from "./options";

export const createLogsCommand = (runtime: CliRuntime): Command =>
  new Command("logs")
    .description("Print a service's logs")
    .argument("<service>", "Service name")
    .option("-n, --tail <lines>", "Only the last N lines", parseCount)
    .option("-f, --follow", "Keep streaming new lines until interrupted")
    .action(async (service: string, options: { tail?: number; follow?: boolean }, command: Command) => {
      await runAction(runtime, command, async (session) => {
        const interrupt = runtime.interrupt();
        try {
          const lines = session.stack().monitor.logs(service, {
            ...(options.tail !== undefined && { tail: options.tail }),
            follow: options.follow ?? false,
            signal: interrupt.signal,
          });
          for await (const line of lines) {
            runtime.out(line);
          }
        } finally {
          interrupt.dispose();
        }
      });
    });
