import { Command } from "commander";

import { startHttpServer } from "@/server";

import { runAction } from "../action";
import type { CliRuntime } from "../runtime";

import { parsePort } from "./options";

const untilAborted = (signal: AbortSignal): Promise<void> =>
  new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    signal.addEventListener("abort", () => resolve(), { once: true });
  });

export const createServeCommand = (runtime: CliRuntime): Command =>
  new Command("serve")
    .description("Serve /health, /status and /metrics until interrupted")
    .option("-p, --port <port>", "Port to listen on (default STATUS_PORT)", parsePort)
    .action(async (options: { port?: number }, command: Command) => {
      await runAction(runtime, command, async (session) => {
        const stack = session.stack();
        const interrupt = runtime.interrupt();
        try {
          const server = await startHttpServer({
            port: options.port ?? session.config.server.port,
            logger: session.logger,
            monitor: stack.monitor,
            registry: stack.registry,
          });
          await untilAborted(interrupt.signal);
          await server.close();
        } finally {
          interrupt.dispose();
        }
      });
    });
