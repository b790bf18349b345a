import type { Command } from "commander";

import { type Renderer, createRenderer } from "./render";
import type { CliRuntime, CliSession, GlobalOptions } from "./runtime";

/**
 * Run one command against a fresh session. Failures are printed with their
 * hint and set exit code 1; the session is always closed.
 */
export const runAction = async (
  runtime: CliRuntime,
  command: Command,
  action: (session: CliSession, render: Renderer) => Promise<void>,
): Promise<void> => {
  const render = createRenderer(runtime.colorLevel);
  let session: CliSession | null = null;

  try {
    session = runtime.open(command.optsWithGlobals<GlobalOptions>());
    await action(session, render);
  } catch (error) {
    runtime.err(render.error(error));
    runtime.setExitCode(1);
  } finally {
    await session?.close();
  }
};
