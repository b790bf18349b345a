/**
 * Process-facing side of the CLI: env resolution, output streams, exit code
 * and interrupt handling. Commands only see the `CliRuntime` interface.
 */

import { type ColorSupportLevel, supportsColor } from "chalk";

import { DEFAULT_STACK_FILE, loadStackDefinition } from "@/domains/services";
import { type StackConfig, createStackConfig } from "@/lib/config";
import { type ConfigSource, createConfigSource, parseEnv, resolveEnvValues } from "@/lib/env";
import { type Logger, createLogger } from "@/lib/logger";
import { type Stack, createDryRunStack, createStack } from "@/worker";

export type GlobalOptions = {
  envFile?: string;
  stackFile?: string;
};

export interface CliSession {
  config: StackConfig;
  configSource: ConfigSource;
  logger: Logger;
  /** Created on first use; `plan` and `check-env` never touch the runtime or the store. */
  stack: () => Stack;
  /** Simulated runtime and in-memory database, for `up --dry-run`. */
  dryRunStack: () => Stack;
  close: () => Promise<void>;
}

export interface Interrupt {
  signal: AbortSignal;
  dispose: () => void;
}

export interface CliRuntime {
  open: (options: GlobalOptions) => CliSession;
  out: (text: string) => void;
  err: (text: string) => void;
  setExitCode: (code: number) => void;
  /** Aborts on SIGINT or SIGTERM until disposed. */
  interrupt: () => Interrupt;
  colorLevel: ColorSupportLevel;
}

export const createSession = (
  parts: Omit<CliSession, "stack" | "dryRunStack" | "close"> & {
    createStack: () => Stack;
    createDryRunStack: () => Stack;
  },
): CliSession => {
  let stack: Stack | null = null;
  let dryRunStack: Stack | null = null;

  return {
    config: parts.config,
    configSource: parts.configSource,
    logger: parts.logger,
    stack: () => {
      stack ??= parts.createStack();
      return stack;
    },
    dryRunStack: () => {
      dryRunStack ??= parts.createDryRunStack();
      return dryRunStack;
    },
    close: async () => {
      const open = [stack, dryRunStack];
      stack = null;
      dryRunStack = null;
      for (const entry of open) {
        await entry?.close();
      }
    },
  };
};

export const createProcessRuntime = (): CliRuntime => ({
  open: (options) => {
    const values = resolveEnvValues(options.envFile, process.env);
    const env = parseEnv(values);
    const definition = loadStackDefinition(options.stackFile ?? env.STACK_FILE ?? DEFAULT_STACK_FILE);
    const config = createStackConfig(env, definition);
    const configSource = createConfigSource(values);
    const logger = createLogger({ level: config.logging.level, format: config.logging.format });

    return createSession({
      config,
      configSource,
      logger,
      createStack: () => createStack({ config, configSource, logger }),
      createDryRunStack: () => createDryRunStack({ config, configSource, logger }),
    });
  },

  out: (text) => {
    process.stdout.write(`${text}\n`);
  },

  err: (text) => {
    process.stderr.write(`${text}\n`);
  },

  setExitCode: (code) => {
    process.exitCode = code;
  },

  interrupt: () => {
    const controller = new AbortController();
    const onSignal = (): void => controller.abort();
    process.once("SIGINT", onSignal);
    process.once("SIGTERM", onSignal);
    return {
      signal: controller.signal,
      dispose: () => {
        process.off("SIGINT", onSignal);
        process.off("SIGTERM", onSignal);
      },
    };
  },

  colorLevel: supportsColor ? supportsColor.level : 0,
});
