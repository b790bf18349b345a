/**
 * Child process plumbing for the docker CLI, on execa.
 */

import { createInterface } from "node:readline";

import { execa } from "execa";

export interface CommandResult {
  /** Undefined when the process could not be spawned. */
  exitCode: number | undefined;
  stdout: string;
  stderr: string;
  failed: boolean;
  isCanceled: boolean;
}

export interface CommandOptions {
  cwd?: string;
  signal?: AbortSignal;
}

export interface CommandRunner {
  run: (args: readonly string[], options?: CommandOptions) => Promise<CommandResult>;
  /** Combined stdout and stderr, line by line. */
  stream: (args: readonly string[], options?: CommandOptions) => AsyncIterable<string>;
}

export const createDockerRunner = (binary = "docker"): CommandRunner => ({
  run: async (args, options = {}) => {
    const result = await execa(binary, [...args], {
      cwd: options.cwd,
      signal: options.signal,
      reject: false,
    });
    return {
      exitCode: result.exitCode,
      stdout: result.stdout,
      stderr: result.failed && result.stderr === "" ? `${result.command} failed` : result.stderr,
      failed: result.failed,
      isCanceled: result.isCanceled,
    };
  },

  async *stream(args, options = {}) {
    const subprocess = execa(binary, [...args], {
      cwd: options.cwd,
      signal: options.signal,
      reject: false,
      buffer: false,
      all: true,
    });
    if (subprocess.all) {
      const lines = createInterface({ input: subprocess.all, crlfDelay: Number.POSITIVE_INFINITY });
      for await (const line of lines) {
        yield line;
      }
    }
    const result = await subprocess;
    if (result.failed && !result.isCanceled) {
      throw new Error(`${result.command} exited with code ${result.exitCode}`);
    }
  },
});
