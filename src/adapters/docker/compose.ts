/**
 * Docker Compose execution environment.
 *
 * Services are started by compose service name; state, exec and health are
 * read from the container by its container name.
 */

import * as v from "valibot";

import type { RuntimeState, ServiceNode } from "@/domains/services/types";
import { containerStatusSchema } from "@/domains/services/types";
import { RuntimeUnavailableError, ServiceStartError } from "@/lib/errors";
import type { Logger } from "@/lib/logger";

import type { ExecResult, ExecutionEnvironment, LogOptions } from "../types";

import { type CommandRunner, createDockerRunner } from "./process";

export interface ComposeEnvironmentConfig {
  composeFile: string;
  projectDir: string;
  logger: Logger;
  runner?: CommandRunner;
}

const containerStateSchema = v.object({
  Status: containerStatusSchema,
  Health: v.optional(
    v.nullable(
      v.object({
        Status: v.picklist(["starting", "healthy", "unhealthy"]),
      }),
    ),
  ),
});

const MISSING_CONTAINER = /no such (object|container)/i;

/**
 * Parse `docker inspect --format '{{json .State}}'` output.
 */
export const parseContainerState = (output: string): RuntimeState => {
  let raw: unknown;
  try {
    raw = JSON.parse(output);
  } catch {
    throw new RuntimeUnavailableError(`unexpected docker inspect output: ${output.slice(0, 200)}`);
  }
  const result = v.safeParse(containerStateSchema, raw);
  if (!result.success) {
    throw new RuntimeUnavailableError(
      `unexpected container state: ${result.issues.map((issue) => issue.message).join("; ")}`,
    );
  }
  return {
    status: result.output.Status,
    health: result.output.Health?.Status ?? "none",
  };
};

export const createComposeEnvironment = (config: ComposeEnvironmentConfig): ExecutionEnvironment => {
  const runner = config.runner ?? createDockerRunner();
  const { logger } = config;
  const compose = ["compose", "-f", config.composeFile, "--project-directory", config.projectDir];
  const cwd = config.projectDir;

  return {
    ping: async (): Promise<void> => {
      const result = await runner.run(["info", "--format", "{{.ServerVersion}}"], { cwd });
      if (result.failed) {
        throw new RuntimeUnavailableError(result.stderr || "docker info failed");
      }
      logger.debug("Container runtime reachable", { serverVersion: result.stdout });
    },

    start: async (nodes: readonly ServiceNode[]): Promise<void> => {
      if (nodes.length === 0) {
        return;
      }
      const names = nodes.map((node) => node.name);
      logger.debug("Starting services", { services: names });
      const result = await runner.run([...compose, "up", "-d", "--no-deps", ...names], { cwd });
      if (result.failed) {
        throw new ServiceStartError(names.join(", "), result.stderr || `exit code ${String(result.exitCode)}`);
      }
    },

    inspect: async (node: ServiceNode): Promise<RuntimeState> => {
      const result = await runner.run(["inspect", "--format", "{{json .State}}", node.container], { cwd });
      if (result.failed) {
        if (MISSING_CONTAINER.test(result.stderr)) {
          return { status: "absent", health: "none" };
        }
        throw new RuntimeUnavailableError(result.stderr || `docker inspect ${node.container} failed`);
      }
      return parseContainerState(result.stdout);
    },

    exec: async (node: ServiceNode, command: readonly string[], signal?: AbortSignal): Promise<ExecResult> => {
      const result = await runner.run(["exec", node.container, ...command], { cwd, signal });
      return {
        exitCode: result.exitCode ?? -1,
        stdout: result.stdout,
        stderr: result.stderr,
      };
    },

    logs: (node: ServiceNode, options: LogOptions = {}): AsyncIterable<string> => {
      const args = [
        ...compose,
        "logs",
        "--no-color",
        ...(options.tail !== undefined ? ["--tail", String(options.tail)] : []),
        ...(options.follow ? ["--follow"] : []),
        node.name,
      ];
      return runner.stream(args, { cwd, signal: options.signal });
    },

    restart: async (node: ServiceNode): Promise<void> => {
      logger.info("Restarting service", { service: node.name });
      const result = await runner.run([...compose, "restart", node.name], { cwd });
      if (result.failed) {
        throw new ServiceStartError(node.name, result.stderr || `exit code ${String(result.exitCode)}`);
      }
    },
  };
};
