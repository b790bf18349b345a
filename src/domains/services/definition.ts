/**
 * Stack definition file: the declared services, their probes and the caveat
 * allowlist. Parsed and validated once at startup.
 */

import { readFileSync } from "node:fs";

import * as v from "valibot";

import { ConfigurationError } from "@/lib/errors";

import {
  type CaveatEntry,
  type ServiceNode,
  containerHealthSchema,
  probeSpecSchema,
  serviceNameSchema,
} from "./types";

const durationSchema = v.pipe(v.number(), v.integer(), v.minValue(1));

const serviceEntrySchema = v.object({
  name: serviceNameSchema,
  container: v.pipe(v.string(), v.minLength(1)),
  description: v.optional(v.string()),
  dependsOn: v.optional(v.array(serviceNameSchema), []),
  probe: v.optional(probeSpecSchema),
  timeoutMs: v.optional(durationSchema),
  intervalMs: v.optional(durationSchema),
  mandatory: v.optional(v.boolean(), true),
});

const caveatEntrySchema = v.object({
  service: serviceNameSchema,
  note: v.pipe(v.string(), v.minLength(1)),
  statusCodes: v.optional(v.array(v.pipe(v.number(), v.integer())), []),
  runtimeHealth: v.optional(v.array(containerHealthSchema), []),
});

export const stackDefinitionSchema = v.object({
  defaults: v.optional(
    v.object({
      timeoutMs: v.optional(durationSchema, 300_000),
      intervalMs: v.optional(durationSchema, 2_000),
    }),
    {},
  ),
  services: v.pipe(v.array(serviceEntrySchema), v.minLength(1)),
  caveats: v.optional(v.array(caveatEntrySchema), []),
  bootstrap: v.optional(
    v.object({
      storeService: v.optional(serviceNameSchema),
    }),
    {},
  ),
});

export interface StackDefinition {
  services: readonly ServiceNode[];
  caveats: readonly CaveatEntry[];
  /** Service hosting the data store; bootstrap runs once it is healthy. */
  storeService: string | null;
}

export const DEFAULT_STACK_FILE = new URL("../../../config/stack.json", import.meta.url);

export const parseStackDefinition = (raw: unknown, source = "stack definition"): StackDefinition => {
  const result = v.safeParse(stackDefinitionSchema, raw);
  if (!result.success) {
    const issues = result.issues.map(
      (issue) => `${issue.path?.map((item) => String(item.key)).join(".") ?? "(root)"}: ${issue.message}`,
    );
    throw new ConfigurationError(`Invalid ${source}: ${issues.join("; ")}`);
  }

  const { defaults, services, caveats, bootstrap } = result.output;

  return {
    services: services.map(
      (entry): ServiceNode => ({
        name: entry.name,
        container: entry.container,
        description: entry.description ?? entry.name,
        dependsOn: entry.dependsOn,
        ...(entry.probe && { probe: entry.probe }),
        timeoutMs: entry.timeoutMs ?? defaults.timeoutMs,
        intervalMs: entry.intervalMs ?? defaults.intervalMs,
        mandatory: entry.mandatory,
      }),
    ),
    caveats,
    storeService: bootstrap.storeService ?? null,
  };
};

export const loadStackDefinition = (file: string | URL = DEFAULT_STACK_FILE): StackDefinition => {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(file, "utf8"));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Cannot read stack definition ${String(file)}: ${message}`);
  }
  return parseStackDefinition(raw, String(file));
};
