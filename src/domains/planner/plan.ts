/**
 * Startup planner: orders services into waves.
 *
 * Wave 0 holds every service without dependencies; each following wave holds
 * the services whose dependencies all sit in earlier waves. Within a wave,
 * services keep their declaration order.
 */

import type { ServiceNode } from "@/domains/services/types";
import { ConfigurationError, CycleError } from "@/lib/errors";

export interface StartupPlan {
  waves: readonly (readonly string[])[];
}

type PlannableNode = Pick<ServiceNode, "name" | "dependsOn">;

/**
 * Find one cycle among the unscheduled nodes by walking dependency edges.
 * Every unscheduled node has at least one unscheduled dependency, so the walk
 * always revisits a node.
 */
const findCycle = (remaining: ReadonlyMap<string, PlannableNode>): string[] => {
  const [start] = remaining.keys();
  if (start === undefined) {
    return [];
  }

  const path: string[] = [];
  const position = new Map<string, number>();
  let current: string | undefined = start;

  while (current !== undefined && !position.has(current)) {
    position.set(current, path.length);
    path.push(current);
    const node = remaining.get(current);
    current = node?.dependsOn.find((dep) => remaining.has(dep));
  }

  if (current === undefined) {
    return path;
  }
  const from = position.get(current) ?? 0;
  return [...path.slice(from), current];
};

/**
 * Compute the startup waves for a set of services.
 *
 * @throws {CycleError} If any service cannot be scheduled. No partial plan is returned.
 */
export const planStartup = (nodes: readonly PlannableNode[]): StartupPlan => {
  const remaining = new Map<string, PlannableNode>(nodes.map((node) => [node.name, node]));
  for (const node of nodes) {
    const undeclared = node.dependsOn.filter((dep) => !remaining.has(dep));
    if (undeclared.length > 0) {
      throw new ConfigurationError(
        `Service ${node.name} depends on services outside the plan: ${undeclared.join(", ")}`,
        [],
        [],
        node.name,
      );
    }
  }
  const scheduled = new Set<string>();
  const waves: string[][] = [];

  while (remaining.size > 0) {
    const wave = [...remaining.values()]
      .filter((node) => node.dependsOn.every((dep) => scheduled.has(dep)))
      .map((node) => node.name);

    if (wave.length === 0) {
      throw new CycleError([...remaining.keys()], findCycle(remaining));
    }

    for (const name of wave) {
      remaining.delete(name);
      scheduled.add(name);
    }
    waves.push(wave);
  }

  return { waves };
};

/**
 * Services in `roots` plus everything they transitively depend on, in
 * declaration order.
 */
export const dependencyClosure = <T extends PlannableNode>(
  nodes: readonly T[],
  roots: readonly string[],
): T[] => {
  const byName = new Map(nodes.map((node) => [node.name, node]));
  const included = new Set<string>();
  const stack = [...roots];

  while (stack.length > 0) {
    const name = stack.pop();
    if (name === undefined || included.has(name)) {
      continue;
    }
    const node = byName.get(name);
    if (!node) {
      continue;
    }
    included.add(name);
    stack.push(...node.dependsOn);
  }

  return nodes.filter((node) => included.has(node.name));
};
