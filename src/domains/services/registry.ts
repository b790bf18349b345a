/**
 * Typed service registry, validated at construction.
 *
 * Lookups by name go through `get`, which fails with the list of known
 * services instead of returning undefined.
 */

import { ConfigurationError, UnknownServiceError } from "@/lib/errors";

import type { CaveatEntry, ServiceNode } from "./types";

export interface ServiceRegistry {
  /** Services in declaration order. */
  list: () => readonly ServiceNode[];
  names: () => readonly string[];
  has: (name: string) => boolean;
  get: (name: string) => ServiceNode;
  caveatFor: (name: string) => CaveatEntry | undefined;
}

export const createServiceRegistry = (
  services: readonly ServiceNode[],
  caveats: readonly CaveatEntry[] = [],
): ServiceRegistry => {
  const byName = new Map<string, ServiceNode>();

  for (const node of services) {
    if (byName.has(node.name)) {
      throw new ConfigurationError(`Duplicate service name: ${node.name}`, [], [], node.name);
    }
    if (node.timeoutMs <= 0 || node.intervalMs <= 0) {
      throw new ConfigurationError(
        `Service ${node.name} needs positive timeoutMs and intervalMs`,
        [],
        [],
        node.name,
      );
    }
    byName.set(node.name, node);
  }

  for (const node of services) {
    const unknown = node.dependsOn.filter((dep) => !byName.has(dep));
    if (unknown.length > 0) {
      throw new ConfigurationError(
        `Service ${node.name} depends on undeclared services: ${unknown.join(", ")}`,
        [],
        [],
        node.name,
      );
    }
  }

  const caveatsByService = new Map<string, CaveatEntry>();
  for (const caveat of caveats) {
    if (!byName.has(caveat.service)) {
      throw new ConfigurationError(
        `Caveat allowlist references undeclared service: ${caveat.service}`,
        [],
        [],
        caveat.service,
      );
    }
    caveatsByService.set(caveat.service, caveat);
  }

  const ordered = [...services];
  const names = ordered.map((node) => node.name);

  return {
    list: () => ordered,
    names: () => names,
    has: (name) => byName.has(name),
    get: (name) => {
      const node = byName.get(name);
      if (!node) {
        throw new UnknownServiceError(name, names);
      }
      return node;
    },
    caveatFor: (name) => caveatsByService.get(name),
  };
};
