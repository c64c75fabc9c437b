/**
 * Dependency resolution for one entity type's calculators.
 *
 * Depth-first topological sort with visiting/visited sets. Unlike a metric
 * graph over external facts, every dependency here must itself be a
 * registered calculator of the same entity type.
 */

import type { EntityType } from "@/lib/entities";
import { ForecastConfigError } from "@/lib/errors";

export interface DependencyNode {
  name: string;
  dependencies: readonly string[];
}

/**
 * Order calculators so each runs after its dependencies.
 * Ties keep registration order. Throws MISSING_DEPENDENCY or DEPENDENCY_CYCLE.
 */
export function resolveCalculatorOrder(
  entityType: EntityType,
  nodes: readonly DependencyNode[],
): string[] {
  const byName = new Map<string, DependencyNode>();
  for (const node of nodes) byName.set(node.name, node);

  const visited = new Set<string>();
  const visiting: string[] = [];
  const sorted: string[] = [];

  function visit(name: string, requiredBy: string | null): void {
    if (visited.has(name)) return;

    const cycleStart = visiting.indexOf(name);
    if (cycleStart !== -1) {
      const path = [...visiting.slice(cycleStart), name].join(" -> ");
      throw new ForecastConfigError(
        "DEPENDENCY_CYCLE",
        `${entityType} calculators form a cycle: ${path}`,
      );
    }

    const node = byName.get(name);
    if (!node) {
      throw new ForecastConfigError(
        "MISSING_DEPENDENCY",
        `${entityType}.${requiredBy ?? "?"} depends on unregistered calculator "${name}"`,
      );
    }

    visiting.push(name);
    for (const dep of node.dependencies) visit(dep, name);
    visiting.pop();

    visited.add(name);
    sorted.push(name);
  }

  for (const node of nodes) visit(node.name, null);
  return sorted;
}
