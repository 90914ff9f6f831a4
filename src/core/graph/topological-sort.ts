/**
 * Topological Sort
 *
 * Kahn's algorithm with a deterministic tie-break: among the properties whose
 * dependencies are all processed, the one declared first goes next.
 *
 * @module
 */

import { CycleError } from "../errors.js";
import type { PropertyName } from "../declarations/types.js";
import type { DependencyGraph, DependencyNode } from "./dependency-graph.js";
import { findCycle } from "./cycle-detector.js";

/**
 * Insert into a list kept sorted by declaration index
 */
function insertReady(ready: DependencyNode[], node: DependencyNode): void {
  let low = 0;
  let high = ready.length;
  while (low < high) {
    const mid = (low + high) >>> 1;
    const current = ready[mid];
    if (current && current.declarationIndex < node.declarationIndex) {
      low = mid + 1;
    } else {
      high = mid;
    }
  }
  ready.splice(low, 0, node);
}

/**
 * Compute the evaluation order of an acyclic dependency graph
 *
 * @throws {CycleError} If the graph turns out to contain a cycle
 */
export function sortTopologically(graph: DependencyGraph): PropertyName[] {
  // Number of unprocessed predecessors per vertex
  const pending = new Map<PropertyName, number>();
  const ready: DependencyNode[] = [];

  for (const node of graph.values()) {
    pending.set(node.name, node.dependsOn.size);
    if (node.dependsOn.size === 0) {
      ready.push(node);
    }
  }

  const order: PropertyName[] = [];

  let next = ready.shift();
  while (next) {
    order.push(next.name);

    for (const dependent of next.dependedBy) {
      const remaining = (pending.get(dependent) ?? 0) - 1;
      pending.set(dependent, remaining);
      const node = graph.get(dependent);
      if (remaining === 0 && node) {
        insertReady(ready, node);
      }
    }

    next = ready.shift();
  }

  if (order.length < graph.size) {
    throw new CycleError(findCycle(graph) ?? []);
  }

  return order;
}
