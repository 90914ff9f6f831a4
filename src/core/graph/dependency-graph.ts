/**
 * Dependency Graph Builder
 *
 * Builds the "must precede" graph from property declarations: for every
 * declaration `p` and every name `r` it requires, an edge `r → p`.
 *
 * The builder performs no validation; cycles (including self-loops) are left
 * for the cycle detector and unknown names become vertices of their own.
 *
 * @module
 */

import { createLogger } from "../../utils/logger.js";
import type { DependencySpec, PropertyName } from "../declarations/types.js";

const logger = createLogger("dependency-graph");

// =============================================================================
// Types
// =============================================================================

/**
 * A vertex of the dependency graph
 */
export interface DependencyNode {
  name: PropertyName;
  /** Position of the first declaration of this name; the sort tie-breaker */
  declarationIndex: number;
  /** Properties that must be computed before this one */
  dependsOn: Set<PropertyName>;
  /** Properties that must be computed after this one */
  dependedBy: Set<PropertyName>;
}

/**
 * The complete dependency graph, keyed and iterated in declaration order
 */
export type DependencyGraph = Map<PropertyName, DependencyNode>;

/**
 * A set of mutually independent properties at the same depth
 */
export interface DependencyLevel {
  /** 0 = no dependencies, N = depends only on levels < N */
  level: number;
  names: PropertyName[];
}

/**
 * Statistics about the dependency graph
 */
export interface DependencyGraphStats {
  totalNodes: number;
  totalEdges: number;
  selfLoops: number;
  leafNodes: number;
  rootNodes: number;
  maxDepth: number;
}

// =============================================================================
// Graph Building
// =============================================================================

/**
 * Build a dependency graph from declarations
 *
 * Every declared name becomes a vertex, even without edges. Repeated edges
 * collapse into one.
 */
export function buildDependencyGraph(declarations: Iterable<DependencySpec>): DependencyGraph {
  const graph: DependencyGraph = new Map();

  const ensureNode = (name: PropertyName): DependencyNode => {
    let node = graph.get(name);
    if (!node) {
      node = {
        name,
        declarationIndex: graph.size,
        dependsOn: new Set(),
        dependedBy: new Set(),
      };
      graph.set(name, node);
    }
    return node;
  };

  // Vertices first, so the declaration index follows declaration order and
  // not the order in which names happen to be referenced
  const entries = [...declarations];
  for (const entry of entries) {
    ensureNode(entry.name);
  }

  for (const entry of entries) {
    const target = ensureNode(entry.name);
    for (const required of entry.requiredNames) {
      const source = ensureNode(required);
      source.dependedBy.add(target.name);
      target.dependsOn.add(source.name);
    }
  }

  logger.debug(
    { totalNodes: graph.size, totalEdges: countEdges(graph) },
    "Dependency graph built"
  );

  return graph;
}

function countEdges(graph: DependencyGraph): number {
  let edges = 0;
  for (const node of graph.values()) {
    edges += node.dependsOn.size;
  }
  return edges;
}

/**
 * A required name that no declaration provides
 */
export interface UnknownReference {
  property: PropertyName;
  requires: PropertyName;
}

/**
 * List every required name that is not itself declared, in declaration order
 */
export function findUnknownReferences(declarations: Iterable<DependencySpec>): UnknownReference[] {
  const entries = [...declarations];
  const declared = new Set(entries.map((entry) => entry.name));
  const unknown: UnknownReference[] = [];

  for (const entry of entries) {
    for (const required of entry.requiredNames) {
      if (!declared.has(required)) {
        unknown.push({ property: entry.name, requires: required });
      }
    }
  }

  return unknown;
}

// =============================================================================
// Levels and Statistics
// =============================================================================

/**
 * Group properties by dependency depth
 *
 * `order` must be a topological order of `graph`; each level keeps the
 * relative order it has there.
 */
export function computeLevels(graph: DependencyGraph, order: readonly PropertyName[]): DependencyLevel[] {
  const depth = new Map<PropertyName, number>();
  const levels: DependencyLevel[] = [];

  for (const name of order) {
    const node = graph.get(name);
    let level = 0;
    if (node) {
      for (const required of node.dependsOn) {
        level = Math.max(level, (depth.get(required) ?? 0) + 1);
      }
    }
    depth.set(name, level);

    let bucket = levels[level];
    if (!bucket) {
      bucket = { level, names: [] };
      levels[level] = bucket;
    }
    bucket.names.push(name);
  }

  return levels;
}

/**
 * Get statistics about a dependency graph
 *
 * `maxDepth` is only known once an order exists; without one it is reported as 0.
 */
export function getGraphStats(
  graph: DependencyGraph,
  order?: readonly PropertyName[]
): DependencyGraphStats {
  let selfLoops = 0;
  let leafNodes = 0;
  let rootNodes = 0;

  for (const node of graph.values()) {
    if (node.dependsOn.has(node.name)) {
      selfLoops++;
    }
    // Leaf = needs nothing
    if (node.dependsOn.size === 0) {
      leafNodes++;
    }
    // Root = nothing needs it
    if (node.dependedBy.size === 0) {
      rootNodes++;
    }
  }

  return {
    totalNodes: graph.size,
    totalEdges: countEdges(graph),
    selfLoops,
    leafNodes,
    rootNodes,
    maxDepth: order ? Math.max(0, computeLevels(graph, order).length - 1) : 0,
  };
}
