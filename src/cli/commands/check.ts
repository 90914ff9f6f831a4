/**
 * check command - Validate a manifest and report cycles
 */

import { CycleError } from "../../core/errors.js";
import { getGraphStats } from "../../core/graph/dependency-graph.js";
import { failure, resolveManifest, type CommandOutcome } from "./manifest.js";

export function checkCommand(filePath: string): CommandOutcome {
  try {
    const { graph, order } = resolveManifest(filePath);
    const stats = getGraphStats(graph, order);
    return {
      exitCode: 0,
      lines: [`ok (${stats.totalNodes} properties, ${stats.totalEdges} edges, depth ${stats.maxDepth})`],
    };
  } catch (error) {
    if (error instanceof CycleError) {
      return { exitCode: 1, lines: [`cycle: ${[...error.vertices].join(", ")}`] };
    }
    return failure(error);
  }
}
