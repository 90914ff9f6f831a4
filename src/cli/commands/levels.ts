/**
 * levels command - Print properties grouped by dependency depth
 */

import { computeLevels } from "../../core/graph/dependency-graph.js";
import { failure, resolveManifest, type CommandOutcome } from "./manifest.js";

export function levelsCommand(filePath: string): CommandOutcome {
  try {
    const { graph, order } = resolveManifest(filePath);
    const lines = computeLevels(graph, order).map(
      (level) => `level ${level.level}: ${level.names.join(", ")}`
    );
    return { exitCode: 0, lines };
  } catch (error) {
    return failure(error);
  }
}
