/**
 * Dependency manifest loading shared by the CLI commands
 */

import * as fs from "node:fs";
import { ErrorCode, PropertyEngineError, SchemaError } from "../../core/errors.js";
import type { DependencySpec } from "../../core/declarations/types.js";
import {
  buildDependencyGraph,
  findUnknownReferences,
  type DependencyGraph,
} from "../../core/graph/dependency-graph.js";
import { resolveEvaluationOrder } from "../../core/schema/schema.js";
import { ManifestSchema, formatZodError, safeValidate, type Manifest } from "../../utils/validation.js";
import { createLogger } from "../../utils/logger.js";

const logger = createLogger("manifest");

/**
 * Outcome of a command: what to print and how to exit
 */
export interface CommandOutcome {
  exitCode: number;
  lines: string[];
}

export interface ResolvedManifest {
  manifest: Manifest;
  graph: DependencyGraph;
  order: string[];
}

/**
 * Read and validate a manifest file
 *
 * @throws {PropertyEngineError} If the file cannot be read or is not a valid manifest
 */
export function loadManifest(filePath: string): Manifest {
  let content: string;
  try {
    content = fs.readFileSync(filePath, "utf-8");
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new PropertyEngineError(`Cannot read manifest ${filePath}: ${reason}`, ErrorCode.FILE_SYSTEM_ERROR, {
      filePath,
    });
  }

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new PropertyEngineError(`Manifest ${filePath} is not valid JSON: ${reason}`, ErrorCode.INVALID_ARGUMENT, {
      filePath,
    });
  }

  const result = safeValidate(ManifestSchema, data);
  if (!result.success) {
    throw new PropertyEngineError(
      `Invalid manifest ${filePath}: ${formatZodError(result.error).join("; ")}`,
      ErrorCode.INVALID_ARGUMENT,
      { filePath }
    );
  }

  logger.debug({ filePath, properties: result.data.properties.length }, "Manifest loaded");
  return result.data;
}

/**
 * Turn manifest entries into dependency specs for the graph
 */
export function toDependencySpecs(manifest: Manifest): DependencySpec[] {
  return manifest.properties.map((property) => ({
    name: property.name,
    requiredNames: property.requires,
  }));
}

/**
 * Load a manifest and order it
 *
 * @throws {SchemaError} If a property requires an undeclared one
 * @throws {CycleError} If the dependencies contain a cycle
 */
export function resolveManifest(filePath: string): ResolvedManifest {
  const manifest = loadManifest(filePath);
  const dependencies = toDependencySpecs(manifest);

  const unknown = findUnknownReferences(dependencies);
  const first = unknown[0];
  if (first) {
    throw new SchemaError(
      `"${first.property}" requires undeclared property "${first.requires}"`,
      ErrorCode.SCHEMA_UNKNOWN_PROPERTY,
      { schemaName: manifest.name, unknown }
    );
  }

  const graph = buildDependencyGraph(dependencies);
  const order = resolveEvaluationOrder(graph, manifest.name, logger);
  return { manifest, graph, order };
}

/**
 * Render an engine error as a single output line; anything else is rethrown
 */
export function failure(error: unknown): CommandOutcome {
  if (error instanceof PropertyEngineError) {
    return { exitCode: 1, lines: [`error ${error.code}: ${error.message}`] };
  }
  throw error;
}
