/**
 * Schema Construction
 *
 * The one-time, fallible step: validate declarations, merge the ones that
 * share a name, build the dependency graph, reject cycles and fix the
 * evaluation order. A schema that comes out of here is frozen and can be
 * evaluated any number of times.
 *
 * @module
 */

import { createLogger, type Logger } from "../../utils/logger.js";
import {
  DeclarationShapeSchema,
  SchemaOptionsSchema,
  formatZodError,
  safeValidate,
  type SchemaOptions,
} from "../../utils/validation.js";
import { err, ok, type Result } from "../../types/result.js";
import { CycleError, ErrorCode, SchemaError } from "../errors.js";
import type { Clause, PropertyDeclaration, PropertyName } from "../declarations/types.js";
import {
  buildDependencyGraph,
  findUnknownReferences,
  type DependencyGraph,
} from "../graph/dependency-graph.js";
import { findCycle } from "../graph/cycle-detector.js";
import { sortTopologically } from "../graph/topological-sort.js";

const moduleLogger = createLogger("schema");

// =============================================================================
// Types
// =============================================================================

/**
 * A validated property set with its resolved evaluation order
 */
export interface Schema<I, V = unknown> {
  readonly name: string;
  /** One merged declaration per property, in declaration order */
  readonly declarations: ReadonlyMap<PropertyName, PropertyDeclaration<I, V>>;
  /** Every property exactly once, each after everything it requires */
  readonly evaluationOrder: readonly PropertyName[];
  /** The declarations in evaluation order */
  readonly steps: readonly PropertyDeclaration<I, V>[];
  readonly logger: Logger;
}

interface MergedDeclaration<I, V> {
  name: PropertyName;
  clauses: Clause<I, V>[];
  requiredNames: Set<PropertyName>;
}

// =============================================================================
// Steps
// =============================================================================

function assertDeclarationShapes(declarations: readonly unknown[], schemaName: string): void {
  declarations.forEach((declaration, index) => {
    const result = safeValidate(DeclarationShapeSchema, declaration);
    if (!result.success) {
      throw new SchemaError(
        `Invalid declaration at index ${index}: ${formatZodError(result.error).join("; ")}`,
        ErrorCode.SCHEMA_INVALID_DECLARATION,
        { schemaName, index }
      );
    }
  });
}

/**
 * Collapse declarations sharing a name into one, keeping clause order and the
 * position of the first occurrence
 */
function mergeDeclarations<I, V>(
  declarations: readonly PropertyDeclaration<I, V>[]
): Map<PropertyName, MergedDeclaration<I, V>> {
  const merged = new Map<PropertyName, MergedDeclaration<I, V>>();

  for (const declaration of declarations) {
    let entry = merged.get(declaration.name);
    if (!entry) {
      entry = { name: declaration.name, clauses: [], requiredNames: new Set() };
      merged.set(declaration.name, entry);
    }
    entry.clauses.push(...declaration.clauses);
    for (const required of declaration.requiredNames) {
      entry.requiredNames.add(required);
    }
  }

  return merged;
}

function assertKnownReferences<I, V>(
  merged: ReadonlyMap<PropertyName, MergedDeclaration<I, V>>,
  schemaName: string
): void {
  const unknown = findUnknownReferences(merged.values());
  const first = unknown[0];
  if (first) {
    const extra = unknown.length > 1 ? ` (and ${unknown.length - 1} more)` : "";
    throw new SchemaError(
      `"${first.property}" requires undeclared property "${first.requires}"${extra}`,
      ErrorCode.SCHEMA_UNKNOWN_PROPERTY,
      { schemaName, unknown }
    );
  }
}

function freezeDeclaration<I, V>(entry: MergedDeclaration<I, V>): PropertyDeclaration<I, V> {
  return Object.freeze({
    name: entry.name,
    clauses: Object.freeze([...entry.clauses]),
    requiredNames: entry.requiredNames,
  });
}

/**
 * Order a graph, rejecting it if it has a cycle
 *
 * Shared by schema construction and by callers that only care about ordering,
 * such as the manifest commands of the CLI.
 *
 * @throws {CycleError} If some properties depend on each other
 */
export function resolveEvaluationOrder(
  graph: DependencyGraph,
  schemaName: string,
  logger: Logger = moduleLogger
): PropertyName[] {
  const cycle = findCycle(graph);
  if (cycle) {
    const error = new CycleError(cycle, { schemaName });
    logger.warn({ schema: schemaName, vertices: [...cycle] }, "Dependency cycle detected");
    throw error;
  }

  return sortTopologically(graph);
}

// =============================================================================
// Construction
// =============================================================================

/**
 * Build a schema from property declarations
 *
 * @throws {SchemaError} If a declaration is malformed or requires an undeclared property
 * @throws {CycleError} If the declared dependencies contain a cycle
 */
export function buildSchema<I, V = unknown>(
  declarations: readonly PropertyDeclaration<I, V>[],
  options: SchemaOptions = {}
): Schema<I, V> {
  const resolved = safeValidate(SchemaOptionsSchema, options);
  if (!resolved.success) {
    throw new SchemaError(
      `Invalid schema options: ${formatZodError(resolved.error).join("; ")}`,
      ErrorCode.INVALID_ARGUMENT
    );
  }
  const { name: schemaName } = resolved.data;
  const logger = resolved.data.logger ?? moduleLogger;

  assertDeclarationShapes(declarations, schemaName);

  const merged = mergeDeclarations(declarations);
  assertKnownReferences(merged, schemaName);

  const graph = buildDependencyGraph(merged.values());
  const evaluationOrder = resolveEvaluationOrder(graph, schemaName, logger);

  const frozen = new Map<PropertyName, PropertyDeclaration<I, V>>();
  for (const entry of merged.values()) {
    frozen.set(entry.name, freezeDeclaration(entry));
  }

  const steps: PropertyDeclaration<I, V>[] = [];
  for (const name of evaluationOrder) {
    const declaration = frozen.get(name);
    if (declaration) {
      steps.push(declaration);
    }
  }

  logger.debug(
    { schema: schemaName, properties: frozen.size, evaluationOrder },
    "Schema built"
  );

  return Object.freeze({
    name: schemaName,
    declarations: frozen,
    evaluationOrder: Object.freeze(evaluationOrder),
    steps: Object.freeze(steps),
    logger,
  });
}

/**
 * Build a schema, returning schema errors instead of throwing them
 */
export function tryBuildSchema<I, V = unknown>(
  declarations: readonly PropertyDeclaration<I, V>[],
  options: SchemaOptions = {}
): Result<Schema<I, V>, SchemaError> {
  try {
    return ok(buildSchema(declarations, options));
  } catch (error) {
    if (error instanceof SchemaError) {
      return err(error);
    }
    throw error;
  }
}
