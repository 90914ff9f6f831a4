/**
 * Evaluator
 *
 * Walks a schema's evaluation order for one input. Each property is
 * dispatched to the first clause whose pattern matches the partial result and
 * whose guard holds; its body's value is then bound under the property name.
 *
 * The partial result belongs to a single call, so one schema can serve any
 * number of evaluations, concurrently or not. Any failure aborts the whole
 * evaluation and no record is returned.
 *
 * @module
 */

import { err, ok, type Result } from "../../types/result.js";
import { ClauseError, DispatchError, ErrorCode, EvaluationError } from "../errors.js";
import type {
  Bindings,
  Clause,
  PartialResult,
  PropertyDeclaration,
  PropertyName,
  ResultRecord,
} from "../declarations/types.js";
import type { Schema } from "../schema/schema.js";

interface Dispatch<I, V> {
  clause: Clause<I, V>;
  index: number;
}

/**
 * Run one piece of user code, attributing anything it throws to the clause
 */
function runClauseStage<T>(
  stage: ClauseError["stage"],
  propertyName: PropertyName,
  index: number,
  schemaName: string,
  fn: () => T
): T {
  try {
    return fn();
  } catch (error) {
    throw new ClauseError(propertyName, index, stage, error, { schemaName });
  }
}

/**
 * Select the first clause whose pattern and guard both hold
 */
function dispatch<I, V>(
  declaration: PropertyDeclaration<I, V>,
  input: I,
  partial: PartialResult<V>,
  schemaName: string
): Dispatch<I, V> | null {
  for (const [index, clause] of declaration.clauses.entries()) {
    const bindings: Bindings<V> | null = runClauseStage("pattern", declaration.name, index, schemaName, () =>
      clause.pattern(partial)
    );
    if (bindings === null) continue;

    const admitted = runClauseStage("guard", declaration.name, index, schemaName, () =>
      clause.guard(input, bindings, partial)
    );
    if (admitted) {
      return { clause, index };
    }
  }
  return null;
}

/**
 * Compute every property of a schema for one input
 *
 * @throws {DispatchError} If no clause of some property matches the partial result reached
 * @throws {ClauseError} If a pattern, guard or body throws
 */
export function evaluate<I, V>(schema: Schema<I, V>, input: I): ResultRecord<V> {
  const partial: Record<PropertyName, V> = {};

  for (const declaration of schema.steps) {
    const name = declaration.name;
    const selected = dispatch(declaration, input, partial, schema.name);

    if (!selected) {
      const snapshot = Object.freeze({ ...partial });
      schema.logger.debug(
        { schema: schema.name, property: name, bound: Object.keys(snapshot) },
        "No clause matched"
      );
      throw new DispatchError(name, snapshot, { schemaName: schema.name });
    }

    if (Object.hasOwn(partial, name)) {
      throw new EvaluationError(`"${name}" is already bound`, ErrorCode.EVAL_ALREADY_BOUND, {
        propertyName: name,
        schemaName: schema.name,
      });
    }

    partial[name] = runClauseStage("body", name, selected.index, schema.name, () =>
      selected.clause.body(input, partial)
    );
  }

  // Present the record in declaration order rather than evaluation order
  const record: Record<PropertyName, V> = {};
  for (const name of schema.declarations.keys()) {
    if (Object.hasOwn(partial, name)) {
      record[name] = partial[name];
    }
  }
  return Object.freeze(record);
}

/**
 * Evaluate, returning evaluation errors instead of throwing them
 */
export function tryEvaluate<I, V>(schema: Schema<I, V>, input: I): Result<ResultRecord<V>, EvaluationError> {
  try {
    return ok(evaluate(schema, input));
  } catch (error) {
    if (error instanceof EvaluationError) {
      return err(error);
    }
    throw error;
  }
}

/**
 * Bind a schema into a constructor-like function from input to record
 */
export function createFactory<I, V>(schema: Schema<I, V>): (input: I) => ResultRecord<V> {
  return (input) => evaluate(schema, input);
}
