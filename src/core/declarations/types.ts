/**
 * Declaration Model
 *
 * Plain data describing each property: its name, its ordered clauses and the
 * names of the other properties those clauses read. Everything downstream
 * (graph, ordering, evaluation) is driven by these values alone.
 *
 * @module
 */

// =============================================================================
// Names and Records
// =============================================================================

/**
 * Identifier of a property. Unique within a schema; used both as a graph
 * vertex and as a key of the result record.
 */
export type PropertyName = string;

/**
 * Values computed so far during one evaluation.
 *
 * Only the names already processed are present; a key that is set is never
 * rewritten.
 */
export type PartialResult<V = unknown> = Readonly<Record<PropertyName, V>>;

/**
 * The completed, frozen record: one value per declared property.
 */
export type ResultRecord<V = unknown> = Readonly<Record<PropertyName, V>>;

/**
 * Values a matching pattern binds, handed to the clause guard.
 */
export type Bindings<V = unknown> = Readonly<Record<PropertyName, V>>;

// =============================================================================
// Clauses
// =============================================================================

/**
 * Tests whether the partial result has the shape a clause expects.
 * Returns the bound values on a match and `null` otherwise.
 */
export type PatternPredicate<V = unknown> = (partial: PartialResult<V>) => Bindings<V> | null;

/**
 * Extra condition over the input and the values bound by the pattern.
 */
export type GuardPredicate<I, V = unknown> = (
  input: I,
  bindings: Bindings<V>,
  partial: PartialResult<V>
) => boolean;

/**
 * Computes the property value. Must be pure given its arguments.
 */
export type ClauseBody<I, V = unknown> = (input: I, partial: PartialResult<V>) => V;

/**
 * One guarded alternative among the clauses of a property
 */
export interface Clause<I, V = unknown> {
  readonly pattern: PatternPredicate<V>;
  readonly guard: GuardPredicate<I, V>;
  readonly body: ClauseBody<I, V>;
  /** Other properties the pattern or guard reads */
  readonly requiredNames: ReadonlySet<PropertyName>;
}

// =============================================================================
// Declarations
// =============================================================================

/**
 * Everything the engine knows about a single property
 */
export interface PropertyDeclaration<I, V = unknown> {
  readonly name: PropertyName;
  /** Tried in order, first match wins */
  readonly clauses: readonly Clause<I, V>[];
  /** Union of `requiredNames` over every clause */
  readonly requiredNames: ReadonlySet<PropertyName>;
}

/**
 * The part of a declaration the dependency graph needs
 */
export interface DependencySpec {
  readonly name: PropertyName;
  readonly requiredNames: Iterable<PropertyName>;
}

/**
 * Build a declaration from its clauses, unioning their required names
 */
export function declareProperty<I, V = unknown>(
  name: PropertyName,
  clauses: readonly Clause<I, V>[]
): PropertyDeclaration<I, V> {
  const requiredNames = new Set<PropertyName>();
  for (const clause of clauses) {
    for (const required of clause.requiredNames) {
      requiredNames.add(required);
    }
  }

  return Object.freeze({
    name,
    clauses: Object.freeze([...clauses]),
    requiredNames,
  });
}
