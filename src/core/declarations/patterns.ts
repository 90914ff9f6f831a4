/**
 * Clause patterns
 *
 * Small constructors for the pattern half of a clause. Each pattern carries the
 * list of property names it reads, so a clause built from it knows its
 * dependencies without anyone inspecting function source.
 *
 * @example
 * ```typescript
 * const q = declareProperty<number, number>("q", [
 *   clause({ pattern: bind("p"), guard: (_i, { p }) => p > 0, body: (i) => i * 5 }),
 *   clause({ pattern: shape({ p: 3 }), body: (i) => i * 5 }),
 *   clause({ pattern: bind("p"), body: (i, { p }) => p * i }),
 * ]);
 * ```
 *
 * @module
 */

import type {
  Bindings,
  Clause,
  ClauseBody,
  GuardPredicate,
  PartialResult,
  PatternPredicate,
  PropertyName,
} from "./types.js";

/**
 * Matches any bound value in a `shape` pattern
 */
export const ANY: unique symbol = Symbol("derived-props.any");

export type ShapeEntry<V> = V | typeof ANY;

/**
 * A pattern predicate together with the names it reads
 */
export interface Pattern<V = unknown> {
  readonly names: readonly PropertyName[];
  readonly match: PatternPredicate<V>;
}

const NO_BINDINGS: Bindings<never> = Object.freeze({});

function isBound<V>(partial: PartialResult<V>, name: PropertyName): boolean {
  return Object.hasOwn(partial, name);
}

/**
 * Matches every partial result; reads nothing
 */
export function wildcard<V = unknown>(): Pattern<V> {
  return {
    names: [],
    match: () => NO_BINDINGS,
  };
}

/**
 * Matches once every listed property is bound, and binds them
 */
export function bind<V = unknown>(...names: PropertyName[]): Pattern<V> {
  const unique = [...new Set(names)];
  return {
    names: unique,
    match: (partial) => {
      const bound: Record<PropertyName, V> = {};
      for (const name of unique) {
        if (!isBound(partial, name)) return null;
        bound[name] = partial[name];
      }
      return bound;
    },
  };
}

/**
 * Matches when every key is bound to the given value (`Object.is`), or to any
 * value for keys mapped to {@link ANY}. Binds every key.
 */
export function shape<V = unknown>(entries: Readonly<Record<PropertyName, ShapeEntry<V>>>): Pattern<V> {
  const expected = Object.entries(entries);
  return {
    names: expected.map(([name]) => name),
    match: (partial) => {
      const bound: Record<PropertyName, V> = {};
      for (const [name, value] of expected) {
        if (!isBound(partial, name)) return null;
        const actual = partial[name];
        if (value !== ANY && !Object.is(actual, value)) return null;
        bound[name] = actual;
      }
      return bound;
    },
  };
}

// =============================================================================
// Clause Construction
// =============================================================================

export interface ClauseOptions<I, V = unknown> {
  /** Defaults to {@link wildcard} */
  pattern?: Pattern<V>;
  /** Defaults to always true */
  guard?: GuardPredicate<I, V>;
  /** Names the guard reads beyond those of the pattern */
  requires?: readonly PropertyName[];
  body: ClauseBody<I, V>;
}

const alwaysTrue = (): boolean => true;

/**
 * Build a clause whose required names are the pattern's names plus `requires`
 */
export function clause<I, V = unknown>(options: ClauseOptions<I, V>): Clause<I, V> {
  const pattern = options.pattern ?? wildcard<V>();
  const requiredNames = new Set<PropertyName>([...pattern.names, ...(options.requires ?? [])]);

  return Object.freeze({
    pattern: pattern.match,
    guard: options.guard ?? alwaysTrue,
    body: options.body,
    requiredNames,
  });
}
