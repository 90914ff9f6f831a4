/**
 * Evaluator Tests
 */

import { describe, it, expect } from "vitest";
import { createFactory, evaluate, tryEvaluate } from "../evaluator.js";
import { buildSchema } from "../../schema/schema.js";
import { bind, clause, shape, type ClauseOptions } from "../../declarations/patterns.js";
import { declareProperty, type PropertyDeclaration } from "../../declarations/types.js";
import { ClauseError, DispatchError, ErrorCode } from "../../errors.js";

const when = (options: ClauseOptions<number, number>) => clause(options);

function exampleDeclarations(): PropertyDeclaration<number, number>[] {
  return [
    declareProperty("p", [when({ body: (i) => i + 1 })]),
    declareProperty("q", [
      when({ pattern: bind("p"), guard: (_i, { p }) => p > 0, body: (i) => i * 5 }),
      when({ pattern: shape({ p: 3 }), body: (i) => i * 5 }),
      when({ pattern: bind("p"), body: (i, { p }) => p * i }),
    ]),
    declareProperty("r", [when({ pattern: bind("p", "q", "z"), body: (_i, { p, q }) => p * q })]),
    declareProperty("z", [when({ pattern: bind("q"), body: (_i, { q }) => q * 5 })]),
  ];
}

describe("evaluate", () => {
  it("should derive every property from the input", () => {
    const schema = buildSchema(exampleDeclarations());

    expect(evaluate(schema, 2)).toEqual({ p: 3, q: 10, r: 30, z: 50 });
  });

  it("should present the record in declaration order and freeze it", () => {
    const record = evaluate(buildSchema(exampleDeclarations()), 2);

    expect(Object.keys(record)).toEqual(["p", "q", "r", "z"]);
    expect(Object.isFrozen(record)).toBe(true);
  });

  it("should select the first clause whose pattern and guard hold", () => {
    const schema = buildSchema([
      declareProperty("p", [when({ body: (i) => i + 1 })]),
      declareProperty("q", [
        when({ pattern: bind("p"), guard: (_i, { p }) => p > 0, body: () => 100 }),
        when({ pattern: shape({ p: 3 }), body: () => 200 }),
        when({ pattern: bind("p"), body: (i, { p }) => p * i }),
      ]),
    ]);

    expect(evaluate(schema, 2)).toEqual({ p: 3, q: 100 });
    expect(evaluate(schema, -5)).toEqual({ p: -4, q: 20 });
  });

  it("should fall through to a later clause when the pattern does not match", () => {
    const schema = buildSchema([
      declareProperty("p", [when({ body: (i) => i + 1 })]),
      declareProperty("q", [
        when({ pattern: shape({ p: 3 }), body: () => 200 }),
        when({ pattern: bind("p"), body: (_i, { p }) => -p }),
      ]),
    ]);

    expect(evaluate(schema, 2)).toEqual({ p: 3, q: 200 });
    expect(evaluate(schema, 4)).toEqual({ p: 5, q: -5 });
  });

  it("should expose every required value to the body", () => {
    const seen: string[][] = [];
    const schema = buildSchema([
      declareProperty("p", [when({ body: (i) => i + 1 })]),
      declareProperty("q", [when({ pattern: bind("p"), body: (i) => i * 5 })]),
      declareProperty("r", [
        when({
          pattern: bind("p", "q", "z"),
          body: (_i, partial) => {
            seen.push(Object.keys(partial));
            return partial.p * partial.q;
          },
        }),
      ]),
      declareProperty("z", [when({ pattern: bind("q"), body: (_i, { q }) => q * 5 })]),
    ]);

    evaluate(schema, 2);

    expect(seen).toEqual([["p", "q", "z"]]);
  });

  it("should fail with a DispatchError when no clause matches", () => {
    const schema = buildSchema([
      declareProperty("p", [when({ body: (i) => i + 1 })]),
      declareProperty("q", [when({ pattern: shape({ p: 3 }), body: (i) => i * 5 })]),
      declareProperty("r", [when({ pattern: bind("q"), body: (_i, { q }) => q })]),
    ]);

    expect(evaluate(schema, 2)).toEqual({ p: 3, q: 10, r: 10 });

    let caught: unknown;
    try {
      evaluate(schema, 3);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(DispatchError);
    if (caught instanceof DispatchError) {
      expect(caught.propertyName).toBe("q");
      expect(caught.partialResult).toEqual({ p: 4 });
      expect(caught.code).toBe(ErrorCode.EVAL_NO_MATCHING_CLAUSE);
      expect(caught.message).toBe('no clause of "q" matches the partial result');
    }
  });

  it("should wrap a throwing body in a ClauseError", () => {
    const boom = new Error("boom");
    const schema = buildSchema([
      declareProperty("p", [
        when({
          body: () => {
            throw boom;
          },
        }),
      ]),
    ]);

    let caught: unknown;
    try {
      evaluate(schema, 1);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ClauseError);
    if (caught instanceof ClauseError) {
      expect(caught.message).toBe('body of clause 0 of "p" failed: boom');
      expect(caught.stage).toBe("body");
      expect(caught.clauseIndex).toBe(0);
      expect(caught.cause).toBe(boom);
    }
  });

  it("should attribute a throwing guard to its clause", () => {
    const schema = buildSchema([
      declareProperty("p", [
        when({ guard: () => false, body: () => 1 }),
        when({
          guard: () => {
            throw new Error("bad guard");
          },
          body: () => 2,
        }),
      ]),
    ]);

    expect(() => evaluate(schema, 0)).toThrow('guard of clause 1 of "p" failed: bad guard');
  });

  it("should return identical records on repeated evaluation", () => {
    const schema = buildSchema(exampleDeclarations());
    const first = evaluate(schema, 7);

    for (let run = 0; run < 10; run++) {
      expect(evaluate(schema, 7)).toEqual(first);
    }
    expect(schema.evaluationOrder).toEqual(["p", "q", "z", "r"]);
  });

  it("should share one schema between concurrent evaluations", async () => {
    const schema = buildSchema(exampleDeclarations());
    const inputs = Array.from({ length: 10 }, (_, i) => i);

    const records = await Promise.all(inputs.map(async (input) => evaluate(schema, input)));

    expect(records[4]).toEqual({ p: 5, q: 20, r: 100, z: 100 });
    records.forEach((record, input) => {
      expect(record.q).toBe(input * 5);
    });
  });

  it("should evaluate an empty schema to an empty record", () => {
    expect(evaluate(buildSchema<number, number>([]), 1)).toEqual({});
  });
});

describe("tryEvaluate", () => {
  it("should return the record on success", () => {
    const result = tryEvaluate(buildSchema(exampleDeclarations()), 2);

    expect(result).toEqual({ ok: true, value: { p: 3, q: 10, r: 30, z: 50 } });
  });

  it("should return no record when dispatch fails", () => {
    const schema = buildSchema([
      declareProperty("p", [when({ body: (i) => i + 1 })]),
      declareProperty("q", [when({ pattern: shape({ p: 3 }), body: (i) => i * 5 })]),
    ]);

    const result = tryEvaluate(schema, 3);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(DispatchError);
      expect(result.error.propertyName).toBe("q");
    }
  });
});

describe("createFactory", () => {
  it("should build records from inputs with a fixed schema", () => {
    const create = createFactory(buildSchema(exampleDeclarations()));

    expect(create(2)).toEqual({ p: 3, q: 10, r: 30, z: 50 });
    expect(create(0)).toEqual({ p: 1, q: 0, r: 0, z: 0 });
  });
});
