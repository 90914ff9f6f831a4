/**
 * Property Set Builder
 *
 * Collects property declarations explicitly, one call per property (or per
 * group of clauses), before the schema is built once. Calling `property`
 * again with a name already used appends clauses to that property.
 *
 * @example
 * ```typescript
 * const schema = new PropertySetBuilder<number, number>("example")
 *   .property("p", clause({ body: (i) => i + 1 }))
 *   .property("z", clause({ pattern: bind("p"), body: (_i, { p }) => p * 5 }))
 *   .build();
 * ```
 *
 * @module
 */

import { buildSchema, tryBuildSchema, type Schema } from "../schema/schema.js";
import type { SchemaError } from "../errors.js";
import type { Result } from "../../types/result.js";
import type { Logger } from "../../utils/logger.js";
import { declareProperty, type Clause, type PropertyDeclaration, type PropertyName } from "./types.js";

export class PropertySetBuilder<I, V = unknown> {
  private readonly entries: PropertyDeclaration<I, V>[] = [];

  constructor(
    private readonly name: string = "properties",
    private readonly logger?: Logger
  ) {}

  /**
   * Declare a property, or add clauses to one already declared
   */
  property(name: PropertyName, ...clauses: Clause<I, V>[]): this {
    this.entries.push(declareProperty(name, clauses));
    return this;
  }

  /**
   * Add a declaration built elsewhere
   */
  declaration(declaration: PropertyDeclaration<I, V>): this {
    this.entries.push(declaration);
    return this;
  }

  /**
   * The declarations collected so far, in call order
   */
  declarations(): readonly PropertyDeclaration<I, V>[] {
    return [...this.entries];
  }

  /**
   * @throws {SchemaError} If the collected declarations are invalid or cyclic
   */
  build(): Schema<I, V> {
    return buildSchema(this.entries, { name: this.name, logger: this.logger });
  }

  tryBuild(): Result<Schema<I, V>, SchemaError> {
    return tryBuildSchema(this.entries, { name: this.name, logger: this.logger });
  }
}
