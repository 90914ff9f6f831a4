/**
 * Declarations Module
 *
 * Plain-data property declarations, clause patterns and the explicit builder.
 *
 * @module
 */

export * from "./types.js";
export * from "./patterns.js";
export { PropertySetBuilder } from "./builder.js";
