/**
 * Core module - schema construction and evaluation
 */

// Re-export error classes
export * from "./errors.js";

export * from "./declarations/index.js";
export * from "./graph/index.js";
export * from "./schema/schema.js";
export * from "./evaluator/evaluator.js";
