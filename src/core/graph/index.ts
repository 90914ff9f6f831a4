/**
 * Graph Module
 *
 * Dependency graph construction, cycle detection and topological ordering.
 *
 * @module
 */

export * from "./dependency-graph.js";
export { findCycle, findCyclicComponents } from "./cycle-detector.js";
export { sortTopologically } from "./topological-sort.js";
