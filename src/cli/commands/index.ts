/**
 * CLI Commands
 */

export { orderCommand, type OrderOptions } from "./order.js";
export { levelsCommand } from "./levels.js";
export { checkCommand } from "./check.js";
export type { CommandOutcome } from "./manifest.js";
