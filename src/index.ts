/**
 * derived-props
 *
 * Computes a set of mutually dependent properties from one input: declared
 * dependencies are checked for cycles once, ordered deterministically, and
 * every property is dispatched to its first matching clause.
 *
 * @module
 */

export * from "./core/index.js";
export * from "./types/result.js";
export { createLogger, type Logger, type LoggerOptions } from "./utils/logger.js";
export { loadConfig, readLoggerConfig, resolveLogLevel, type EngineConfig, type LogLevel } from "./utils/config.js";
export { ManifestSchema, type Manifest, type SchemaOptions } from "./utils/validation.js";
