/**
 * Logger Module
 * Structured logging using pino, written to stderr so command output on
 * stdout stays clean
 */

import pino, { type Logger as PinoLogger } from "pino";
import { readLoggerConfig, resolveLogLevel, type EngineConfig, type LogLevel } from "./config.js";

export interface LoggerOptions {
  level?: LogLevel;
  /** Defaults to the configuration read from the environment, ignoring unsupported values */
  config?: EngineConfig;
}

const STDERR = 2;

/**
 * Create a logger instance for a specific component
 *
 * @param component - The component name (e.g., "schema", "evaluator", "cli")
 * @param options - Optional configuration
 * @returns A configured pino logger instance
 *
 * @example
 * ```typescript
 * const logger = createLogger("schema");
 * logger.debug({ properties: 4 }, "Schema built");
 * logger.warn({ err }, "Dependency cycle detected");
 * ```
 */
export function createLogger(component: string, options: LoggerOptions = {}): PinoLogger {
  const config = options.config ?? readLoggerConfig();
  const level = options.level ?? resolveLogLevel(config);

  const baseOptions: pino.LoggerOptions = {
    name: component,
    level,
  };

  if (config.prettyLogs && level !== "silent") {
    return pino({
      ...baseOptions,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:HH:MM:ss",
          ignore: "pid,hostname",
          destination: STDERR,
        },
      },
    });
  }

  return pino(baseOptions, pino.destination(STDERR));
}

/**
 * Logger type export for use in type annotations
 */
export type Logger = PinoLogger;
