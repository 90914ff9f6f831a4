/**
 * Runtime configuration
 *
 * Read once from environment variables and validated with zod.
 *
 * @module
 */

import { z } from "zod";
import { ErrorCode, PropertyEngineError } from "../core/errors.js";
import { formatZodError } from "./validation.js";

export const LogLevelSchema = z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]);

export type LogLevel = z.infer<typeof LogLevelSchema>;

const BooleanFlagSchema = z
  .enum(["true", "false", "1", "0"])
  .transform((flag) => flag === "true" || flag === "1");

/**
 * Engine configuration schema
 */
export const EngineConfigSchema = z.object({
  /** Runtime environment, from NODE_ENV */
  environment: z.enum(["development", "production", "test"]).default("development"),

  /** Explicit log level, from LOG_LEVEL */
  logLevel: LogLevelSchema.optional(),

  /** Human-readable log output through pino-pretty, from LOG_PRETTY */
  prettyLogs: BooleanFlagSchema.default("false"),
});

export type EngineConfig = z.infer<typeof EngineConfigSchema>;

/**
 * Build the configuration from an environment
 *
 * @throws {PropertyEngineError} If a variable holds an unsupported value
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const result = EngineConfigSchema.safeParse({
    environment: env.NODE_ENV || undefined,
    logLevel: env.LOG_LEVEL?.toLowerCase() || undefined,
    prettyLogs: env.LOG_PRETTY?.toLowerCase() || undefined,
  });

  if (!result.success) {
    throw new PropertyEngineError(
      `Invalid configuration: ${formatZodError(result.error).join("; ")}`,
      ErrorCode.CONFIGURATION_ERROR
    );
  }

  return result.data;
}

/**
 * Build the configuration for logger setup, keeping the default for any
 * variable that holds an unsupported value
 *
 * Loggers are created when modules load, so an unexpected `NODE_ENV` or
 * `LOG_LEVEL` must not prevent the library from loading.
 */
export function readLoggerConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const environment = EngineConfigSchema.shape.environment.safeParse(env.NODE_ENV || undefined);
  const logLevel = LogLevelSchema.safeParse(env.LOG_LEVEL?.toLowerCase());
  const prettyLogs = EngineConfigSchema.shape.prettyLogs.safeParse(env.LOG_PRETTY?.toLowerCase() || undefined);

  return {
    environment: environment.success ? environment.data : "development",
    logLevel: logLevel.success ? logLevel.data : undefined,
    prettyLogs: prettyLogs.success ? prettyLogs.data : false,
  };
}

/**
 * Effective log level: explicit level first, then the environment default
 */
export function resolveLogLevel(config: EngineConfig): LogLevel {
  if (config.logLevel) return config.logLevel;
  return config.environment === "test" ? "silent" : "info";
}
