/**
 * Configuration Tests
 */

import { describe, it, expect, vi, afterEach } from "vitest";
import { loadConfig, readLoggerConfig, resolveLogLevel } from "../config.js";
import { ErrorCode, PropertyEngineError } from "../../core/errors.js";

describe("loadConfig", () => {
  it("should apply defaults to an empty environment", () => {
    expect(loadConfig({})).toEqual({ environment: "development", prettyLogs: false });
  });

  it("should read every supported variable", () => {
    const config = loadConfig({ NODE_ENV: "production", LOG_LEVEL: "WARN", LOG_PRETTY: "1" });

    expect(config).toEqual({ environment: "production", logLevel: "warn", prettyLogs: true });
  });

  it("should treat empty variables as unset", () => {
    expect(loadConfig({ NODE_ENV: "", LOG_LEVEL: "", LOG_PRETTY: "" })).toEqual({
      environment: "development",
      prettyLogs: false,
    });
  });

  it("should reject an unknown log level", () => {
    let caught: unknown;
    try {
      loadConfig({ LOG_LEVEL: "verbose" });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(PropertyEngineError);
    if (caught instanceof PropertyEngineError) {
      expect(caught.code).toBe(ErrorCode.CONFIGURATION_ERROR);
      expect(caught.message.startsWith("Invalid configuration: logLevel: ")).toBe(true);
    }
  });

  it("should reject an unknown environment", () => {
    expect(() => loadConfig({ NODE_ENV: "staging" })).toThrow(/^Invalid configuration: environment: /);
  });
});

describe("resolveLogLevel", () => {
  it("should prefer an explicit level", () => {
    expect(resolveLogLevel({ environment: "test", logLevel: "debug", prettyLogs: false })).toBe("debug");
  });

  it("should silence tests by default", () => {
    expect(resolveLogLevel({ environment: "test", prettyLogs: false })).toBe("silent");
  });

  it("should log at info elsewhere", () => {
    expect(resolveLogLevel({ environment: "development", prettyLogs: false })).toBe("info");
    expect(resolveLogLevel({ environment: "production", prettyLogs: false })).toBe("info");
  });
});

describe("readLoggerConfig", () => {
  it("should read supported values like loadConfig", () => {
    expect(readLoggerConfig({ NODE_ENV: "production", LOG_LEVEL: "Debug", LOG_PRETTY: "true" })).toEqual({
      environment: "production",
      logLevel: "debug",
      prettyLogs: true,
    });
  });

  it("should keep the defaults for unsupported values", () => {
    expect(readLoggerConfig({ NODE_ENV: "staging", LOG_LEVEL: "warning", LOG_PRETTY: "yes" })).toEqual({
      environment: "development",
      logLevel: undefined,
      prettyLogs: false,
    });
  });

  it("should resolve to info for an unknown environment", () => {
    expect(resolveLogLevel(readLoggerConfig({ NODE_ENV: "staging" }))).toBe("info");
  });
});

describe("loading the library", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    vi.resetModules();
  });

  it("should load and build schemas under an unknown NODE_ENV", async () => {
    vi.stubEnv("NODE_ENV", "staging");
    vi.resetModules();

    const lib = await import("../../index.js");
    const schema = lib.buildSchema<number, number>([
      lib.declareProperty("p", [lib.clause<number, number>({ body: (i) => i + 1 })]),
    ]);

    expect(lib.evaluate(schema, 1)).toEqual({ p: 2 });
  });

  it("should load under a misspelled LOG_LEVEL", async () => {
    vi.stubEnv("LOG_LEVEL", "warning");
    vi.resetModules();

    const lib = await import("../../index.js");

    expect(lib.buildSchema<number, number>([]).evaluationOrder).toEqual([]);
  });
});
