/**
 * Logger Tests
 */

import { describe, it, expect, vi } from "vitest";
import { createLogger } from "../logger.js";

describe("createLogger", () => {
  it("should be silent under the test environment", () => {
    const logger = createLogger("schema");

    expect(logger.level).toBe("silent");
  });

  it("should take the level from the configuration", () => {
    const logger = createLogger("schema", {
      config: { environment: "production", logLevel: "warn", prettyLogs: false },
    });

    expect(logger.level).toBe("warn");
    expect(logger.isLevelEnabled("info")).toBe(false);
    expect(logger.isLevelEnabled("error")).toBe(true);
  });

  it("should let an explicit level win over the configuration", () => {
    const logger = createLogger("schema", {
      level: "error",
      config: { environment: "development", logLevel: "debug", prettyLogs: false },
    });

    expect(logger.level).toBe("error");
  });

  it("should fall back to the default level for an unsupported LOG_LEVEL", () => {
    vi.stubEnv("LOG_LEVEL", "warning");
    try {
      expect(createLogger("schema").level).toBe("silent");
    } finally {
      vi.unstubAllEnvs();
    }
  });

  it("should name the logger after its component", () => {
    const logger = createLogger("evaluator", { level: "silent" });

    expect(logger.bindings()).toEqual({ name: "evaluator" });
  });
});
