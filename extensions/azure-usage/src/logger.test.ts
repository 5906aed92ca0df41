import { describe, it, expect } from "vitest";
import { createLogger, silentLogger } from "./logger.js";

describe("createLogger", () => {
  it("uses the configured level", () => {
    const logger = createLogger({ level: "warn", json: true });
    expect(logger.level).toBe("warn");
    expect(logger.isLevelEnabled("info")).toBe(false);
    expect(logger.isLevelEnabled("error")).toBe(true);
  });

  it("names its records", () => {
    const logger = createLogger({ level: "silent", json: true });
    expect(logger.bindings()).toMatchObject({ name: "azure-usage" });
  });
});

describe("silentLogger", () => {
  it("drops everything", () => {
    expect(silentLogger.isLevelEnabled("fatal")).toBe(false);
  });
});
