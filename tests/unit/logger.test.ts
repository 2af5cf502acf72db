/**
 * Unit tests for the structured logger.
 */

import { describe, it, expect, vi, afterEach } from "vitest";
import { createLogger, isLogLevel } from "../../src/lib/logger";

describe("isLogLevel", () => {
  it("accepts the four levels only", () => {
    expect(["debug", "info", "warn", "error"].every((level) => isLogLevel(level))).toBe(true);
    expect(isLogLevel("verbose")).toBe(false);
    expect(isLogLevel(undefined)).toBe(false);
  });

  it("rejects inherited object keys", () => {
    expect(isLogLevel("constructor")).toBe(false);
    expect(isLogLevel("toString")).toBe(false);
  });
});

describe("createLogger", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
  });

  it("takes its minimum level from LOG_LEVEL", () => {
    vi.stubEnv("LOG_LEVEL", "WARN");
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);

    const logger = createLogger({ json: true });
    logger.info("hidden");
    logger.warn("shown");

    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it("merges child context into JSON lines", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);

    createLogger({ json: true, minLevel: "debug", service: "test" })
      .child({ articleId: "a1" })
      .info("Loaded", { words: 3 });

    expect(JSON.parse(String(log.mock.calls[0][0]))).toMatchObject({
      level: "info",
      message: "Loaded",
      service: "test",
      articleId: "a1",
      words: 3,
    });
  });
});
