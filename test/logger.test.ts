import { describe, test, expect, vi, afterEach } from "vitest";
import { createLogger, isLogLevel, silentLogger } from "../src/logger";

afterEach(() => {
  vi.restoreAllMocks();
});

describe("createLogger", () => {
  test("writes enabled levels to stderr with context", () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => {});
    const logger = createLogger("info");

    logger.debug("hidden");
    logger.info("Rotated secret", { secret: "api-key", attempt: 2, skipped: undefined });
    logger.error("failed");

    expect(spy.mock.calls).toEqual([
      ["[info] Rotated secret (secret=api-key, attempt=2)"],
      ["[error] failed"],
    ]);
  });

  test("defaults to warnings and above", () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => {});
    const logger = createLogger();

    logger.info("quiet");
    logger.warn("loud");

    expect(spy.mock.calls).toEqual([["[warn] loud"]]);
  });

  test("silentLogger writes nothing", () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => {});
    silentLogger.error("nothing");
    expect(spy).not.toHaveBeenCalled();
  });
});

describe("isLogLevel", () => {
  test("accepts known levels only", () => {
    expect(isLogLevel("debug")).toBe(true);
    expect(isLogLevel("verbose")).toBe(false);
  });
});
