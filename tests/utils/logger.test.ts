import { afterEach, beforeEach, describe, expect, type MockInstance, test, vi } from "vitest";
import {
  debug,
  error,
  formatMessage,
  getLogLevel,
  info,
  isLogLevel,
  logger,
  scoped,
  setLogLevel,
  warn,
} from "../../src/utils/logger";

describe("logger", () => {
  let originalLevel: ReturnType<typeof getLogLevel>;
  let consoleLogSpy: MockInstance<typeof console.log>;
  let consoleWarnSpy: MockInstance<typeof console.warn>;
  let consoleErrorSpy: MockInstance<typeof console.error>;

  beforeEach(() => {
    originalLevel = getLogLevel();
    consoleLogSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    consoleWarnSpy = vi.spyOn(console, "warn").mockImplementation(() => {});
    consoleErrorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    setLogLevel(originalLevel);
    vi.restoreAllMocks();
  });

  describe("setLogLevel / getLogLevel", () => {
    test("sets and gets log level", () => {
      setLogLevel("debug");
      expect(getLogLevel()).toBe("debug");

      setLogLevel("error");
      expect(getLogLevel()).toBe("error");
    });
  });

  describe("isLogLevel", () => {
    test("accepts known levels only", () => {
      expect(isLogLevel("warn")).toBe(true);
      expect(isLogLevel("verbose")).toBe(false);
      expect(isLogLevel(3)).toBe(false);
    });
  });

  describe("log level filtering", () => {
    test("drops messages below the current level", () => {
      setLogLevel("warn");

      debug("debug message");
      info("info message");
      warn("warn message");
      error("error message");

      expect(consoleLogSpy).not.toHaveBeenCalled();
      expect(consoleWarnSpy).toHaveBeenCalledTimes(1);
      expect(consoleErrorSpy).toHaveBeenCalledTimes(1);
    });

    test("logs everything at debug", () => {
      setLogLevel("debug");

      logger.debug("one");
      logger.info("two");

      expect(consoleLogSpy).toHaveBeenCalledTimes(2);
    });
  });

  describe("formatMessage", () => {
    test("includes level, scope and message", () => {
      const line = formatMessage("info", "hello", undefined, "job:nightly");

      expect(line).toContain("INFO ");
      expect(line.endsWith(" [job:nightly] hello")).toBe(true);
    });

    test("appends object data as JSON", () => {
      const line = formatMessage("warn", "stats", { failed: 1 });

      expect(line.endsWith('stats {\n  "failed": 1\n}')).toBe(true);
    });
  });

  describe("scoped", () => {
    test("tags lines with the scope", () => {
      setLogLevel("info");

      scoped("storage:local").info("Stored web");

      const line = consoleLogSpy.mock.calls[0]?.[0];
      expect(typeof line === "string" && line.endsWith(" [storage:local] Stored web")).toBe(true);
    });
  });
});
