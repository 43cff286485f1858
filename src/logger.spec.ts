import { afterEach, describe, expect, test, vi } from "vitest";
import { createLogger, resolveLogLevel } from "./logger";

describe("resolveLogLevel", () => {
  test("should prefer a valid LOG_LEVEL", () => {
    expect(resolveLogLevel({ LOG_LEVEL: "debug", NODE_ENV: "test" })).toBe("debug");
  });

  test("should ignore an unknown LOG_LEVEL", () => {
    expect(resolveLogLevel({ LOG_LEVEL: "loud" })).toBe("info");
  });

  test("should stay silent under test", () => {
    expect(resolveLogLevel({ NODE_ENV: "test" })).toBe("silent");
  });

  test("should default to info", () => {
    expect(resolveLogLevel({})).toBe("info");
  });
});

describe("createLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  test("should prefix messages and pass arguments through", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const logger = createLogger("[test] ", "debug");

    logger.warn("slow commit", 42);

    expect(warn).toHaveBeenCalledWith("[test] slow commit", 42);
  });

  test("should drop messages below its level", () => {
    const info = vi.spyOn(console, "info").mockImplementation(() => {});
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const logger = createLogger("", "warn");

    logger.info("hidden");
    logger.error("shown");

    expect(info).not.toHaveBeenCalled();
    expect(error).toHaveBeenCalledWith("shown");
  });

  test("should log nothing when silent", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const logger = createLogger("", "silent");

    logger.error("hidden");

    expect(error).not.toHaveBeenCalled();
  });
});
