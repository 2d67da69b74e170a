import { describe, it, expect, vi, afterEach } from "vitest";
import { logger } from "../src/logger.js";
import { parseBbcode } from "../src/parser.js";

afterEach(() => {
  vi.restoreAllMocks();
});

describe("logger", () => {
  it("should log fallbacks at debug level when BBCODE_DEBUG is set", () => {
    process.env.BBCODE_DEBUG = "1";
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
    parseBbcode("[u]x[/u]");
    expect(debug).toHaveBeenCalledTimes(1);
    expect(debug).toHaveBeenCalledWith("[bbcode] W_UNKNOWN_TAG at byte 0: Unknown tag [u]");
  });

  it("should keep debug output off by default", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
    parseBbcode("[u]x[/u]");
    expect(debug).not.toHaveBeenCalled();
  });

  it("should stay silent in production", () => {
    process.env.NODE_ENV = "production";
    process.env.BBCODE_DEBUG = "1";
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    logger.debug("x");
    logger.warn("y");
    expect(debug).not.toHaveBeenCalled();
    expect(warn).not.toHaveBeenCalled();
  });

  it("should survive a throwing console", () => {
    vi.spyOn(console, "warn").mockImplementation(() => {
      throw new Error("broken console");
    });
    expect(() => logger.warn("z")).not.toThrow();
  });
});
