import { describe, it, expect, vi, afterEach } from "vitest";
import { Logger, LogLevel, parseLogLevel } from "@/game/utils/logger";

afterEach(() => {
  vi.restoreAllMocks();
});

describe("parseLogLevel", () => {
  it("parses level names case-insensitively", () => {
    expect(parseLogLevel("off")).toBe(LogLevel.OFF);
    expect(parseLogLevel("ERROR")).toBe(LogLevel.ERROR);
    expect(parseLogLevel(" Warn ")).toBe(LogLevel.WARN);
    expect(parseLogLevel("info")).toBe(LogLevel.INFO);
    expect(parseLogLevel("debug")).toBe(LogLevel.DEBUG);
  });

  it("falls back for unknown names", () => {
    expect(parseLogLevel("verbose")).toBe(LogLevel.WARN);
    expect(parseLogLevel("", LogLevel.OFF)).toBe(LogLevel.OFF);
  });
});

describe("Logger", () => {
  it("drops messages above the current level", () => {
    const debugSpy = vi.spyOn(console, "debug").mockImplementation(() => {});
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    const log = new Logger(LogLevel.WARN);

    log.debug("CORE", "hidden");
    log.info("CORE", "hidden");

    expect(debugSpy).not.toHaveBeenCalled();
    expect(logSpy).not.toHaveBeenCalled();
  });

  it("writes enabled messages with a category tag", () => {
    const warnSpy = vi.spyOn(console, "warn").mockImplementation(() => {});
    const log = new Logger(LogLevel.WARN);

    log.warn("SCENE", "slow frame", 42);

    expect(warnSpy).toHaveBeenCalledTimes(1);
    expect(warnSpy.mock.calls[0][0]).toBe("%c[SCENE] slow frame");
    expect(warnSpy.mock.calls[0][2]).toBe(42);
  });

  it("OFF silences errors too", () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    const log = new Logger(LogLevel.OFF);

    log.error("UI", "boom");

    expect(errorSpy).not.toHaveBeenCalled();
  });

  it("level can be raised at runtime", () => {
    const debugSpy = vi.spyOn(console, "debug").mockImplementation(() => {});
    const log = new Logger(LogLevel.ERROR);

    log.level = LogLevel.DEBUG;
    log.debug("INPUT", "now visible");

    expect(log.level).toBe(LogLevel.DEBUG);
    expect(debugSpy).toHaveBeenCalledTimes(1);
  });
});
