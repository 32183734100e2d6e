import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from "vitest";
import { createLogger, createNoopLogger, type LoggerOptions } from "./logger.js";
import type { Clock } from "./ports/clock.js";

// 2021-07-01T12:00:00.000000042Z
const clock: Clock = { now: () => ({ seconds: 1_625_140_800, nanos: 42 }) };
const STAMP = "2021-07-01T12:00:00.000000042Z";

function logger(options: Omit<LoggerOptions, "clock">) {
  return createLogger({ ...options, clock });
}

describe("logger", () => {
  let consoleLogSpy: MockInstance;
  let consoleErrorSpy: MockInstance;

  beforeEach(() => {
    consoleLogSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    consoleErrorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  function lastLine(spy: MockInstance): string {
    return String(spy.mock.calls[spy.mock.calls.length - 1][0]);
  }

  describe("createLogger", () => {
    describe("log level filtering", () => {
      it("logs debug when level is debug", () => {
        logger({ level: "debug", json: false }).debug("test message");
        expect(consoleLogSpy).toHaveBeenCalledTimes(1);
      });

      it("does not log debug when level is info", () => {
        logger({ level: "info", json: false }).debug("test message");
        expect(consoleLogSpy).not.toHaveBeenCalled();
      });

      it("does not log info at the CLI default level", () => {
        logger({ level: "warn", json: false }).info("test message");
        expect(consoleLogSpy).not.toHaveBeenCalled();
      });

      it("logs warn when level is warn", () => {
        logger({ level: "warn", json: false }).warn("test message");
        expect(consoleErrorSpy).toHaveBeenCalledTimes(1);
      });

      it("does not log warn when level is error", () => {
        logger({ level: "error", json: false }).warn("test message");
        expect(consoleErrorSpy).not.toHaveBeenCalled();
      });
    });

    describe("output routing", () => {
      it("logs debug and info to stdout", () => {
        const log = logger({ level: "debug", json: false });
        log.debug("debug message");
        log.info("info message");
        expect(consoleLogSpy).toHaveBeenCalledTimes(2);
        expect(consoleErrorSpy).not.toHaveBeenCalled();
      });

      it("logs warn and error to stderr", () => {
        const log = logger({ level: "debug", json: false });
        log.warn("warn message");
        log.error("error message");
        expect(consoleErrorSpy).toHaveBeenCalledTimes(2);
        expect(consoleLogSpy).not.toHaveBeenCalled();
      });
    });

    describe("JSON format", () => {
      it("writes one JSON object per entry with an RFC 3339 timestamp", () => {
        logger({ level: "debug", json: true }).info("test message", { zone: "UTC", count: 42 });

        expect(JSON.parse(lastLine(consoleLogSpy))).toEqual({
          timestamp: STAMP,
          level: "info",
          message: "test message",
          zone: "UTC",
          count: 42,
        });
      });
    });

    describe("human-readable format", () => {
      it("writes timestamp, padded level and message", () => {
        logger({ level: "debug", json: false }).info("test message");

        expect(lastLine(consoleLogSpy)).toBe(`[${STAMP}] INFO  test message`);
      });

      it("appends metadata as JSON when provided", () => {
        logger({ level: "debug", json: false }).error("lookup failed", { zone: "Mars/Olympus" });

        expect(lastLine(consoleErrorSpy)).toBe(
          `[${STAMP}] ERROR lookup failed {"zone":"Mars/Olympus"}`
        );
      });

      it("uses the system clock when none is given", () => {
        vi.useFakeTimers();
        vi.setSystemTime(1_610_712_000_000);
        try {
          createLogger({ level: "info", json: false }).info("tick");
        } finally {
          vi.useRealTimers();
        }

        expect(lastLine(consoleLogSpy)).toBe("[2021-01-15T12:00:00Z] INFO  tick");
      });
    });

    describe("child logger", () => {
      it("includes default meta on all logs", () => {
        const child = logger({ level: "debug", json: true }).child({ component: "zones" });

        child.info("message 1");
        child.warn("message 2");

        expect(JSON.parse(lastLine(consoleLogSpy)).component).toBe("zones");
        expect(JSON.parse(lastLine(consoleErrorSpy)).component).toBe("zones");
      });

      it("lets per-call metadata override default meta", () => {
        const child = logger({ level: "debug", json: true }).child({ component: "default" });

        child.info("message", { component: "override" });

        expect(JSON.parse(lastLine(consoleLogSpy)).component).toBe("override");
      });

      it("supports nested child loggers", () => {
        const child = logger({ level: "debug", json: true })
          .child({ level1: "value1" })
          .child({ level2: "value2" });

        child.info("nested message");

        const output = JSON.parse(lastLine(consoleLogSpy));
        expect(output.level1).toBe("value1");
        expect(output.level2).toBe("value2");
      });
    });
  });

  describe("createNoopLogger", () => {
    it("returns a logger that does nothing", () => {
      const log = createNoopLogger();

      log.debug("debug");
      log.info("info");
      log.warn("warn");
      log.error("error");
      log.child({ component: "test" }).info("test");

      expect(consoleLogSpy).not.toHaveBeenCalled();
      expect(consoleErrorSpy).not.toHaveBeenCalled();
    });
  });
});
