import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from "vitest";
import { Command } from "commander";

// Mock chalk to avoid color codes in tests
vi.mock("chalk", () => {
  const plain = (s: string) => s;
  return {
    default: {
      red: Object.assign(plain, { bold: plain }),
      yellow: plain,
      cyan: plain,
      dim: plain,
      gray: plain,
    },
  };
});

import { formatTimestamp, registerFormatCommand } from "./format.js";
import { resetContext } from "../lib/cli-context.js";
import { createTestDeps } from "../lib/testing.js";

describe("format command", () => {
  let program: Command;
  let consoleLogSpy: MockInstance;
  let consoleErrorSpy: MockInstance;

  beforeEach(() => {
    program = new Command();
    program.exitOverride();
    registerFormatCommand(program, createTestDeps());

    consoleLogSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    consoleErrorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    resetContext();
    process.exitCode = undefined;
  });

  afterEach(() => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
  });

  describe("formatTimestamp", () => {
    it("re-renders a timestamp in a zone", () => {
      const result = formatTimestamp("2021-07-01T12:00:00Z", { zone: "CEST" }, createTestDeps());

      expect(result.timestamp).toBe("2021-07-01T14:00:00+02:00");
    });

    it("reads epoch seconds", () => {
      const result = formatTimestamp("1625140800", { epoch: "seconds" }, createTestDeps());

      expect(result.timestamp).toBe("2021-07-01T12:00:00Z");
    });

    it("reads epoch milliseconds", () => {
      const result = formatTimestamp("1625140800123", { epoch: "millis", offset: "+01:00" }, createTestDeps());

      expect(result.timestamp).toBe("2021-07-01T13:00:00.123000000+01:00");
    });
  });

  it("prints the re-rendered timestamp", async () => {
    await program.parseAsync(["node", "test", "format", "2021-07-01T14:00:00+02:00", "--offset", "-04:00"]);

    expect(consoleLogSpy).toHaveBeenCalledWith("2021-07-01T08:00:00-04:00");
  });

  it("defaults to the configured zone", async () => {
    await program.parseAsync(["node", "test", "format", "2021-07-01T14:00:00+02:00"]);

    expect(consoleLogSpy).toHaveBeenCalledWith("2021-07-01T12:00:00Z");
  });

  it("rejects an unknown epoch unit", async () => {
    await program.parseAsync(["node", "test", "format", "1", "--epoch", "days"]);

    expect(consoleErrorSpy).toHaveBeenCalledWith('✗ Invalid --epoch: unknown unit "days"');
    expect(process.exitCode).toBe(1);
  });
});
