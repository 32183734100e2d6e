import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from "vitest";

// Mock chalk to avoid color codes in tests
vi.mock("chalk", () => {
  const plain = (s: string) => s;
  return {
    default: {
      red: Object.assign(plain, { bold: plain }),
      yellow: plain,
      cyan: plain,
      dim: plain,
    },
  };
});

import { handleCommandError, renderError, renderUnknownError } from "./renderer.js";
import { CLIError } from "./types.js";
import { initContext, resetContext } from "../cli-context.js";
import { ZoneError } from "../time/errors.js";

describe("error renderer", () => {
  let consoleErrorSpy: MockInstance;

  beforeEach(() => {
    consoleErrorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    resetContext();
    process.exitCode = undefined;
  });

  afterEach(() => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
  });

  function printed(): string[] {
    return consoleErrorSpy.mock.calls.map((call) => String(call[0]));
  }

  it("renders message, suggestion and example in static mode", () => {
    renderError(
      new CLIError("VALIDATION_INVALID_OPTION", "Invalid --hint", {
        suggestion: "Choose from: date",
        example: "stamp parse 2024-03-01 --hint date",
      }),
      "static"
    );

    expect(printed()).toEqual([
      "",
      "✗ Invalid --hint",
      "",
      "  → Choose from: date",
      "",
      "  Try: stamp parse 2024-03-01 --hint date",
      "",
    ]);
  });

  it("renders JSON without undefined fields", () => {
    renderError(new CLIError("ZONE_UNKNOWN", 'Unknown time zone "X"'), "json");

    expect(JSON.parse(printed()[0])).toEqual({
      error: true,
      code: "ZONE_UNKNOWN",
      message: 'Unknown time zone "X"',
    });
  });

  it("picks JSON from the CLI context", () => {
    initContext(["node", "stamp", "--json"]);

    renderUnknownError(new ZoneError("X"));

    expect(JSON.parse(printed()[0]).code).toBe("ZONE_UNKNOWN");
  });

  it("wraps plain errors", () => {
    renderUnknownError(new Error("boom"), "json");

    expect(JSON.parse(printed()[0])).toEqual({
      error: true,
      code: "UNKNOWN_ERROR",
      message: "boom",
    });
  });

  it("marks the process as failed", () => {
    handleCommandError(new Error("boom"), "json");

    expect(process.exitCode).toBe(1);
  });
});
