import { Command } from "commander";
import type { StampDeps } from "../lib/deps.js";
import { describeDuration, describeInstant } from "../lib/display.js";
import { fromTimeError } from "../lib/errors/catalog.js";
import { handleCommandError } from "../lib/errors/renderer.js";
import { readDuration, readInstant } from "../lib/input.js";
import { maybeOutputJson, type DurationJson, type TimestampJson } from "../lib/json-output.js";
import { add, difference, subtract } from "../lib/time/arithmetic.js";

/**
 * `timestamp ± duration`, shown in the configured display zone.
 */
export function shiftTimestamp(
  input: string,
  durationText: string,
  direction: "add" | "sub",
  deps: StampDeps
): TimestampJson {
  const instant = readInstant(input, deps);
  const duration = readDuration(durationText);
  const result = direction === "add" ? add(instant, duration) : subtract(instant, duration);
  if (!result.success) throw fromTimeError(result.error);

  deps.logger.debug("Shifted timestamp", {
    from: instant.toString(),
    by: duration.toString(),
    direction,
  });
  return describeInstant(result.value, {}, deps);
}

/**
 * `a - b` as an exact duration.
 */
export function diffTimestamps(a: string, b: string, deps: StampDeps): DurationJson {
  return describeDuration(difference(readInstant(a, deps), readInstant(b, deps)));
}

function registerShift(program: Command, deps: StampDeps, direction: "add" | "sub"): void {
  program
    .command(direction)
    .description(
      direction === "add"
        ? "Add a duration to a timestamp"
        : "Subtract a duration from a timestamp"
    )
    .argument("<timestamp>", "Timestamp, date or 'now'")
    .argument("<duration>", "Duration such as 1h30m, 2d or 1.5s (prefix - to reverse)")
    .action((input: string, durationText: string) => {
      try {
        const result = shiftTimestamp(input, durationText, direction, deps);
        if (!maybeOutputJson(result)) {
          console.log(result.timestamp);
        }
      } catch (error) {
        handleCommandError(error);
      }
    });
}

export function registerMathCommands(program: Command, deps: StampDeps): void {
  registerShift(program, deps, "add");
  registerShift(program, deps, "sub");

  program
    .command("diff")
    .description("Print the exact duration from <b> to <a> (a - b)")
    .argument("<a>", "Timestamp, date or 'now'")
    .argument("<b>", "Timestamp, date or 'now'")
    .action((a: string, b: string) => {
      try {
        const result = diffTimestamps(a, b, deps);
        if (!maybeOutputJson(result)) {
          console.log(result.duration);
        }
      } catch (error) {
        handleCommandError(error);
      }
    });
}
