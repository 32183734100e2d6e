import { Command } from "commander";
import type { StampDeps } from "../lib/deps.js";
import { describeInstant, type DisplayTarget } from "../lib/display.js";
import { handleCommandError } from "../lib/errors/renderer.js";
import { readEpoch, readEpochUnit, readInstant } from "../lib/input.js";
import { maybeOutputJson, type TimestampJson } from "../lib/json-output.js";

export interface FormatOptions extends DisplayTarget {
  /** Read the argument as a count of seconds or millis since the epoch */
  epoch?: string;
}

export function formatTimestamp(
  input: string,
  options: FormatOptions,
  deps: StampDeps
): TimestampJson {
  const instant =
    options.epoch === undefined
      ? readInstant(input, deps)
      : readEpoch(input, readEpochUnit(options.epoch));
  return describeInstant(instant, { zone: options.zone, offset: options.offset }, deps);
}

export function registerFormatCommand(program: Command, deps: StampDeps): void {
  program
    .command("format")
    .description("Re-render a timestamp in a time zone or at a fixed offset")
    .argument("<timestamp>", "Timestamp, date, 'now', or an epoch count with --epoch")
    .option("-z, --zone <zone>", "Time zone: IANA name, UTC or a fixed offset")
    .option("--offset <offset>", "Fixed UTC offset such as -03:00")
    .option("--epoch <unit>", "Read <timestamp> as seconds or millis since the epoch")
    .action((input: string, options: FormatOptions) => {
      try {
        const result = formatTimestamp(input, options, deps);
        if (!maybeOutputJson(result)) {
          console.log(result.timestamp);
        }
      } catch (error) {
        handleCommandError(error);
      }
    });
}
