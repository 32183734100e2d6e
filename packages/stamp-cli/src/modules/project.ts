import { Command } from "commander";
import chalk from "chalk";
import CliTable3 from "cli-table3";
import type { StampDeps } from "../lib/deps.js";
import { describeProjection } from "../lib/display.js";
import { handleCommandError } from "../lib/errors/renderer.js";
import { readInstant } from "../lib/input.js";
import { maybeOutputJson, type ProjectionJson } from "../lib/json-output.js";
import { formatOffset } from "../lib/time/format.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ProjectOptions {
  zone?: string;
}

const WEEKDAYS = ["Monday", "Tuesday", "Wednesday", "Thursday", "Friday", "Saturday", "Sunday"];

// ---------------------------------------------------------------------------
// Core Logic
// ---------------------------------------------------------------------------

export function projectTimestamp(
  input: string,
  options: ProjectOptions,
  deps: StampDeps
): ProjectionJson {
  const instant = readInstant(input, deps);
  return describeProjection(instant, options.zone ?? deps.config.zone, deps);
}

// ---------------------------------------------------------------------------
// Output Formatting
// ---------------------------------------------------------------------------

export function formatAsTable(projection: ProjectionJson): string {
  const table = new CliTable3({
    head: [chalk.cyan("Field"), chalk.cyan("Value")],
  });

  table.push(
    ["Zone", projection.zone],
    ["Local time", projection.timestamp],
    ["Year", String(projection.year)],
    ["Month", String(projection.month)],
    ["Day", String(projection.day)],
    ["Hour", String(projection.hour)],
    ["Minute", String(projection.minute)],
    ["Second", String(projection.second)],
    ["Nanosecond", String(projection.nanosecond)],
    ["Weekday", WEEKDAYS[projection.dayOfWeek - 1]],
    ["Offset", `${formatOffset(projection.offsetSeconds)} (${projection.offsetSeconds}s)`],
    ["Abbreviation", projection.abbreviation ?? chalk.gray("(none)")]
  );

  return table.toString();
}

// ---------------------------------------------------------------------------
// Command Registration
// ---------------------------------------------------------------------------

export function registerProjectCommand(program: Command, deps: StampDeps): void {
  program
    .command("project")
    .description("Show the calendar fields of a timestamp in a time zone")
    .argument("<timestamp>", "Timestamp, date or 'now'")
    .option("-z, --zone <zone>", "Time zone: IANA name, UTC or a fixed offset")
    .action((input: string, options: ProjectOptions) => {
      try {
        const result = projectTimestamp(input, options, deps);
        if (!maybeOutputJson(result)) {
          console.log(formatAsTable(result));
        }
      } catch (error) {
        handleCommandError(error);
      }
    });
}
