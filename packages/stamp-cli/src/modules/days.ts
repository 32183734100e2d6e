import { Command } from "commander";
import type { StampDeps } from "../lib/deps.js";
import { describeInstant } from "../lib/display.js";
import { fromTimeError } from "../lib/errors/catalog.js";
import { handleCommandError } from "../lib/errors/renderer.js";
import { readCount, readInstant } from "../lib/input.js";
import { maybeOutputJson, type TimestampJson } from "../lib/json-output.js";
import { daysBackFrom, nextDay } from "../lib/time/days.js";

export function nextDayFrom(input: string, deps: StampDeps): TimestampJson {
  const result = nextDay(readInstant(input, deps));
  if (!result.success) throw fromTimeError(result.error);
  return describeInstant(result.value, { zone: "UTC" }, deps);
}

export function daysBackFromInput(countText: string, from: string, deps: StampDeps): TimestampJson {
  const result = daysBackFrom(readInstant(from, deps), readCount(countText));
  if (!result.success) throw fromTimeError(result.error);
  return describeInstant(result.value, { zone: "UTC" }, deps);
}

export function registerDaysCommands(program: Command, deps: StampDeps): void {
  program
    .command("next-day")
    .description("Print the first UTC midnight at or after a timestamp")
    .argument("[timestamp]", "Timestamp, date or 'now'", "now")
    .action((input: string) => {
      try {
        const result = nextDayFrom(input, deps);
        if (!maybeOutputJson(result)) {
          console.log(result.timestamp);
        }
      } catch (error) {
        handleCommandError(error);
      }
    });

  program
    .command("days-back")
    .description("Print UTC midnight a number of days before the last midnight preceding a timestamp")
    .argument("<count>", "Number of days, 0 for the last midnight before the timestamp")
    .option("--from <timestamp>", "Timestamp to count back from", "now")
    .action((countText: string, options: { from: string }) => {
      try {
        const result = daysBackFromInput(countText, options.from, deps);
        if (!maybeOutputJson(result)) {
          console.log(result.timestamp);
        }
      } catch (error) {
        handleCommandError(error);
      }
    });
}
