import { Command } from "commander";
import type { StampDeps } from "../lib/deps.js";
import { describeInstant, type DisplayTarget } from "../lib/display.js";
import { handleCommandError } from "../lib/errors/renderer.js";
import { readInstant } from "../lib/input.js";
import { maybeOutputJson, type TimestampJson } from "../lib/json-output.js";

export function currentTimestamp(deps: StampDeps, target: DisplayTarget): TimestampJson {
  return describeInstant(readInstant("now", deps), target, deps);
}

export function registerNowCommand(program: Command, deps: StampDeps): void {
  program
    .command("now")
    .description("Print the current time as RFC 3339")
    .option("-z, --zone <zone>", "Time zone: IANA name, UTC or a fixed offset")
    .option("--offset <offset>", "Fixed UTC offset such as +05:30")
    .action((options: DisplayTarget) => {
      try {
        const result = currentTimestamp(deps, options);
        if (!maybeOutputJson(result)) {
          console.log(result.timestamp);
        }
      } catch (error) {
        handleCommandError(error);
      }
    });
}
