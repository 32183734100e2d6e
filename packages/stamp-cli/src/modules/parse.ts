import { Command } from "commander";
import chalk from "chalk";
import type { StampDeps } from "../lib/deps.js";
import { handleCommandError } from "../lib/errors/renderer.js";
import { readHint, readInstant } from "../lib/input.js";
import { maybeOutputJson, type ParseResultJson } from "../lib/json-output.js";
import { detectShape } from "../lib/time/parse-date.js";
import { serializeInstant } from "../lib/time/serde.js";

export interface ParseOptions {
  hint?: string;
  /** Offset for a date-time that has none */
  offset?: string;
}

/**
 * Read free-form timestamp text and report the instant in canonical form.
 */
export function parseTimestamp(
  input: string,
  options: ParseOptions,
  deps: StampDeps
): ParseResultJson {
  const hint = options.hint === undefined ? undefined : readHint(options.hint);
  const instant = readInstant(input, deps, { hint, offset: options.offset });
  const utc = serializeInstant(instant);

  return {
    input,
    shape: input === "now" ? "now" : (detectShape(input, hint) ?? "unknown"),
    timestamp: utc,
    utc,
    epochSeconds: instant.epochSeconds,
    nanos: instant.nanos,
  };
}

export function registerParseCommand(program: Command, deps: StampDeps): void {
  program
    .command("parse")
    .description("Parse a timestamp, date or date-time into canonical UTC")
    .argument("<text>", "Text to parse, e.g. 2024-03-01 or '2024-03-01 12:30'")
    .option("--hint <shape>", "Only accept one shape: rfc3339, date, basic-date, datetime")
    .option("--offset <offset>", "Offset assumed when the text has none")
    .action((input: string, options: ParseOptions) => {
      try {
        const result = parseTimestamp(input, options, deps);
        if (maybeOutputJson(result)) return;

        console.log(result.utc);
        console.log(
          chalk.gray(`${result.shape} · ${result.epochSeconds}s + ${result.nanos}ns since the epoch`)
        );
      } catch (error) {
        handleCommandError(error);
      }
    });
}
