import type { StampDeps } from "./deps.js";
import { fromTimeError, invalidArgument, invalidDuration, invalidOption } from "./errors/catalog.js";
import { Duration } from "./time/duration.js";
import { malformed } from "./time/errors.js";
import type { Instant } from "./time/instant.js";
import { now } from "./time/instant.js";
import { DATE_SHAPES, parseDate, type DateShape } from "./time/parse-date.js";
import { parseUtcOffset } from "./time/parse.js";
import { deserialize, epochMillisSchema, epochSecondsSchema } from "./time/serde.js";

// ---------------------------------------------------------------------------
// Command-line values → domain values. Every reader throws a CLIError.
// ---------------------------------------------------------------------------

export interface InstantInputOptions {
  /** Offset assumed when the text has none; overrides parse.defaultOffset */
  offset?: string;
  hint?: DateShape;
}

/**
 * `now`, or anything `parseDate` accepts.
 */
export function readInstant(
  text: string,
  deps: StampDeps,
  options: InstantInputOptions = {}
): Instant {
  if (text === "now") {
    const current = now(deps.clock);
    if (!current.success) throw fromTimeError(current.error);
    return current.value;
  }

  const offsetText = options.offset ?? deps.config.defaultOffset;
  const defaultOffsetSeconds =
    offsetText === undefined ? undefined : readOffset(offsetText);

  const result = parseDate(text, { hint: options.hint, defaultOffsetSeconds });
  if (!result.success) {
    deps.logger.debug("Rejected timestamp", {
      input: text,
      kind: result.error.kind,
      field: result.error.field,
    });
    throw fromTimeError(result.error);
  }
  return result.value;
}

export type EpochUnit = "seconds" | "millis";

export const EPOCH_UNITS: readonly EpochUnit[] = ["seconds", "millis"];

/**
 * An integer count of seconds or milliseconds since the epoch.
 */
export function readEpoch(text: string, unit: EpochUnit): Instant {
  const schema = unit === "seconds" ? epochSecondsSchema : epochMillisSchema;
  const value = /^-?\d+$/.test(text) ? Number(text) : Number.NaN;
  const result = deserialize(schema, value);
  if (result.success) return result.value;

  const parseError =
    result.error.parseError ??
    malformed(text, `an integer count of ${unit} since the epoch`);
  throw fromTimeError(parseError);
}

/**
 * A UTC offset in seconds east of UTC.
 */
export function readOffset(text: string, optionName = "offset"): number {
  const result = parseUtcOffset(text);
  if (!result.success) {
    throw invalidOption(optionName, result.error.message);
  }
  return result.value;
}

export function readDuration(text: string): Duration {
  const result = Duration.parse(text);
  if (!result.success) throw invalidDuration(text);
  return result.value;
}

export function readHint(text: string): DateShape {
  const shape = DATE_SHAPES.find((candidate) => candidate === text);
  if (!shape) {
    throw invalidOption("hint", `unknown shape "${text}"`, [...DATE_SHAPES]);
  }
  return shape;
}

export function readEpochUnit(text: string): EpochUnit {
  const unit = EPOCH_UNITS.find((candidate) => candidate === text);
  if (!unit) {
    throw invalidOption("epoch", `unknown unit "${text}"`, [...EPOCH_UNITS]);
  }
  return unit;
}

/**
 * A non-negative whole number of days.
 */
export function readCount(text: string): number {
  if (!/^\d+$/.test(text)) {
    throw invalidArgument("count", text, "a non-negative whole number");
  }
  return Number(text);
}
