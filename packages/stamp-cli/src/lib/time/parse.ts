import { daysInMonth, epochSecondsFromCivil, type CivilDateTime } from "./calendar.js";
import {
  fieldOutOfRange,
  malformed,
  ParseError,
} from "./errors.js";
import { Instant } from "./instant.js";
import { err, ok, type Result } from "./result.js";

/**
 * Accepted RFC 3339 profile:
 *
 *   date-time    = full-date sep partial-time offset
 *   full-date    = 4DIGIT "-" 2DIGIT "-" 2DIGIT
 *   sep          = "T" / "t" / " "
 *   partial-time = 2DIGIT ":" 2DIGIT ":" 2DIGIT [ "." 1*9DIGIT ]
 *   offset       = "Z" / "z" / ( "+" / "-" ) 2DIGIT ":" 2DIGIT
 */
export const RFC3339_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})[Tt ](\d{2}):(\d{2}):(\d{2})(?:\.(\d{1,9}))?(?:([Zz])|([+-])(\d{2}):(\d{2}))$/;

const OFFSET_PATTERN = /^(?:([Zz])|([+-])(\d{2}):?(\d{2}))$/;

const RFC3339_EXPECTED = "an RFC 3339 timestamp (YYYY-MM-DDTHH:MM:SS[.fraction](Z|±HH:MM))";

/**
 * Calendar fields as they appear in the text, before validation.
 */
export interface RawFields {
  year: string;
  month: string;
  day: string;
  hour: string;
  minute: string;
  second: string;
  fraction?: string;
}

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

export function parseRfc3339(input: string): Result<Instant, ParseError> {
  const match = RFC3339_PATTERN.exec(input);
  if (!match) {
    return err(malformed(input, RFC3339_EXPECTED));
  }

  const [, year, month, day, hour, minute, second, fraction, zulu, sign, offsetHour, offsetMinute] =
    match;

  let offsetSeconds = 0;
  if (zulu === undefined) {
    const offset = offsetFromParts(input, sign, offsetHour, offsetMinute);
    if (!offset.success) return offset;
    offsetSeconds = offset.value;
  }

  return instantFromFields(
    input,
    { year, month, day, hour, minute, second, fraction },
    offsetSeconds
  );
}

/**
 * Parse a UTC offset (`Z`, `±HH:MM` or `±HHMM`) into seconds east of UTC.
 */
export function parseUtcOffset(input: string): Result<number, ParseError> {
  const match = OFFSET_PATTERN.exec(input);
  if (!match) {
    return err(malformed(input, "a UTC offset (Z, ±HH:MM or ±HHMM)"));
  }

  const [, zulu, sign, hour, minute] = match;
  if (zulu !== undefined) return ok(0);
  return offsetFromParts(input, sign, hour, minute);
}

// ---------------------------------------------------------------------------
// Shared with the free-form date parser
// ---------------------------------------------------------------------------

/**
 * Validate raw fields and combine them with an offset into an instant.
 * Reports the first field that is out of range.
 */
export function instantFromFields(
  input: string,
  raw: RawFields,
  offsetSeconds: number
): Result<Instant, ParseError> {
  const civil: CivilDateTime = {
    year: Number(raw.year),
    month: Number(raw.month),
    day: Number(raw.day),
    hour: Number(raw.hour),
    minute: Number(raw.minute),
    second: Number(raw.second),
  };

  if (civil.month < 1 || civil.month > 12) {
    return err(fieldOutOfRange(input, "month", raw.month, "01-12"));
  }
  const monthLength = daysInMonth(civil.year, civil.month);
  if (civil.day < 1 || civil.day > monthLength) {
    return err(fieldOutOfRange(input, "day", raw.day, `01-${monthLength}`));
  }
  if (civil.hour > 23) {
    return err(fieldOutOfRange(input, "hour", raw.hour, "00-23"));
  }
  if (civil.minute > 59) {
    return err(fieldOutOfRange(input, "minute", raw.minute, "00-59"));
  }
  if (civil.second > 59) {
    return err(fieldOutOfRange(input, "second", raw.second, "00-59"));
  }

  const nanos = raw.fraction === undefined ? 0 : Number(raw.fraction.padEnd(9, "0"));
  const seconds = epochSecondsFromCivil(civil) - offsetSeconds;
  const instant = Instant.fromEpochNanoseconds(BigInt(seconds) * 1_000_000_000n + BigInt(nanos));
  if (!instant.success) {
    return err(
      new ParseError("OutOfRange", `"${input}" is outside the supported range`, {
        input,
        field: "instant",
        fragment: input,
        cause: instant.error,
      })
    );
  }
  return instant;
}

function offsetFromParts(
  input: string,
  sign: string,
  hour: string,
  minute: string
): Result<number, ParseError> {
  const hours = Number(hour);
  const minutes = Number(minute);
  if (hours > 23) {
    return err(fieldOutOfRange(input, "offsetHour", hour, "00-23"));
  }
  if (minutes > 59) {
    return err(fieldOutOfRange(input, "offsetMinute", minute, "00-59"));
  }

  // "-00:00" means UTC
  const magnitude = hours * 3600 + minutes * 60;
  if (sign === "-" && magnitude > 0) return ok(-magnitude);
  return ok(magnitude);
}
