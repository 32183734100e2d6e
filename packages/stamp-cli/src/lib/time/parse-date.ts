import { ambiguousOffset, malformed, type ParseError } from "./errors.js";
import { assertOffset } from "./format.js";
import type { Instant } from "./instant.js";
import { instantFromFields, parseRfc3339, RFC3339_PATTERN, type RawFields } from "./parse.js";
import { err, type Result } from "./result.js";

export type DateShape = "rfc3339" | "date" | "basic-date" | "datetime";

export const DATE_SHAPES: readonly DateShape[] = ["rfc3339", "date", "basic-date", "datetime"];

export interface ParseDateOptions {
  /** Only try this shape */
  hint?: DateShape;
  /**
   * Offset assumed when the text carries none. Dates fall back to UTC
   * without it; date-times fail with `AmbiguousOffset`.
   */
  defaultOffsetSeconds?: number;
}

/**
 * Fields recognised in the text plus the defaults filled in for the rest.
 * `offsetSeconds` stays undefined when neither the text nor the options
 * supply one.
 */
export interface ParsedDate {
  shape: Exclude<DateShape, "rfc3339">;
  fields: RawFields;
  offsetSeconds?: number;
}

interface ShapeMatcher {
  shape: Exclude<DateShape, "rfc3339">;
  pattern: RegExp;
  /** Whether a missing offset may default to UTC */
  utcByDefault: boolean;
  fields(match: RegExpExecArray): RawFields;
}

const MIDNIGHT = { hour: "00", minute: "00", second: "00" };

const MATCHERS: Record<Exclude<DateShape, "rfc3339">, ShapeMatcher> = {
  date: {
    shape: "date",
    pattern: /^(\d{4})-(\d{2})-(\d{2})$/,
    utcByDefault: true,
    fields: ([, year, month, day]) => ({ year, month, day, ...MIDNIGHT }),
  },
  "basic-date": {
    shape: "basic-date",
    pattern: /^(\d{4})(\d{2})(\d{2})$/,
    utcByDefault: true,
    fields: ([, year, month, day]) => ({ year, month, day, ...MIDNIGHT }),
  },
  datetime: {
    shape: "datetime",
    pattern: /^(\d{4})-(\d{2})-(\d{2})[Tt ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?$/,
    utcByDefault: false,
    fields: ([, year, month, day, hour, minute, second, fraction]) => ({
      year,
      month,
      day,
      hour,
      minute,
      second: second ?? "00",
      fraction,
    }),
  },
};

const EXPECTED: Record<DateShape, string> = {
  rfc3339: "an RFC 3339 timestamp",
  date: "a date (YYYY-MM-DD)",
  "basic-date": "a basic date (YYYYMMDD)",
  datetime: "a date and time (YYYY-MM-DD HH:MM[:SS[.fraction]])",
};

/**
 * Recognise one of the supported date shapes without converting it.
 * Returns undefined when no (or not the hinted) shape matches.
 */
export function recognizeDate(input: string, options: ParseDateOptions = {}): ParsedDate | undefined {
  const candidates = options.hint ? [options.hint] : DATE_SHAPES;

  for (const shape of candidates) {
    if (shape === "rfc3339") continue;
    const matcher = MATCHERS[shape];
    const match = matcher.pattern.exec(input);
    if (!match) continue;

    return {
      shape,
      fields: matcher.fields(match),
      offsetSeconds: options.defaultOffsetSeconds ?? (matcher.utcByDefault ? 0 : undefined),
    };
  }
  return undefined;
}

/**
 * Which shape `parseDate` would read `input` as, if any.
 */
export function detectShape(input: string, hint?: DateShape): DateShape | undefined {
  if ((hint === undefined || hint === "rfc3339") && RFC3339_PATTERN.test(input)) {
    return "rfc3339";
  }
  return recognizeDate(input, { hint })?.shape;
}

/**
 * Parse a full RFC 3339 timestamp, a bare date, or a date-time without
 * offset. See `ParseDateOptions` for how missing fields are filled in:
 * a missing time is midnight, missing seconds and fraction are zero.
 */
export function parseDate(input: string, options: ParseDateOptions = {}): Result<Instant, ParseError> {
  if (options.defaultOffsetSeconds !== undefined) {
    assertOffset(options.defaultOffsetSeconds);
  }

  const tryRfc3339 = options.hint === undefined || options.hint === "rfc3339";
  if (tryRfc3339 && RFC3339_PATTERN.test(input)) {
    return parseRfc3339(input);
  }

  const parsed = recognizeDate(input, options);
  if (!parsed) {
    const expected = options.hint
      ? EXPECTED[options.hint]
      : DATE_SHAPES.map((shape) => EXPECTED[shape]).join(", ");
    return err(malformed(input, options.hint ? expected : `one of: ${expected}`));
  }

  if (parsed.offsetSeconds === undefined) {
    return err(ambiguousOffset(input));
  }
  return instantFromFields(input, parsed.fields, parsed.offsetSeconds);
}
