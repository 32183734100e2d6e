/**
 * Error codes for every failure the timestamp core can report.
 */
export type TimeErrorCode =
  | "PARSE_MALFORMED"
  | "PARSE_OUT_OF_RANGE"
  | "PARSE_AMBIGUOUS_OFFSET"
  | "ZONE_UNKNOWN"
  | "ARITHMETIC_OUT_OF_RANGE";

export type ParseErrorKind = "Malformed" | "OutOfRange" | "AmbiguousOffset";

/**
 * Base class for the core's errors. They travel inside `Result` values
 * rather than being thrown, but stay real `Error`s so they can be rethrown
 * or attached as a `cause`.
 */
export abstract class TimeError extends Error {
  abstract readonly code: TimeErrorCode;
}

const PARSE_CODES: Record<ParseErrorKind, TimeErrorCode> = {
  Malformed: "PARSE_MALFORMED",
  OutOfRange: "PARSE_OUT_OF_RANGE",
  AmbiguousOffset: "PARSE_AMBIGUOUS_OFFSET",
};

export class ParseError extends TimeError {
  readonly code: TimeErrorCode;
  readonly kind: ParseErrorKind;
  /** The complete text handed to the parser */
  readonly input: string;
  /** Calendar field that failed validation (`month`, `offsetHour`, ...) */
  readonly field?: string;
  /** Offending substring of `input` */
  readonly fragment?: string;

  constructor(
    kind: ParseErrorKind,
    message: string,
    options: { input: string; field?: string; fragment?: string; cause?: Error }
  ) {
    super(message, { cause: options.cause });
    this.name = "ParseError";
    this.kind = kind;
    this.code = PARSE_CODES[kind];
    this.input = options.input;
    this.field = options.field;
    this.fragment = options.fragment;
  }
}

export class ZoneError extends TimeError {
  readonly code = "ZONE_UNKNOWN" as const;
  readonly kind = "UnknownZone" as const;
  readonly zone: string;

  constructor(zone: string) {
    super(`Unknown time zone "${zone}"`);
    this.name = "ZoneError";
    this.zone = zone;
  }
}

export class ArithmeticError extends TimeError {
  readonly code = "ARITHMETIC_OUT_OF_RANGE" as const;
  readonly kind = "OutOfRange" as const;

  constructor(message: string) {
    super(message);
    this.name = "ArithmeticError";
  }
}

// ---------------------------------------------------------------------------
// Factories
// ---------------------------------------------------------------------------

export function malformed(input: string, expected: string): ParseError {
  return new ParseError("Malformed", `"${input}" is not ${expected}`, {
    input,
    fragment: input,
  });
}

export function fieldOutOfRange(
  input: string,
  field: string,
  fragment: string,
  bounds: string
): ParseError {
  return new ParseError(
    "OutOfRange",
    `${field} ${fragment} is out of range (${bounds}) in "${input}"`,
    { input, field, fragment }
  );
}

export function ambiguousOffset(input: string): ParseError {
  return new ParseError(
    "AmbiguousOffset",
    `"${input}" has a time of day but no UTC offset`,
    { input }
  );
}

export function isTimeError(error: unknown): error is TimeError {
  return error instanceof TimeError;
}
