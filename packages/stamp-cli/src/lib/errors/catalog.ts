import { ParseError, ZoneError, type TimeError } from "../time/errors.js";
import { CLIError } from "./types.js";

/**
 * Error catalog - factory functions for creating CLIErrors with helpful context.
 * Each function produces a consistent, user-friendly error message.
 */

const SUPPORTED_RANGE = "0000-01-02T00:00:00Z to 9999-12-30T23:59:59.999999999Z";

// ============================================================================
// Timestamp Errors
// ============================================================================

export function malformedTimestamp(error: ParseError): CLIError {
  return new CLIError("PARSE_MALFORMED", `Can't read "${error.input}" as a timestamp`, {
    suggestion: "Use RFC 3339, a plain date, or a date and time",
    examples: [
      "stamp parse 2024-03-01T12:30:00Z",
      "stamp parse 2024-03-01",
      'stamp parse "2024-03-01 12:30" --offset +01:00',
    ],
    details: error.message,
    cause: error,
  });
}

export function timestampOutOfRange(error: ParseError): CLIError {
  const subject = error.field && error.fragment
    ? `${error.field} ${error.fragment} is out of range`
    : `"${error.input}" is out of range`;
  return new CLIError("PARSE_OUT_OF_RANGE", subject.charAt(0).toUpperCase() + subject.slice(1), {
    suggestion: `Check the calendar fields. Supported instants run from ${SUPPORTED_RANGE}`,
    details: error.message,
    cause: error,
  });
}

export function missingOffset(error: ParseError): CLIError {
  return new CLIError("PARSE_AMBIGUOUS_OFFSET", `"${error.input}" has no UTC offset`, {
    suggestion: "Add Z or ±HH:MM, pass --offset, or set parse.defaultOffset in the config",
    example: `stamp parse "${error.input}" --offset +00:00`,
    cause: error,
  });
}

// ============================================================================
// Zone Errors
// ============================================================================

export function unknownZone(error: ZoneError): CLIError {
  return new CLIError("ZONE_UNKNOWN", `Unknown time zone "${error.zone}"`, {
    suggestion: "Use an IANA zone name or a fixed offset",
    examples: ["stamp now --zone Europe/Berlin", "stamp now --zone +05:30"],
    cause: error,
  });
}

// ============================================================================
// Arithmetic Errors
// ============================================================================

export function arithmeticOutOfRange(error: TimeError): CLIError {
  return new CLIError("ARITHMETIC_OUT_OF_RANGE", "The result falls outside the supported range", {
    suggestion: `Supported instants run from ${SUPPORTED_RANGE}`,
    details: error.message,
    cause: error,
  });
}

/**
 * Map any error from the timestamp core to its CLI counterpart.
 */
export function fromTimeError(error: TimeError): CLIError {
  if (error instanceof ParseError) {
    switch (error.kind) {
      case "Malformed":
        return malformedTimestamp(error);
      case "OutOfRange":
        return timestampOutOfRange(error);
      case "AmbiguousOffset":
        return missingOffset(error);
    }
  }
  if (error instanceof ZoneError) {
    return unknownZone(error);
  }
  return arithmeticOutOfRange(error);
}

// ============================================================================
// Validation Errors
// ============================================================================

export function invalidDuration(input: string): CLIError {
  return new CLIError("VALIDATION_INVALID_DURATION", `Can't read "${input}" as a duration`, {
    suggestion: "Combine d, h, m, s, ms, us and ns; prefix with - to go backwards",
    examples: ["stamp add now 1h30m", "stamp sub now 1.5s", "stamp add 2024-03-01 -- -2d"],
  });
}

export function invalidOption(optionName: string, reason: string, validValues?: string[]): CLIError {
  return new CLIError("VALIDATION_INVALID_OPTION", `Invalid --${optionName}: ${reason}`, {
    suggestion: validValues?.length
      ? `Choose from: ${validValues.join(", ")}`
      : undefined,
  });
}

export function invalidArgument(name: string, input: string, expected: string): CLIError {
  return new CLIError("VALIDATION_INVALID_ARGUMENT", `Invalid <${name}>: "${input}" is not ${expected}`);
}

export function invalidConfig(path: string, issues: string[]): CLIError {
  const details = issues.length > 1
    ? issues.map((i) => `• ${i}`).join("\n")
    : issues[0];
  return new CLIError("VALIDATION_CONFIG_INVALID", `Config file ${path} has errors`, {
    suggestion: "Fix the issues below and try again",
    details,
  });
}

// ============================================================================
// Generic Error
// ============================================================================

export function unknownError(error: unknown): CLIError {
  const message = error instanceof Error ? error.message : String(error);
  const cause = error instanceof Error ? error : undefined;
  return new CLIError("UNKNOWN_ERROR", message, { cause });
}
