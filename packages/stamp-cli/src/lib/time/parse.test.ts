import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { ArithmeticError, ParseError } from "./errors.js";
import { formatRfc3339 } from "./format.js";
import { Instant, MAX_EPOCH_SECONDS, MIN_EPOCH_SECONDS } from "./instant.js";
import { parseRfc3339, parseUtcOffset } from "./parse.js";

function parseOk(text: string): Instant {
  const result = parseRfc3339(text);
  if (!result.success) throw result.error;
  return result.value;
}

function parseFail(text: string): ParseError {
  const result = parseRfc3339(text);
  if (result.success) throw new Error(`expected "${text}" to be rejected`);
  return result.error;
}

describe("parseRfc3339", () => {
  describe("accepted input", () => {
    it("reads UTC", () => {
      const instant = parseOk("2021-07-01T12:00:00Z");

      expect(instant.epochSeconds).toBe(1_625_140_800);
      expect(instant.nanos).toBe(0);
    });

    it("applies a positive offset", () => {
      expect(parseOk("2021-07-01T14:00:00+02:00").epochSeconds).toBe(1_625_140_800);
    });

    it("applies a negative offset", () => {
      expect(parseOk("2021-01-15T07:00:00-05:00").epochSeconds).toBe(1_610_712_000);
    });

    it("pads a short fraction on the right", () => {
      expect(parseOk("2021-07-01T12:00:00.5Z").nanos).toBe(500_000_000);
      expect(parseOk("2021-07-01T12:00:00.000000001Z").nanos).toBe(1);
    });

    it("accepts a lowercase t and z and a space separator", () => {
      expect(parseOk("2021-07-01t12:00:00z").epochSeconds).toBe(1_625_140_800);
      expect(parseOk("2021-07-01 12:00:00Z").epochSeconds).toBe(1_625_140_800);
    });

    it("treats -00:00 as UTC", () => {
      expect(parseOk("2021-07-01T12:00:00-00:00").epochSeconds).toBe(1_625_140_800);
    });

    it("accepts February 29 in a leap year", () => {
      expect(parseOk("2024-02-29T23:00:00Z").epochSeconds).toBe(1_709_247_600);
    });

    it("reads instants before the epoch", () => {
      const instant = parseOk("1969-12-31T23:59:59.5Z");

      expect(instant.epochSeconds).toBe(-1);
      expect(instant.nanos).toBe(500_000_000);
    });
  });

  describe("malformed input", () => {
    it.each([
      "",
      "2021-07-01",
      "2021-07-01T12:00:00",
      "2021-07-01T12:00Z",
      "2021-7-01T12:00:00Z",
      "2021-07-01T12:00:00.Z",
      "2021-07-01T12:00:00.1234567890Z",
      "2021-07-01T12:00:00+0200",
      "2021-07-01T12:00:00 Z",
      " 2021-07-01T12:00:00Z",
    ])("rejects %j", (text) => {
      const error = parseFail(text);

      expect(error.kind).toBe("Malformed");
      expect(error.code).toBe("PARSE_MALFORMED");
      expect(error.input).toBe(text);
    });
  });

  describe("out-of-range fields", () => {
    it.each([
      ["2021-13-01T00:00:00Z", "month", "13"],
      ["2021-00-01T00:00:00Z", "month", "00"],
      ["2021-02-29T00:00:00Z", "day", "29"],
      ["2021-04-31T00:00:00Z", "day", "31"],
      ["2021-07-00T00:00:00Z", "day", "00"],
      ["2021-07-01T24:00:00Z", "hour", "24"],
      ["2021-07-01T12:60:00Z", "minute", "60"],
      ["2021-07-01T12:00:60Z", "second", "60"],
      ["2021-07-01T12:00:00+24:00", "offsetHour", "24"],
      ["2021-07-01T12:00:00+01:60", "offsetMinute", "60"],
    ])("rejects %s at %s", (text, field, fragment) => {
      const error = parseFail(text);

      expect(error.kind).toBe("OutOfRange");
      expect(error.field).toBe(field);
      expect(error.fragment).toBe(fragment);
    });

    it("names the field, its text and the bounds", () => {
      expect(parseFail("2021-02-29T00:00:00Z").message).toBe(
        'day 29 is out of range (01-28) in "2021-02-29T00:00:00Z"'
      );
    });

    it("rejects instants outside the supported range", () => {
      const error = parseFail("0000-01-01T00:00:00Z");

      expect(error.kind).toBe("OutOfRange");
      expect(error.field).toBe("instant");
      expect(error.cause).toBeInstanceOf(ArithmeticError);
      expect(error.message).toBe('"0000-01-01T00:00:00Z" is outside the supported range');
    });

    it("accepts the range ends written under extreme offsets", () => {
      expect(parseOk("0000-01-01T00:01:00-23:59").equals(Instant.MIN)).toBe(true);
      expect(parseOk("9999-12-31T23:58:59.999999999+23:59").equals(Instant.MAX)).toBe(true);
    });
  });

  describe("round trip", () => {
    it("reads back whatever the formatter writes", () => {
      fc.assert(
        fc.property(
          fc.integer({ min: MIN_EPOCH_SECONDS, max: MAX_EPOCH_SECONDS }),
          fc.integer({ min: 0, max: 999_999_999 }),
          fc.integer({ min: -86_340, max: 86_340 }),
          (seconds, nanos, offset) => {
            const instant = Instant.of(seconds, nanos);
            const back = parseRfc3339(formatRfc3339(instant, offset));
            return back.success && back.value.equals(instant);
          }
        )
      );
    });

    it("keeps every nanosecond", () => {
      const instant = Instant.of(1_544_129_220, 123_456_789);

      expect(parseOk(formatRfc3339(instant, -18_000)).nanos).toBe(123_456_789);
    });
  });
});

describe("parseUtcOffset", () => {
  it.each([
    ["Z", 0],
    ["z", 0],
    ["+00:00", 0],
    ["-00:00", 0],
    ["+01:00", 3_600],
    ["-0530", -19_800],
    ["+23:59", 86_340],
  ])("reads %s", (text, seconds) => {
    const result = parseUtcOffset(text);

    expect(result.success && result.value).toBe(seconds);
  });

  it("rejects text that is not an offset", () => {
    const result = parseUtcOffset("CET");

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.message).toBe('"CET" is not a UTC offset (Z, ±HH:MM or ±HHMM)');
    }
  });

  it("rejects an out-of-range hour", () => {
    const result = parseUtcOffset("+25:00");

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.kind).toBe("OutOfRange");
      expect(result.error.field).toBe("offsetHour");
    }
  });
});
