/**
 * Structured-data mapping for instants.
 *
 * On the way out every instant becomes the canonical UTC RFC 3339 string
 * (`Instant#toJSON` does the same, so `JSON.stringify` needs no replacer).
 * On the way in, the zod schemas below turn strings or epoch numbers back
 * into instants and report codec failures as issues at the exact path of
 * the offending value.
 *
 * @example
 * const Event = z.object({ name: z.string(), at: instantSchema });
 * const result = deserialize(Event, JSON.parse(body));
 * if (result.success) console.log(result.value.at.epochSeconds);
 */

import { z } from "zod";
import { standardFixedZones } from "../adapters/fixed-zones.js";
import type { TimeZoneRef, ZoneDatabase } from "../ports/zone-database.js";
import { ParseError, ZoneError, type ArithmeticError } from "./errors.js";
import { formatRfc3339 } from "./format.js";
import { Instant } from "./instant.js";
import { parseDate } from "./parse-date.js";
import { parseRfc3339 } from "./parse.js";
import { err, ok, type Result } from "./result.js";
import { project } from "./zone.js";

// ---------------------------------------------------------------------------
// Serialization
// ---------------------------------------------------------------------------

export function serializeInstant(instant: Instant): string {
  return formatRfc3339(instant, 0);
}

/** Whole milliseconds since the epoch, floored like `Instant#toEpochMillis` */
export function serializeInstantMillis(instant: Instant): number {
  return instant.toEpochMillis();
}

export function serializeOptionalInstant(instant: Instant | null | undefined): string | null {
  return instant ? serializeInstant(instant) : null;
}

// ---------------------------------------------------------------------------
// Deserialization schemas
// ---------------------------------------------------------------------------

function reportTimeError(ctx: z.RefinementCtx, error: ParseError | ZoneError): typeof z.NEVER {
  ctx.addIssue({
    code: z.ZodIssueCode.custom,
    message: error.message,
    params: { timeError: error },
  });
  return z.NEVER;
}

function reportRangeError(ctx: z.RefinementCtx, value: number, error: ArithmeticError): typeof z.NEVER {
  return reportTimeError(
    ctx,
    new ParseError("OutOfRange", error.message, {
      input: String(value),
      field: "instant",
      fragment: String(value),
      cause: error,
    })
  );
}

/** RFC 3339 string → Instant */
export const instantSchema = z.string().transform((value, ctx) => {
  const result = parseRfc3339(value);
  return result.success ? result.value : reportTimeError(ctx, result.error);
});

/** `null` stays `null`; anything else goes through `instantSchema` */
export const optionalInstantSchema = instantSchema.nullable();

/** `YYYY-MM-DD` → Instant at UTC midnight */
export const dateInstantSchema = z.string().transform((value, ctx) => {
  const result = parseDate(value, { hint: "date" });
  return result.success ? result.value : reportTimeError(ctx, result.error);
});

/** Whole seconds since the epoch → Instant */
export const epochSecondsSchema = z
  .number()
  .int()
  .transform((value, ctx) => {
    const result = Instant.fromEpochNanoseconds(BigInt(value) * 1_000_000_000n);
    return result.success ? result.value : reportRangeError(ctx, value, result.error);
  });

/** Milliseconds since the epoch → Instant */
export const epochMillisSchema = z
  .number()
  .int()
  .transform((value, ctx) => {
    const result = Instant.fromEpochMillis(value);
    return result.success ? result.value : reportRangeError(ctx, value, result.error);
  });

/**
 * Milliseconds since the epoch written by a producer that counted them in
 * `zone`'s wall clock, e.g. `1517461200000` from an EST source is
 * 2018-02-01T00:00:00Z. The zone's offset at the millisecond instant is
 * added to it, so `zones` should hold fixed offsets.
 */
export function epochMillisInZoneSchema(zone: TimeZoneRef, zones: ZoneDatabase = standardFixedZones) {
  return z
    .number()
    .int()
    .transform((value, ctx) => {
      const read = Instant.fromEpochMillis(value);
      if (!read.success) return reportRangeError(ctx, value, read.error);

      const projection = project(read.value, zone, zones);
      if (!projection.success) return reportTimeError(ctx, projection.error);

      const shifted = Instant.fromEpochNanoseconds(
        read.value.toEpochNanoseconds() + BigInt(projection.value.offsetSeconds) * 1_000_000_000n
      );
      return shifted.success ? shifted.value : reportRangeError(ctx, value, shifted.error);
    });
}

// ---------------------------------------------------------------------------
// Document-level decoding
// ---------------------------------------------------------------------------

export type DocumentPath = ReadonlyArray<string | number>;

/**
 * A value in a structured document could not be decoded.
 * `cause` is the codec's `ParseError`, or the `ZoneError` of a zone-relative
 * schema, when the failure came from there.
 */
export class DeserializeError extends Error {
  readonly path: DocumentPath;
  readonly parseError?: ParseError;
  readonly zoneError?: ZoneError;

  constructor(path: DocumentPath, message: string, cause?: ParseError | ZoneError) {
    super(
      path.length > 0 ? `Invalid value at ${formatPath(path)}: ${message}` : `Invalid value: ${message}`,
      { cause }
    );
    this.name = "DeserializeError";
    this.path = path;
    if (cause instanceof ParseError) this.parseError = cause;
    if (cause instanceof ZoneError) this.zoneError = cause;
  }
}

/**
 * Decode `document` with `schema`, reporting the first failure together
 * with where in the document it occurred.
 */
export function deserialize<S extends z.ZodTypeAny>(
  schema: S,
  document: unknown
): Result<z.output<S>, DeserializeError> {
  const result = schema.safeParse(document);
  if (result.success) {
    return ok(result.data);
  }

  const [issue] = result.error.issues;
  const candidate: unknown = issue.code === z.ZodIssueCode.custom ? issue.params?.timeError : undefined;
  const cause =
    candidate instanceof ParseError || candidate instanceof ZoneError ? candidate : undefined;
  return err(new DeserializeError(issue.path, issue.message, cause));
}

/**
 * `events[2].at` style rendering of a document path.
 */
export function formatPath(path: DocumentPath): string {
  return path
    .map((segment, index) => {
      if (typeof segment === "number") return `[${segment}]`;
      return index === 0 ? segment : `.${segment}`;
    })
    .join("");
}
