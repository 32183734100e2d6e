import type { StampDeps } from "./deps.js";
import { fromTimeError, invalidOption } from "./errors/catalog.js";
import { readOffset } from "./input.js";
import type { DurationJson, ProjectionJson, TimestampJson } from "./json-output.js";
import type { Duration } from "./time/duration.js";
import { formatOffset, formatRfc3339 } from "./time/format.js";
import type { Instant } from "./time/instant.js";
import { serializeInstant } from "./time/serde.js";
import { project } from "./time/zone.js";

/**
 * Where an instant should be shown: a zone (resolved at the instant) or a
 * fixed offset. With neither, the configured display zone applies.
 */
export interface DisplayTarget {
  zone?: string;
  offset?: string;
}

export function describeInstant(
  instant: Instant,
  target: DisplayTarget,
  deps: StampDeps
): TimestampJson {
  if (target.zone !== undefined && target.offset !== undefined) {
    throw invalidOption("offset", "cannot be combined with --zone");
  }

  const base = {
    utc: serializeInstant(instant),
    epochSeconds: instant.epochSeconds,
    nanos: instant.nanos,
  };

  if (target.offset !== undefined) {
    const offsetSeconds = readOffset(target.offset);
    return {
      timestamp: formatRfc3339(instant, offsetSeconds),
      ...base,
      offset: formatOffset(offsetSeconds),
    };
  }

  const projection = describeProjection(instant, target.zone ?? deps.config.zone, deps);
  return {
    timestamp: projection.timestamp,
    ...base,
    zone: projection.zone,
    offset: formatOffset(projection.offsetSeconds),
  };
}

export function describeProjection(
  instant: Instant,
  zone: string,
  deps: StampDeps
): ProjectionJson {
  const result = project(instant, zone, deps.zones);
  if (!result.success) throw fromTimeError(result.error);

  const { abbreviation, offsetSeconds, ...fields } = result.value;
  return {
    zone: fields.zone,
    ...(abbreviation !== undefined && { abbreviation }),
    timestamp: formatRfc3339(instant, offsetSeconds),
    year: fields.year,
    month: fields.month,
    day: fields.day,
    hour: fields.hour,
    minute: fields.minute,
    second: fields.second,
    nanosecond: fields.nanosecond,
    dayOfWeek: fields.dayOfWeek,
    offsetSeconds,
  };
}

export function describeDuration(duration: Duration): DurationJson {
  return {
    duration: duration.toString(),
    totalNanoseconds: duration.totalNanoseconds.toString(),
    seconds: duration.seconds,
    subsecondNanos: duration.subsecondNanos,
    negative: duration.isNegative(),
  };
}
