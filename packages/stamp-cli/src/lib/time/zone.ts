import { createTemporalZoneDatabase } from "../adapters/temporal-zones.js";
import type { TimeZoneRef, ZoneDatabase } from "../ports/zone-database.js";
import { civilFromEpochSeconds } from "./calendar.js";
import { ZoneError } from "./errors.js";
import { formatRfc3339 } from "./format.js";
import type { Instant } from "./instant.js";
import { err, ok, type Result } from "./result.js";

/**
 * Calendar fields of an instant as seen in a zone at that instant.
 */
export interface ZonedProjection {
  readonly instant: Instant;
  readonly zone: TimeZoneRef;
  readonly year: number;
  readonly month: number;
  readonly day: number;
  readonly hour: number;
  readonly minute: number;
  readonly second: number;
  readonly nanosecond: number;
  /** 1 = Monday ... 7 = Sunday */
  readonly dayOfWeek: number;
  /** Seconds east of UTC in effect at `instant` */
  readonly offsetSeconds: number;
  readonly abbreviation?: string;
}

export const defaultZoneDatabase: ZoneDatabase = createTemporalZoneDatabase();

/**
 * Resolve `zone` at `instant` and decompose the instant into local fields.
 * Nothing is cached: every call asks the zone database again.
 */
export function project(
  instant: Instant,
  zone: TimeZoneRef,
  zones: ZoneDatabase = defaultZoneDatabase
): Result<ZonedProjection, ZoneError> {
  const offset = zones.resolve(zone, instant);
  if (!offset) {
    return err(new ZoneError(zone));
  }

  const local = civilFromEpochSeconds(instant.epochSeconds + offset.offsetSeconds);
  return ok({
    instant,
    zone,
    year: local.year,
    month: local.month,
    day: local.day,
    hour: local.hour,
    minute: local.minute,
    second: local.second,
    nanosecond: instant.nanos,
    dayOfWeek: local.dayOfWeek,
    offsetSeconds: offset.offsetSeconds,
    ...(offset.abbreviation !== undefined && { abbreviation: offset.abbreviation }),
  });
}

/**
 * RFC 3339 text of `instant` with the offset `zone` has at that instant.
 */
export function formatInZone(
  instant: Instant,
  zone: TimeZoneRef,
  zones: ZoneDatabase = defaultZoneDatabase
): Result<string, ZoneError> {
  const projection = project(instant, zone, zones);
  if (!projection.success) return projection;
  return ok(formatRfc3339(instant, projection.value.offsetSeconds));
}
