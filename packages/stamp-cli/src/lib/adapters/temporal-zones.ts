import { Temporal } from "temporal-polyfill";
import { createNoopLogger, type Logger } from "../logger.js";
import type { TimeZoneRef, ZoneDatabase, ZoneOffset } from "../ports/zone-database.js";
import type { Instant } from "../time/instant.js";

export interface TemporalZoneDatabaseOptions {
  logger?: Logger;
}

/**
 * Zone database backed by the Temporal time-zone support (IANA names,
 * `UTC`, fixed offsets such as `+05:30`). DST transitions are applied at
 * the exact instant.
 */
export function createTemporalZoneDatabase(
  options: TemporalZoneDatabaseOptions = {}
): ZoneDatabase {
  const logger = options.logger ?? createNoopLogger();

  return {
    resolve(zone: TimeZoneRef, instant: Instant): ZoneOffset | undefined {
      let zoned: Temporal.ZonedDateTime;
      try {
        zoned = Temporal.Instant.fromEpochNanoseconds(instant.toEpochNanoseconds()).toZonedDateTimeISO(zone);
      } catch (error) {
        // Temporal reports unknown identifiers as RangeError
        if (error instanceof RangeError) {
          logger.debug("Time zone not found", { zone, reason: error.message });
          return undefined;
        }
        throw error;
      }

      const offsetSeconds = Math.trunc(zoned.offsetNanoseconds / 1_000_000_000);
      const abbreviation = abbreviationOf(zoned.timeZoneId, instant);
      logger.debug("Resolved time zone", { zone, offsetSeconds });
      return abbreviation === undefined ? { offsetSeconds } : { offsetSeconds, abbreviation };
    },
  };
}

/**
 * Short zone name from Intl, e.g. "EST" or "GMT+1". Intl rejects some
 * identifiers Temporal accepts (bare offsets); those get no abbreviation.
 */
function abbreviationOf(zone: string, instant: Instant): string | undefined {
  let parts: Intl.DateTimeFormatPart[];
  try {
    parts = new Intl.DateTimeFormat("en-US", { timeZone: zone, timeZoneName: "short" }).formatToParts(
      new Date(instant.toEpochMillis())
    );
  } catch (error) {
    if (error instanceof RangeError) return undefined;
    throw error;
  }
  return parts.find((part) => part.type === "timeZoneName")?.value;
}
