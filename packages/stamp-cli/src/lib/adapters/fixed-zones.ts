import type { TimeZoneRef, ZoneDatabase, ZoneOffset } from "../ports/zone-database.js";

/**
 * Zone database over a fixed table of offsets, e.g.
 * `{ UTC: 0, EST: -5 * 3600 }`. Offsets never change with the instant.
 */
export function createFixedZoneDatabase(table: Readonly<Record<TimeZoneRef, number>>): ZoneDatabase {
  const zones = new Map(Object.entries(table));

  return {
    resolve(zone: TimeZoneRef): ZoneOffset | undefined {
      const offsetSeconds = zones.get(zone);
      if (offsetSeconds === undefined) return undefined;
      return { offsetSeconds, abbreviation: zone };
    },
  };
}

/** UTC and US Eastern Standard Time (no DST) */
export const standardFixedZones: ZoneDatabase = createFixedZoneDatabase({
  UTC: 0,
  EST: -5 * 60 * 60,
});
