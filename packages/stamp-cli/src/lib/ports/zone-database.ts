import type { Instant } from "../time/instant.js";

/**
 * Identifier of a time zone: an IANA name (`Europe/Berlin`), `UTC`, or a
 * fixed offset such as `+05:30`.
 */
export type TimeZoneRef = string;

export interface ZoneOffset {
  /** Seconds east of UTC */
  offsetSeconds: number;
  /** Short name such as "CET" or "GMT+1", when the database knows one */
  abbreviation?: string;
}

/**
 * Offset lookup for a zone at a given instant.
 * Returns undefined when the zone cannot be resolved.
 */
export interface ZoneDatabase {
  resolve(zone: TimeZoneRef, instant: Instant): ZoneOffset | undefined;
}
