export type { Clock, ClockReading } from "./clock.js";
export type { TimeZoneRef, ZoneDatabase, ZoneOffset } from "./zone-database.js";
