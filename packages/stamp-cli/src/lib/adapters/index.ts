export { systemClock } from "./system-clock.js";
export { createTemporalZoneDatabase, type TemporalZoneDatabaseOptions } from "./temporal-zones.js";
export { createFixedZoneDatabase, standardFixedZones } from "./fixed-zones.js";
