export { Instant, compare, now, MIN_EPOCH_SECONDS, MAX_EPOCH_SECONDS, NANOS_PER_SECOND } from "./instant.js";
export { Duration } from "./duration.js";
export { add, subtract, difference } from "./arithmetic.js";
export { formatRfc3339, formatOffset, MAX_OFFSET_SECONDS } from "./format.js";
export { parseRfc3339, parseUtcOffset } from "./parse.js";
export {
  parseDate,
  recognizeDate,
  detectShape,
  DATE_SHAPES,
  type DateShape,
  type ParseDateOptions,
  type ParsedDate,
} from "./parse-date.js";
export { project, formatInZone, defaultZoneDatabase, type ZonedProjection } from "./zone.js";
export {
  serializeInstant,
  serializeInstantMillis,
  serializeOptionalInstant,
  instantSchema,
  optionalInstantSchema,
  dateInstantSchema,
  epochSecondsSchema,
  epochMillisSchema,
  epochMillisInZoneSchema,
  deserialize,
  formatPath,
  DeserializeError,
  type DocumentPath,
} from "./serde.js";
export { startOfDay, nextDay, daysBackFrom, tomorrow, daysBack } from "./days.js";
export {
  TimeError,
  ParseError,
  ZoneError,
  ArithmeticError,
  isTimeError,
  type ParseErrorKind,
  type TimeErrorCode,
} from "./errors.js";
export { ok, err, unwrap, type Result, type Ok, type Err } from "./result.js";
export type { Clock, ClockReading, TimeZoneRef, ZoneDatabase, ZoneOffset } from "../ports/index.js";
export {
  systemClock,
  createTemporalZoneDatabase,
  createFixedZoneDatabase,
  standardFixedZones,
} from "../adapters/index.js";
