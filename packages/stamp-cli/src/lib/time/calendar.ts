/**
 * Proleptic Gregorian calendar arithmetic, delegated to the Temporal ISO
 * calendar. Everything here works on UTC wall-clock fields; offsets are
 * applied by the callers.
 */

import { Temporal } from "temporal-polyfill";

export const SECONDS_PER_DAY = 86_400;

export interface CivilDateTime {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
}

export interface CivilFields extends CivilDateTime {
  /** 1 = Monday ... 7 = Sunday */
  dayOfWeek: number;
  dayOfYear: number;
}

export function daysInMonth(year: number, month: number): number {
  return Temporal.PlainYearMonth.from({ year, month }).daysInMonth;
}

/**
 * Seconds since the epoch for UTC wall-clock fields.
 * Fields must already be validated.
 */
export function epochSecondsFromCivil(fields: CivilDateTime): number {
  const zoned = Temporal.PlainDateTime.from(fields, { overflow: "reject" }).toZonedDateTime("UTC");
  return zoned.epochMilliseconds / 1000;
}

/**
 * UTC wall-clock fields for whole seconds since the epoch.
 */
export function civilFromEpochSeconds(seconds: number): CivilFields {
  const zoned = Temporal.Instant.fromEpochMilliseconds(seconds * 1000).toZonedDateTimeISO("UTC");
  return {
    year: zoned.year,
    month: zoned.month,
    day: zoned.day,
    hour: zoned.hour,
    minute: zoned.minute,
    second: zoned.second,
    dayOfWeek: zoned.dayOfWeek,
    dayOfYear: zoned.dayOfYear,
  };
}
