import type { Clock } from "../ports/clock.js";
import { systemClock } from "../adapters/system-clock.js";
import { SECONDS_PER_DAY } from "./calendar.js";
import type { ArithmeticError } from "./errors.js";
import { Instant } from "./instant.js";
import { err, ok, type Result } from "./result.js";

const NANOS_PER_SECOND = 1_000_000_000n;

/**
 * 00:00:00 UTC of the day `instant` falls on.
 */
export function startOfDay(instant: Instant): Instant {
  const seconds = Math.floor(instant.epochSeconds / SECONDS_PER_DAY) * SECONDS_PER_DAY;
  // Instant.MIN is itself a UTC midnight, so this never leaves the range
  return Instant.of(seconds);
}

/**
 * The first 00:00:00 UTC at or after `instant`: an instant at exactly
 * midnight is returned as is, anything later moves to the next midnight.
 */
export function nextDay(instant: Instant): Result<Instant, ArithmeticError> {
  const start = startOfDay(instant);
  if (start.equals(instant)) return ok(instant);
  return Instant.fromEpochNanoseconds(
    BigInt(start.epochSeconds + SECONDS_PER_DAY) * NANOS_PER_SECOND
  );
}

/**
 * 00:00:00 UTC `count` days before the last midnight strictly before
 * `instant`, i.e. `nextDay(instant) - (count + 1)` days. From 13:00 a count
 * of 0 is the start of the same day; from exactly midnight it is the
 * midnight one day earlier.
 */
export function daysBackFrom(instant: Instant, count: number): Result<Instant, ArithmeticError> {
  if (!Number.isInteger(count) || count < 0) {
    throw new RangeError(`count must be a non-negative integer, got ${count}`);
  }
  const next = nextDay(instant);
  if (!next.success) return next;
  const back = BigInt(count + 1) * BigInt(SECONDS_PER_DAY) * NANOS_PER_SECOND;
  return Instant.fromEpochNanoseconds(next.value.toEpochNanoseconds() - back);
}

/**
 * `nextDay` of the clock's current instant.
 */
export function tomorrow(clock: Clock = systemClock): Result<Instant, ArithmeticError> {
  const current = Instant.fromClock(clock.now());
  if (!current.success) return err(current.error);
  return nextDay(current.value);
}

export function daysBack(count: number, clock: Clock = systemClock): Result<Instant, ArithmeticError> {
  const current = Instant.fromClock(clock.now());
  if (!current.success) return err(current.error);
  return daysBackFrom(current.value, count);
}
