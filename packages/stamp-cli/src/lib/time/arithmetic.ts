import type { ArithmeticError } from "./errors.js";
import { Duration } from "./duration.js";
import { Instant } from "./instant.js";
import type { Result } from "./result.js";

/**
 * Move an instant forward by a (possibly negative) duration.
 * Fails with `ArithmeticError` when the result leaves the supported range;
 * results are never clamped.
 */
export function add(instant: Instant, duration: Duration): Result<Instant, ArithmeticError> {
  return Instant.fromEpochNanoseconds(instant.toEpochNanoseconds() + duration.totalNanoseconds);
}

export function subtract(instant: Instant, duration: Duration): Result<Instant, ArithmeticError> {
  return Instant.fromEpochNanoseconds(instant.toEpochNanoseconds() - duration.totalNanoseconds);
}

/**
 * Exact span `a - b`. Positive when `a` is later.
 */
export function difference(a: Instant, b: Instant): Duration {
  return Duration.ofNanoseconds(a.toEpochNanoseconds() - b.toEpochNanoseconds());
}
