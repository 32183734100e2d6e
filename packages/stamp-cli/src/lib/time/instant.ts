import type { Clock, ClockReading } from "../ports/clock.js";
import { systemClock } from "../adapters/system-clock.js";
import { ArithmeticError } from "./errors.js";
import { formatRfc3339 } from "./format.js";
import { err, ok, unwrap, type Result } from "./result.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const NANOS_PER_SECOND = 1_000_000_000;
const NANOS_PER_SECOND_BIG = 1_000_000_000n;

/** 0000-01-02T00:00:00Z */
export const MIN_EPOCH_SECONDS = -62_167_132_800;

/** 9999-12-30T23:59:59Z */
export const MAX_EPOCH_SECONDS = 253_402_214_399;

// ---------------------------------------------------------------------------
// Instant
// ---------------------------------------------------------------------------

/**
 * A point in time with nanosecond precision, independent of any zone.
 *
 * Stored as whole seconds since 1970-01-01T00:00:00Z plus a fraction that
 * is always normalized into [0, 1e9) nanoseconds, so an instant before the
 * epoch with a fraction reads e.g. `{ epochSeconds: -1, nanos: 500_000_000 }`
 * for 1969-12-31T23:59:59.5Z.
 *
 * The range is one day narrower than years 0000-9999 at both ends so that
 * every instant can be written as RFC 3339 under any offset.
 */
export class Instant {
  static readonly EPOCH = new Instant(0, 0);
  static readonly MIN = new Instant(MIN_EPOCH_SECONDS, 0);
  static readonly MAX = new Instant(MAX_EPOCH_SECONDS, NANOS_PER_SECOND - 1);

  private constructor(
    readonly epochSeconds: number,
    readonly nanos: number
  ) {}

  /**
   * Build an instant from seconds and any integer count of nanoseconds,
   * carrying whole seconds out of `nanos`.
   * Throws `ArithmeticError` outside the representable range and
   * `RangeError` for non-integer arguments.
   */
  static of(seconds: number, nanos = 0): Instant {
    assertInteger("seconds", seconds);
    assertInteger("nanos", nanos);
    return unwrap(
      Instant.fromEpochNanoseconds(BigInt(seconds) * NANOS_PER_SECOND_BIG + BigInt(nanos))
    );
  }

  static fromEpochNanoseconds(total: bigint): Result<Instant, ArithmeticError> {
    let seconds = total / NANOS_PER_SECOND_BIG;
    let nanos = total % NANOS_PER_SECOND_BIG;
    if (nanos < 0n) {
      seconds -= 1n;
      nanos += NANOS_PER_SECOND_BIG;
    }

    if (seconds < BigInt(MIN_EPOCH_SECONDS) || seconds > BigInt(MAX_EPOCH_SECONDS)) {
      return err(
        new ArithmeticError(
          `${seconds} seconds since the epoch is outside the supported range ` +
            `[${MIN_EPOCH_SECONDS}, ${MAX_EPOCH_SECONDS}]`
        )
      );
    }

    return ok(new Instant(Number(seconds), Number(nanos)));
  }

  /**
   * Only range failures are returned; a non-integer `millis` is a
   * programming error and throws `RangeError`.
   */
  static fromEpochMillis(millis: number): Result<Instant, ArithmeticError> {
    assertInteger("millis", millis);
    return Instant.fromEpochNanoseconds(BigInt(millis) * 1_000_000n);
  }

  /** Throws `RangeError` when the reading holds non-integers */
  static fromClock(reading: ClockReading): Result<Instant, ArithmeticError> {
    assertInteger("seconds", reading.seconds);
    assertInteger("nanos", reading.nanos);
    return Instant.fromEpochNanoseconds(
      BigInt(reading.seconds) * NANOS_PER_SECOND_BIG + BigInt(reading.nanos)
    );
  }

  toEpochNanoseconds(): bigint {
    return BigInt(this.epochSeconds) * NANOS_PER_SECOND_BIG + BigInt(this.nanos);
  }

  /** Milliseconds since the epoch, rounded toward negative infinity */
  toEpochMillis(): number {
    return this.epochSeconds * 1000 + Math.floor(this.nanos / 1_000_000);
  }

  compare(other: Instant): -1 | 0 | 1 {
    return compare(this, other);
  }

  equals(other: Instant): boolean {
    return this.epochSeconds === other.epochSeconds && this.nanos === other.nanos;
  }

  isBefore(other: Instant): boolean {
    return compare(this, other) < 0;
  }

  isAfter(other: Instant): boolean {
    return compare(this, other) > 0;
  }

  /** RFC 3339 in UTC */
  toString(): string {
    return formatRfc3339(this, 0);
  }

  toJSON(): string {
    return formatRfc3339(this, 0);
  }
}

function assertInteger(name: string, value: number): void {
  if (!Number.isInteger(value)) {
    throw new RangeError(`${name} must be an integer, got ${value}`);
  }
}

/**
 * Total order: by seconds, then by fraction.
 */
export function compare(a: Instant, b: Instant): -1 | 0 | 1 {
  if (a.epochSeconds !== b.epochSeconds) {
    return a.epochSeconds < b.epochSeconds ? -1 : 1;
  }
  if (a.nanos !== b.nanos) {
    return a.nanos < b.nanos ? -1 : 1;
  }
  return 0;
}

/**
 * Current instant according to the given clock.
 */
export function now(clock: Clock = systemClock): Result<Instant, ArithmeticError> {
  return Instant.fromClock(clock.now());
}
