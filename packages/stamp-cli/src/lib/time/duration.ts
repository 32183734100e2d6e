import { malformed, type ParseError } from "./errors.js";
import { err, ok, type Result } from "./result.js";

const NANOS_PER_MICRO = 1_000n;
const NANOS_PER_MILLI = 1_000_000n;
const NANOS_PER_SECOND = 1_000_000_000n;
const NANOS_PER_MINUTE = 60n * NANOS_PER_SECOND;
const NANOS_PER_HOUR = 60n * NANOS_PER_MINUTE;
const NANOS_PER_DAY = 24n * NANOS_PER_HOUR;

/**
 * Compact duration text: an optional sign followed by one or more of
 * days, hours, minutes, seconds (up to 9 fractional digits),
 * milliseconds, microseconds and nanoseconds, in that order.
 * e.g. `1d2h`, `-90s`, `1.5s`, `250ms`, `1h30m15.000000001s`
 */
const DURATION_PATTERN =
  /^([+-])?(?:(\d+)d)?(?:(\d+)h)?(?:(\d+)m)?(?:(\d+)(?:\.(\d{1,9}))?s)?(?:(\d+)ms)?(?:(\d+)us)?(?:(\d+)ns)?$/;

/**
 * A signed span of time with nanosecond precision.
 *
 * The sign belongs to the whole value, so `-1.5s` is one and a half
 * seconds backwards, never "minus one second plus half a second".
 */
export class Duration {
  static readonly ZERO = new Duration(0n);

  private constructor(readonly totalNanoseconds: bigint) {}

  static ofNanoseconds(nanos: bigint | number): Duration {
    return new Duration(BigInt(nanos));
  }

  static ofMicros(micros: number): Duration {
    return new Duration(BigInt(micros) * NANOS_PER_MICRO);
  }

  static ofMillis(millis: number): Duration {
    return new Duration(BigInt(millis) * NANOS_PER_MILLI);
  }

  /** `seconds * 1e9 + nanos`; both may be negative. */
  static ofSeconds(seconds: number, nanos = 0): Duration {
    return new Duration(BigInt(seconds) * NANOS_PER_SECOND + BigInt(nanos));
  }

  static ofMinutes(minutes: number): Duration {
    return new Duration(BigInt(minutes) * NANOS_PER_MINUTE);
  }

  static ofHours(hours: number): Duration {
    return new Duration(BigInt(hours) * NANOS_PER_HOUR);
  }

  static ofDays(days: number): Duration {
    return new Duration(BigInt(days) * NANOS_PER_DAY);
  }

  static parse(text: string): Result<Duration, ParseError> {
    const match = DURATION_PATTERN.exec(text);
    const parts = match?.slice(2) ?? [];
    if (!match || parts.every((part) => part === undefined)) {
      return err(malformed(text, "a duration such as 1h30m, -90s or 1.5s"));
    }

    const [sign, days, hours, minutes, seconds, fraction, millis, micros, nanos] =
      match.slice(1);
    const total =
      big(days) * NANOS_PER_DAY +
      big(hours) * NANOS_PER_HOUR +
      big(minutes) * NANOS_PER_MINUTE +
      big(seconds) * NANOS_PER_SECOND +
      (fraction === undefined ? 0n : BigInt(fraction.padEnd(9, "0"))) +
      big(millis) * NANOS_PER_MILLI +
      big(micros) * NANOS_PER_MICRO +
      big(nanos);

    return ok(new Duration(sign === "-" ? -total : total));
  }

  /** Whole seconds, truncated toward zero; carries the sign */
  get seconds(): number {
    return Number(this.totalNanoseconds / NANOS_PER_SECOND);
  }

  /** Magnitude of the sub-second part, in [0, 1e9) */
  get subsecondNanos(): number {
    const rest = this.totalNanoseconds % NANOS_PER_SECOND;
    return Number(rest < 0n ? -rest : rest);
  }

  isNegative(): boolean {
    return this.totalNanoseconds < 0n;
  }

  isZero(): boolean {
    return this.totalNanoseconds === 0n;
  }

  negated(): Duration {
    return new Duration(-this.totalNanoseconds);
  }

  abs(): Duration {
    return this.isNegative() ? this.negated() : this;
  }

  plus(other: Duration): Duration {
    return new Duration(this.totalNanoseconds + other.totalNanoseconds);
  }

  minus(other: Duration): Duration {
    return new Duration(this.totalNanoseconds - other.totalNanoseconds);
  }

  compare(other: Duration): -1 | 0 | 1 {
    if (this.totalNanoseconds === other.totalNanoseconds) return 0;
    return this.totalNanoseconds < other.totalNanoseconds ? -1 : 1;
  }

  equals(other: Duration): boolean {
    return this.totalNanoseconds === other.totalNanoseconds;
  }

  /**
   * Compact form accepted by `Duration.parse`, largest units first:
   * `1d2h3m4.5s`, `-250ms` is written `-0.25s`, zero is `0s`.
   */
  toString(): string {
    if (this.isZero()) return "0s";

    let rest = this.abs().totalNanoseconds;
    const days = rest / NANOS_PER_DAY;
    rest %= NANOS_PER_DAY;
    const hours = rest / NANOS_PER_HOUR;
    rest %= NANOS_PER_HOUR;
    const minutes = rest / NANOS_PER_MINUTE;
    rest %= NANOS_PER_MINUTE;
    const seconds = rest / NANOS_PER_SECOND;
    const fraction = rest % NANOS_PER_SECOND;

    let text = this.isNegative() ? "-" : "";
    if (days > 0n) text += `${days}d`;
    if (hours > 0n) text += `${hours}h`;
    if (minutes > 0n) text += `${minutes}m`;
    if (seconds > 0n || fraction > 0n) {
      text += String(seconds);
      if (fraction > 0n) {
        text += `.${String(fraction).padStart(9, "0").replace(/0+$/, "")}`;
      }
      text += "s";
    }
    return text;
  }

  toJSON(): string {
    return this.toString();
  }
}

function big(digits: string | undefined): bigint {
  return digits === undefined ? 0n : BigInt(digits);
}
