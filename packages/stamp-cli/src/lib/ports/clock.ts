/**
 * A wall-clock reading: whole seconds since 1970-01-01T00:00:00Z plus a
 * nanosecond fraction in [0, 1e9).
 */
export interface ClockReading {
  seconds: number;
  nanos: number;
}

/**
 * Abstraction over "now".
 * Allows injecting fake clocks for testing.
 */
export interface Clock {
  now(): ClockReading;
}
