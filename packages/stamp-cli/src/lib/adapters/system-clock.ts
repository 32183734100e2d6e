import type { Clock } from "../ports/clock.js";

/**
 * Real system clock implementation.
 * Resolution is whatever `Date.now()` offers (milliseconds).
 */
export const systemClock: Clock = {
  now: () => {
    const millis = Date.now();
    const seconds = Math.floor(millis / 1000);
    return { seconds, nanos: (millis - seconds * 1000) * 1_000_000 };
  },
};
