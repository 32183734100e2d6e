import { civilFromEpochSeconds } from "./calendar.js";
import type { Instant } from "./instant.js";

/** Largest offset magnitude accepted, in seconds (just under a day) */
export const MAX_OFFSET_SECONDS = 86_399;

/**
 * Write an instant as RFC 3339: `YYYY-MM-DDTHH:MM:SS[.fffffffff](Z|±HH:MM)`.
 *
 * The fraction appears only when non-zero and then always has nine digits.
 * A zero offset is written `Z`. The offset is truncated toward zero to
 * whole minutes and the wall-clock fields use that truncated offset, so the
 * text always denotes exactly `instant`.
 */
export function formatRfc3339(instant: Instant, offsetSeconds = 0): string {
  assertOffset(offsetSeconds);
  const offsetMinutes = Math.trunc(offsetSeconds / 60);
  const local = civilFromEpochSeconds(instant.epochSeconds + offsetMinutes * 60);

  const date = `${pad(local.year, 4)}-${pad(local.month, 2)}-${pad(local.day, 2)}`;
  const time = `${pad(local.hour, 2)}:${pad(local.minute, 2)}:${pad(local.second, 2)}`;
  const fraction = instant.nanos === 0 ? "" : `.${pad(instant.nanos, 9)}`;

  return `${date}T${time}${fraction}${formatOffset(offsetSeconds)}`;
}

/**
 * `Z` for zero, otherwise `±HH:MM` (seconds truncated toward zero).
 */
export function formatOffset(offsetSeconds: number): string {
  assertOffset(offsetSeconds);
  const totalMinutes = Math.trunc(Math.abs(offsetSeconds) / 60);
  if (totalMinutes === 0) return "Z";

  const sign = offsetSeconds < 0 ? "-" : "+";
  return `${sign}${pad(Math.floor(totalMinutes / 60), 2)}:${pad(totalMinutes % 60, 2)}`;
}

export function assertOffset(offsetSeconds: number): void {
  if (!Number.isInteger(offsetSeconds) || Math.abs(offsetSeconds) > MAX_OFFSET_SECONDS) {
    throw new RangeError(
      `UTC offset must be an integer number of seconds within ±${MAX_OFFSET_SECONDS}, got ${offsetSeconds}`
    );
  }
}

function pad(value: number, width: number): string {
  return String(value).padStart(width, "0");
}
