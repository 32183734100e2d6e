/**
 * JSON output utilities for machine-readable CLI output.
 * Provides consistent schemas and output helpers.
 */

import { isJsonMode } from "./cli-context.js";

// ============================================================================
// Base Types
// ============================================================================

export interface JsonSuccess<T> {
  success: true;
  data: T;
}

// ============================================================================
// Command-Specific Schemas
// ============================================================================

export interface TimestampJson {
  /** RFC 3339 text in the requested zone or offset */
  timestamp: string;
  /** Canonical UTC form */
  utc: string;
  epochSeconds: number;
  nanos: number;
  zone?: string;
  offset?: string;
}

export interface ParseResultJson extends TimestampJson {
  input: string;
  shape: string;
}

export interface ProjectionJson {
  zone: string;
  abbreviation?: string;
  timestamp: string;
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
  nanosecond: number;
  dayOfWeek: number;
  offsetSeconds: number;
}

export interface DurationJson {
  duration: string;
  /** Exact nanoseconds; a string because it can exceed 2^53 */
  totalNanoseconds: string;
  seconds: number;
  subsecondNanos: number;
  negative: boolean;
}

export interface ConfigShowJson {
  effective: Record<string, unknown>;
  sources: string[];
}

// ============================================================================
// Output Functions
// ============================================================================

/**
 * Output a successful JSON result to stdout.
 */
export function outputSuccess<T>(data: T): void {
  const result: JsonSuccess<T> = {
    success: true,
    data,
  };
  console.log(JSON.stringify(result, null, 2));
}

/**
 * Conditionally output JSON or return false for human output.
 * Use this to check if JSON mode is enabled before outputting.
 */
export function maybeOutputJson<T>(data: T): boolean {
  if (isJsonMode()) {
    outputSuccess(data);
    return true;
  }
  return false;
}
