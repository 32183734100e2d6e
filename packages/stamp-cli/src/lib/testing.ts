import { createFixedZoneDatabase } from "./adapters/fixed-zones.js";
import { resolveConfig, type ResolvedConfig } from "./config.js";
import type { StampDeps } from "./deps.js";
import { createNoopLogger } from "./logger.js";
import type { Clock } from "./ports/clock.js";

/** 2021-07-01T12:00:00.000000500Z */
export const FIXED_NOW = { seconds: 1_625_140_800, nanos: 500 };

export function fixedClock(reading = FIXED_NOW): Clock {
  return { now: () => reading };
}

/**
 * Command dependencies with a frozen clock and a small fixed zone table,
 * so no test depends on the host's time or zone data.
 */
export function createTestDeps(config: Partial<ResolvedConfig> = {}): StampDeps {
  return {
    clock: fixedClock(),
    zones: createFixedZoneDatabase({
      UTC: 0,
      EST: -5 * 3600,
      CEST: 2 * 3600,
      IST: 5 * 3600 + 30 * 60,
    }),
    config: resolveConfig(config),
    logger: createNoopLogger(),
  };
}
