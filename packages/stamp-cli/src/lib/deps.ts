import type { ResolvedConfig } from "./config.js";
import type { Logger } from "./logger.js";
import type { Clock } from "./ports/clock.js";
import type { ZoneDatabase } from "./ports/zone-database.js";

/**
 * Everything a command needs from the outside world.
 * Tests pass fixed clocks and zone tables here.
 */
export interface StampDeps {
  clock: Clock;
  zones: ZoneDatabase;
  config: ResolvedConfig;
  logger: Logger;
}
