#!/usr/bin/env node
import { readFileSync } from "fs";
import { z } from "zod";
import { systemClock } from "./lib/adapters/system-clock.js";
import { createTemporalZoneDatabase } from "./lib/adapters/temporal-zones.js";
import { findConfigPath, initContext } from "./lib/cli-context.js";
import { loadConfig, resolveConfig, type ResolvedConfig } from "./lib/config.js";
import type { StampDeps } from "./lib/deps.js";
import { handleCommandError } from "./lib/errors/renderer.js";
import { createLogger } from "./lib/logger.js";
import { buildProgram } from "./program.js";

const PackageJsonSchema = z.object({ version: z.string() });

function readVersion(): string {
  const raw: unknown = JSON.parse(
    readFileSync(new URL("../package.json", import.meta.url), "utf-8")
  );
  return PackageJsonSchema.parse(raw).version;
}

function loadConfigFor(argv: string[]): { config: ResolvedConfig; sources: string[] } {
  try {
    return loadConfig(findConfigPath(argv));
  } catch (error) {
    // The config commands must still run against a broken file
    if (argv.slice(2).includes("config")) {
      return { config: resolveConfig(), sources: [] };
    }
    throw error;
  }
}

export async function main(argv = process.argv): Promise<void> {
  try {
    const { config, sources } = loadConfigFor(argv);
    initContext(argv, { json: config.json });

    const logger = createLogger({
      level: config.logLevel,
      json: config.logJson,
      clock: systemClock,
    });
    logger.debug("Loaded configuration", { sources });

    const deps: StampDeps = {
      clock: systemClock,
      zones: createTemporalZoneDatabase({ logger: logger.child({ component: "zones" }) }),
      config,
      logger,
    };

    await buildProgram(deps, readVersion()).parseAsync(argv);
  } catch (error) {
    handleCommandError(error);
  }
}

void main();
