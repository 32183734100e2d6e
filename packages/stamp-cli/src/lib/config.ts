import { z } from "zod";
import { readFileSync, existsSync } from "fs";
import { parse as parseYaml } from "yaml";
import { homedir } from "os";
import { join } from "path";
import { invalidConfig } from "./errors/catalog.js";
import { parseUtcOffset } from "./time/parse.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** System-wide configuration path (Linux standard) */
export const SYSTEM_CONFIG_PATH = "/etc/stamp/config.yaml";

/** User-level configuration path (XDG Base Directory Specification) */
export const USER_CONFIG_PATH = join(
  homedir(),
  ".config",
  "stamp",
  "config.yaml"
);

/** Default values for all configuration options */
export const CONFIG_DEFAULTS = {
  zone: "UTC",
  json: false,
  // Anything chattier would interleave with command output on stdout
  logLevel: "warn",
  logJson: false,
} as const;

// ---------------------------------------------------------------------------
// Zod Schemas
// ---------------------------------------------------------------------------

const OffsetSchema = z.string().refine((value) => parseUtcOffset(value).success, {
  message: "Expected a UTC offset such as Z, +01:00 or -0530",
});

/** Complete configuration file schema */
export const ConfigFileSchema = z.object({
  display: z
    .object({
      zone: z.string().min(1).optional(),
    })
    .optional(),
  parse: z
    .object({
      defaultOffset: OffsetSchema.optional(),
    })
    .optional(),
  output: z
    .object({
      json: z.boolean().optional(),
    })
    .optional(),
  logging: z
    .object({
      level: z.enum(["debug", "info", "warn", "error"]).optional(),
      json: z.boolean().optional(),
    })
    .optional(),
});

/** Type derived from the Zod schema */
export type ConfigFile = z.infer<typeof ConfigFileSchema>;

/** Resolved configuration with all defaults applied */
export interface ResolvedConfig {
  /** Zone used by now/format/project when --zone is not given */
  zone: string;
  /** Offset assumed for date-times without one (e.g. "+01:00") */
  defaultOffset?: string;
  json: boolean;
  logLevel: "debug" | "info" | "warn" | "error";
  logJson: boolean;
}

// ---------------------------------------------------------------------------
// Loader Functions
// ---------------------------------------------------------------------------

/**
 * Load a YAML config file from disk.
 * Returns undefined if file doesn't exist.
 * Throws with helpful message if file exists but is invalid.
 */
export function loadConfigFile(path: string): ConfigFile | undefined {
  if (!existsSync(path)) {
    return undefined;
  }

  let content: string;
  try {
    content = readFileSync(path, "utf-8");
  } catch (err) {
    throw invalidConfig(path, [`cannot read file: ${(err as Error).message}`]);
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(content);
  } catch (err) {
    throw invalidConfig(path, [`invalid YAML: ${(err as Error).message}`]);
  }

  // Handle empty files
  if (parsed === null || parsed === undefined) {
    return {};
  }

  const result = ConfigFileSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues.map(
      (i) => `${i.path.join(".")}: ${i.message}`
    );
    throw invalidConfig(path, issues);
  }

  return result.data;
}

/**
 * Apply values from a config file to a resolved config object.
 * Only overrides values that are explicitly set in the source.
 */
function applyConfigFile(target: ResolvedConfig, source: ConfigFile): void {
  if (source.display?.zone !== undefined) {
    target.zone = source.display.zone;
  }
  if (source.parse?.defaultOffset !== undefined) {
    target.defaultOffset = source.parse.defaultOffset;
  }
  if (source.output?.json !== undefined) {
    target.json = source.output.json;
  }
  if (source.logging?.level !== undefined) {
    target.logLevel = source.logging.level;
  }
  if (source.logging?.json !== undefined) {
    target.logJson = source.logging.json;
  }
}

/**
 * Filter out undefined values from an object.
 */
function filterUndefined<T extends object>(obj: T): Partial<T> {
  return Object.fromEntries(
    Object.entries(obj).filter(([, v]) => v !== undefined)
  ) as Partial<T>;
}

/**
 * Merge configuration sources with proper precedence:
 * CLI args > User config > System config > Defaults
 */
export function resolveConfig(
  cliOptions: Partial<ResolvedConfig> = {},
  userConfig: ConfigFile | undefined = undefined,
  systemConfig: ConfigFile | undefined = undefined
): ResolvedConfig {
  // Start with defaults
  const config: ResolvedConfig = {
    zone: CONFIG_DEFAULTS.zone,
    json: CONFIG_DEFAULTS.json,
    logLevel: CONFIG_DEFAULTS.logLevel,
    logJson: CONFIG_DEFAULTS.logJson,
  };

  // Apply system config (lowest precedence after defaults)
  if (systemConfig) {
    applyConfigFile(config, systemConfig);
  }

  // Apply user config (higher precedence)
  if (userConfig) {
    applyConfigFile(config, userConfig);
  }

  // Apply CLI options (highest precedence)
  Object.assign(config, filterUndefined(cliOptions));

  return config;
}

/**
 * Load configuration from all sources.
 * Optionally accepts explicit config path from CLI.
 *
 * @param explicitPath - Optional path to a specific config file
 * @returns The resolved config and list of source files that were loaded
 */
export function loadConfig(explicitPath?: string): {
  config: ResolvedConfig;
  sources: string[];
} {
  const sources: string[] = [];

  let systemConfig: ConfigFile | undefined;
  let userConfig: ConfigFile | undefined;

  if (explicitPath) {
    // Explicit path takes precedence, used as "user config"
    userConfig = loadConfigFile(explicitPath);
    if (userConfig) sources.push(explicitPath);
  } else {
    // Normal precedence: system, then user
    systemConfig = loadConfigFile(SYSTEM_CONFIG_PATH);
    if (systemConfig) sources.push(SYSTEM_CONFIG_PATH);

    userConfig = loadConfigFile(USER_CONFIG_PATH);
    if (userConfig) sources.push(USER_CONFIG_PATH);
  }

  const config = resolveConfig({}, userConfig, systemConfig);

  return { config, sources };
}
