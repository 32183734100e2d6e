import { Command } from "commander";
import { existsSync, mkdirSync, writeFileSync } from "fs";
import { dirname } from "path";
import chalk from "chalk";
import {
  loadConfig,
  loadConfigFile,
  USER_CONFIG_PATH,
  SYSTEM_CONFIG_PATH,
} from "../lib/config.js";
import { maybeOutputJson, type ConfigShowJson } from "../lib/json-output.js";

// ---------------------------------------------------------------------------
// Example Configuration Content
// ---------------------------------------------------------------------------

export const EXAMPLE_CONFIG = `# stamp configuration
# Place at ~/.config/stamp/config.yaml (user) or /etc/stamp/config.yaml (system)
#
# Configuration precedence (highest to lowest):
# 1. CLI flags
# 2. User config (~/.config/stamp/config.yaml, or the file given with --config)
# 3. System config (/etc/stamp/config.yaml)
# 4. Built-in defaults

# How timestamps are shown by now, format and project
display:
  # IANA name (Europe/Berlin), UTC, or a fixed offset (+05:30)
  zone: UTC

# How free-form input is read. defaultOffset is the offset assumed for
# date-times written without one, e.g. "2024-03-01 12:30"; without it such
# input is rejected as ambiguous.
# parse:
#   defaultOffset: "+01:00"

# Output format
output:
  # Print { "success": true, "data": ... } instead of plain text
  json: false

# Logging configuration
logging:
  # Log level: debug, info, warn, error
  level: warn

  # Output JSON log lines
  json: false
`;

interface ConfigPathOptions {
  config?: string;
}

// ---------------------------------------------------------------------------
// Command Registration
// ---------------------------------------------------------------------------

export function registerConfigCommands(program: Command): void {
  const config = program
    .command("config")
    .description("Manage stamp configuration");

  config
    .command("init")
    .description("Create an example configuration file")
    .option(
      "-g, --global",
      "Create system-wide config at /etc/stamp/config.yaml"
    )
    .action((options: { global?: boolean }) => {
      const targetPath = options.global ? SYSTEM_CONFIG_PATH : USER_CONFIG_PATH;

      if (existsSync(targetPath)) {
        console.error(chalk.yellow(`Config file already exists: ${targetPath}`));
        console.error(
          chalk.gray("Use a text editor to modify it, or delete it first.")
        );
        process.exitCode = 1;
        return;
      }

      try {
        mkdirSync(dirname(targetPath), { recursive: true });
        writeFileSync(targetPath, EXAMPLE_CONFIG, "utf-8");
        console.log(chalk.green(`Created config file: ${targetPath}`));
        console.log(chalk.gray("Edit this file to customize your settings."));
      } catch (error) {
        console.error(
          chalk.red(`Failed to create config: ${(error as Error).message}`)
        );
        if (options.global) {
          console.error(chalk.gray("System config may require sudo."));
        }
        process.exitCode = 1;
      }
    });

  config
    .command("validate")
    .description("Validate configuration file(s); checks only --config when given")
    .action((_options: unknown, command: Command) => {
      const explicitPath = command.optsWithGlobals<ConfigPathOptions>().config;
      const pathsToCheck = explicitPath
        ? [explicitPath]
        : [SYSTEM_CONFIG_PATH, USER_CONFIG_PATH];

      let hasErrors = false;
      let foundAny = false;

      for (const path of pathsToCheck) {
        if (!existsSync(path)) {
          if (explicitPath) {
            console.error(chalk.red(`File not found: ${path}`));
            hasErrors = true;
          }
          continue;
        }

        foundAny = true;
        console.log(chalk.cyan(`Checking ${path}...`));

        try {
          loadConfigFile(path);
          console.log(chalk.green(`  ✓ Valid`));
        } catch (error) {
          console.error(chalk.red(`  ✗ Invalid: ${(error as Error).message}`));
          hasErrors = true;
        }
      }

      if (!foundAny && !explicitPath) {
        console.log(chalk.yellow("No configuration files found."));
        console.log(chalk.gray(`Run 'stamp config init' to create one.`));
      } else if (hasErrors) {
        process.exitCode = 1;
      } else if (foundAny) {
        console.log(chalk.green("\nAll configuration files are valid."));
      }
    });

  config
    .command("show")
    .description("Display the effective configuration")
    .action((_options: unknown, command: Command) => {
      try {
        const { config: resolved, sources } = loadConfig(
          command.optsWithGlobals<ConfigPathOptions>().config
        );

        const json: ConfigShowJson = { effective: { ...resolved }, sources };
        if (maybeOutputJson(json)) return;

        console.log(chalk.cyan("Effective Configuration:"));
        console.log(chalk.gray("─".repeat(40)));

        if (sources.length > 0) {
          console.log(chalk.gray(`Sources: ${sources.join(", ")}`));
        } else {
          console.log(chalk.gray("Sources: (defaults only)"));
        }

        console.log();
        console.log(chalk.bold("Display:"));
        console.log(`  zone:           ${resolved.zone}`);

        console.log();
        console.log(chalk.bold("Parse:"));
        console.log(`  defaultOffset:  ${resolved.defaultOffset ?? "(none)"}`);

        console.log();
        console.log(chalk.bold("Output:"));
        console.log(`  json:           ${resolved.json}`);

        console.log();
        console.log(chalk.bold("Logging:"));
        console.log(`  level:          ${resolved.logLevel}`);
        console.log(`  json:           ${resolved.logJson}`);
      } catch (error) {
        console.error(
          chalk.red(`Failed to load config: ${(error as Error).message}`)
        );
        process.exitCode = 1;
      }
    });

  config
    .command("path")
    .description("Show configuration file paths")
    .action(() => {
      console.log(chalk.cyan("Configuration file locations:"));
      console.log();
      console.log(chalk.bold("User config:"));
      console.log(`  ${USER_CONFIG_PATH}`);
      console.log(
        `  ${existsSync(USER_CONFIG_PATH) ? chalk.green("(exists)") : chalk.gray("(not found)")}`
      );
      console.log();
      console.log(chalk.bold("System config:"));
      console.log(`  ${SYSTEM_CONFIG_PATH}`);
      console.log(
        `  ${existsSync(SYSTEM_CONFIG_PATH) ? chalk.green("(exists)") : chalk.gray("(not found)")}`
      );
    });
}
