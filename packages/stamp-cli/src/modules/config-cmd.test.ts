import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from "vitest";
import { Command } from "commander";
import { parse as parseYaml } from "yaml";
import { EXAMPLE_CONFIG, registerConfigCommands } from "./config-cmd.js";
import { ConfigFileSchema, type ResolvedConfig } from "../lib/config.js";
import { initContext, resetContext } from "../lib/cli-context.js";

// Mock fs module
vi.mock("fs", () => ({
  existsSync: vi.fn(),
  mkdirSync: vi.fn(),
  writeFileSync: vi.fn(),
}));

// Mock chalk to avoid color codes in tests
vi.mock("chalk", () => ({
  default: {
    red: (s: string) => s,
    green: (s: string) => s,
    yellow: (s: string) => s,
    cyan: (s: string) => s,
    gray: (s: string) => s,
    bold: (s: string) => s,
  },
}));

// Mock config loading; the schema stays real
vi.mock("../lib/config.js", async (importOriginal) => ({
  ...(await importOriginal<typeof import("../lib/config.js")>()),
  loadConfig: vi.fn(),
  loadConfigFile: vi.fn(),
  USER_CONFIG_PATH: "/home/user/.config/stamp/config.yaml",
  SYSTEM_CONFIG_PATH: "/etc/stamp/config.yaml",
}));

import { existsSync, mkdirSync, writeFileSync } from "fs";
import { loadConfig, loadConfigFile } from "../lib/config.js";

const DEFAULTS: ResolvedConfig = {
  zone: "UTC",
  json: false,
  logLevel: "warn",
  logJson: false,
};

describe("config-cmd", () => {
  let program: Command;
  let consoleLogSpy: MockInstance;
  let consoleErrorSpy: MockInstance;

  beforeEach(() => {
    program = new Command();
    program.exitOverride();
    program.option("-c, --config <path>", "Config file");
    registerConfigCommands(program);

    consoleLogSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    consoleErrorSpy = vi.spyOn(console, "error").mockImplementation(() => {});

    vi.clearAllMocks();
    resetContext();
    process.exitCode = undefined;
  });

  afterEach(() => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
  });

  describe("example config", () => {
    it("is valid against the config schema", () => {
      const result = ConfigFileSchema.safeParse(parseYaml(EXAMPLE_CONFIG));

      expect(result.success).toBe(true);
    });
  });

  describe("config init", () => {
    it("creates user config file when it does not exist", async () => {
      vi.mocked(existsSync).mockReturnValue(false);

      await program.parseAsync(["node", "test", "config", "init"]);

      expect(mkdirSync).toHaveBeenCalledWith("/home/user/.config/stamp", { recursive: true });
      expect(writeFileSync).toHaveBeenCalledWith(
        "/home/user/.config/stamp/config.yaml",
        EXAMPLE_CONFIG,
        "utf-8"
      );
      expect(consoleLogSpy).toHaveBeenCalledWith(
        "Created config file: /home/user/.config/stamp/config.yaml"
      );
    });

    it("creates system config with --global flag", async () => {
      vi.mocked(existsSync).mockReturnValue(false);

      await program.parseAsync(["node", "test", "config", "init", "--global"]);

      expect(writeFileSync).toHaveBeenCalledWith(
        "/etc/stamp/config.yaml",
        expect.any(String),
        "utf-8"
      );
    });

    it("does not overwrite existing config file", async () => {
      vi.mocked(existsSync).mockReturnValue(true);

      await program.parseAsync(["node", "test", "config", "init"]);

      expect(writeFileSync).not.toHaveBeenCalled();
      expect(consoleErrorSpy).toHaveBeenCalledWith(
        "Config file already exists: /home/user/.config/stamp/config.yaml"
      );
      expect(process.exitCode).toBe(1);
    });

    it("reports write errors", async () => {
      vi.mocked(existsSync).mockReturnValue(false);
      vi.mocked(writeFileSync).mockImplementation(() => {
        throw new Error("Permission denied");
      });

      await program.parseAsync(["node", "test", "config", "init"]);

      expect(consoleErrorSpy).toHaveBeenCalledWith("Failed to create config: Permission denied");
      expect(process.exitCode).toBe(1);
    });

    it("suggests sudo for global config errors", async () => {
      vi.mocked(existsSync).mockReturnValue(false);
      vi.mocked(writeFileSync).mockImplementation(() => {
        throw new Error("Permission denied");
      });

      await program.parseAsync(["node", "test", "config", "init", "--global"]);

      expect(consoleErrorSpy).toHaveBeenCalledWith("System config may require sudo.");
    });
  });

  describe("config validate", () => {
    it("validates existing config files", async () => {
      vi.mocked(existsSync).mockImplementation((path) =>
        String(path).includes("user")
      );
      vi.mocked(loadConfigFile).mockReturnValue({});

      await program.parseAsync(["node", "test", "config", "validate"]);

      expect(loadConfigFile).toHaveBeenCalledTimes(1);
      expect(consoleLogSpy).toHaveBeenCalledWith("  ✓ Valid");
    });

    it("validates only the file given with --config", async () => {
      vi.mocked(existsSync).mockReturnValue(true);
      vi.mocked(loadConfigFile).mockReturnValue({});

      await program.parseAsync([
        "node",
        "test",
        "--config",
        "/custom/config.yaml",
        "config",
        "validate",
      ]);

      expect(loadConfigFile).toHaveBeenCalledTimes(1);
      expect(loadConfigFile).toHaveBeenCalledWith("/custom/config.yaml");
    });

    it("reports validation errors", async () => {
      vi.mocked(existsSync).mockReturnValue(true);
      vi.mocked(loadConfigFile).mockImplementation(() => {
        throw new Error("Config file /bad/config.yaml has errors");
      });

      await program.parseAsync(["node", "test", "-c", "/bad/config.yaml", "config", "validate"]);

      expect(consoleErrorSpy).toHaveBeenCalledWith(
        "  ✗ Invalid: Config file /bad/config.yaml has errors"
      );
      expect(process.exitCode).toBe(1);
    });

    it("reports file not found for specific path", async () => {
      vi.mocked(existsSync).mockReturnValue(false);

      await program.parseAsync(["node", "test", "-c", "/missing/config.yaml", "config", "validate"]);

      expect(consoleErrorSpy).toHaveBeenCalledWith("File not found: /missing/config.yaml");
      expect(process.exitCode).toBe(1);
    });

    it("shows message when no config files found", async () => {
      vi.mocked(existsSync).mockReturnValue(false);

      await program.parseAsync(["node", "test", "config", "validate"]);

      expect(consoleLogSpy).toHaveBeenCalledWith("No configuration files found.");
      expect(process.exitCode).toBeUndefined();
    });

    it("shows success message when all files valid", async () => {
      vi.mocked(existsSync).mockReturnValue(true);
      vi.mocked(loadConfigFile).mockReturnValue({});

      await program.parseAsync(["node", "test", "config", "validate"]);

      expect(consoleLogSpy).toHaveBeenCalledWith("\nAll configuration files are valid.");
    });
  });

  describe("config show", () => {
    it("displays effective configuration", async () => {
      vi.mocked(loadConfig).mockReturnValue({
        config: { ...DEFAULTS, zone: "Europe/Berlin", defaultOffset: "+01:00" },
        sources: ["/home/user/.config/stamp/config.yaml"],
      });

      await program.parseAsync(["node", "test", "config", "show"]);

      expect(consoleLogSpy).toHaveBeenCalledWith("Effective Configuration:");
      expect(consoleLogSpy).toHaveBeenCalledWith(
        "Sources: /home/user/.config/stamp/config.yaml"
      );
      expect(consoleLogSpy).toHaveBeenCalledWith("  zone:           Europe/Berlin");
      expect(consoleLogSpy).toHaveBeenCalledWith("  defaultOffset:  +01:00");
    });

    it("shows defaults only message when no sources", async () => {
      vi.mocked(loadConfig).mockReturnValue({ config: DEFAULTS, sources: [] });

      await program.parseAsync(["node", "test", "config", "show"]);

      expect(consoleLogSpy).toHaveBeenCalledWith("Sources: (defaults only)");
      expect(consoleLogSpy).toHaveBeenCalledWith("  defaultOffset:  (none)");
    });

    it("prints JSON in JSON mode", async () => {
      initContext(["node", "test", "--json"]);
      vi.mocked(loadConfig).mockReturnValue({ config: DEFAULTS, sources: [] });

      await program.parseAsync(["node", "test", "config", "show"]);

      expect(consoleLogSpy).toHaveBeenCalledTimes(1);
      expect(JSON.parse(String(consoleLogSpy.mock.calls[0][0]))).toEqual({
        success: true,
        data: { effective: DEFAULTS, sources: [] },
      });
    });

    it("handles config loading errors", async () => {
      vi.mocked(loadConfig).mockImplementation(() => {
        throw new Error("Config file /x.yaml has errors");
      });

      await program.parseAsync(["node", "test", "config", "show"]);

      expect(consoleErrorSpy).toHaveBeenCalledWith(
        "Failed to load config: Config file /x.yaml has errors"
      );
      expect(process.exitCode).toBe(1);
    });

    it("uses custom config path with -c option", async () => {
      vi.mocked(loadConfig).mockReturnValue({ config: DEFAULTS, sources: [] });

      await program.parseAsync(["node", "test", "-c", "/custom/config.yaml", "config", "show"]);

      expect(loadConfig).toHaveBeenCalledWith("/custom/config.yaml");
    });
  });

  describe("config path", () => {
    it("displays config file locations", async () => {
      vi.mocked(existsSync).mockReturnValue(false);

      await program.parseAsync(["node", "test", "config", "path"]);

      expect(consoleLogSpy).toHaveBeenCalledWith("User config:");
      expect(consoleLogSpy).toHaveBeenCalledWith("  /home/user/.config/stamp/config.yaml");
      expect(consoleLogSpy).toHaveBeenCalledWith("System config:");
    });

    it("indicates when config files exist", async () => {
      vi.mocked(existsSync).mockReturnValue(true);

      await program.parseAsync(["node", "test", "config", "path"]);

      expect(consoleLogSpy).toHaveBeenCalledWith("  (exists)");
    });

    it("indicates when config files do not exist", async () => {
      vi.mocked(existsSync).mockReturnValue(false);

      await program.parseAsync(["node", "test", "config", "path"]);

      expect(consoleLogSpy).toHaveBeenCalledWith("  (not found)");
    });
  });
});
