/**
 * Global CLI context for shared options and state.
 * Provides consistent behavior across all commands.
 */

export interface CLIContext {
  /** Output JSON instead of human-readable text */
  json: boolean;
  /** Explicit configuration file given with --config */
  configPath?: string;
}

const DEFAULT_CONTEXT: CLIContext = {
  json: false,
};

let currentContext: CLIContext = { ...DEFAULT_CONTEXT };

/**
 * Find the value of `--config <path>` / `-c <path>` / `--config=<path>`.
 */
export function findConfigPath(argv: string[] = process.argv): string | undefined {
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg.startsWith("--config=")) {
      return arg.slice("--config=".length);
    }
    if ((arg === "--config" || arg === "-c") && argv[i + 1]) {
      return argv[i + 1];
    }
  }
  return undefined;
}

/**
 * Initialize CLI context from command line arguments and environment.
 * `defaults` carries values from the configuration file, which flags and
 * environment variables override.
 */
export function initContext(
  argv: string[] = process.argv,
  defaults: Partial<CLIContext> = {}
): CLIContext {
  currentContext = { ...DEFAULT_CONTEXT, ...defaults };

  if (argv.includes("--json")) {
    currentContext.json = true;
  }

  if (process.env.STAMP_JSON === "1" || process.env.STAMP_JSON === "true") {
    currentContext.json = true;
  }

  const configPath = findConfigPath(argv);
  if (configPath) {
    currentContext.configPath = configPath;
  }

  return currentContext;
}

/**
 * Get the current CLI context.
 */
export function getContext(): CLIContext {
  return currentContext;
}

/**
 * Check if we're in JSON output mode.
 */
export function isJsonMode(): boolean {
  return currentContext.json;
}

/**
 * Reset context to defaults (for testing).
 */
export function resetContext(): void {
  currentContext = { ...DEFAULT_CONTEXT };
}
