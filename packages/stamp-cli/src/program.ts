import { Command } from "commander";
import type { StampDeps } from "./lib/deps.js";
import { registerConfigCommands } from "./modules/config-cmd.js";
import { registerDaysCommands } from "./modules/days.js";
import { registerFormatCommand } from "./modules/format.js";
import { registerMathCommands } from "./modules/math.js";
import { registerNowCommand } from "./modules/now.js";
import { registerParseCommand } from "./modules/parse.js";
import { registerProjectCommand } from "./modules/project.js";

export function buildProgram(deps: StampDeps, version: string): Command {
  const program = new Command()
    .name("stamp")
    .description("Parse, format, project and do arithmetic on timestamps")
    .version(version)
    .option("--json", "Print machine-readable JSON")
    .option("-c, --config <path>", "Read configuration from this file only");

  registerNowCommand(program, deps);
  registerParseCommand(program, deps);
  registerFormatCommand(program, deps);
  registerProjectCommand(program, deps);
  registerMathCommands(program, deps);
  registerDaysCommands(program, deps);
  registerConfigCommands(program);

  return program;
}
