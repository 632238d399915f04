import { Command } from "commander";
import { registerNextCommand } from "./commands/next";
import { registerTagCommand } from "./commands/tag";
import type { CliRuntime } from "./runtime";

export function createProgram(runtime: CliRuntime): Command {
  const program = new Command();

  program
    .name("tagbump")
    .description("Semantic version tagging driven by commit message markers")
    .version("0.1.0")
    // Global options go before the command: `tagbump -C repo tag --version 1.2.0`
    .enablePositionalOptions()
    .option("-C, --cwd <dir>", "Repository root")
    .option("--log-level <level>", "debug | info | warn | error (default: $LOG_LEVEL or info)");

  registerNextCommand(program, runtime);
  registerTagCommand(program, runtime);

  return program;
}
