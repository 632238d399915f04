import { CommanderError } from "commander";
import { ConfigError, toError } from "#/errors";
import { createProgram } from "./program";
import type { CliRuntime } from "./runtime";

/**
 * Report a failed command on stderr.
 */
export function reportError(err: unknown, runtime: CliRuntime): void {
  const error = toError(err);
  runtime.printError(`Error: ${error.message}`);
  if (error instanceof ConfigError) {
    error.details.forEach((detail) => runtime.printError(`  ${detail}`));
  }
}

/**
 * Run the CLI with user arguments (no node/script prefix) and return the exit code.
 */
export async function runCli(args: string[], runtime: CliRuntime): Promise<number> {
  const program = createProgram(runtime);
  // Commander reports its own usage errors; keep it from exiting the process
  program.exitOverride();

  try {
    await program.parseAsync(args, { from: "user" });
    return 0;
  } catch (err) {
    if (err instanceof CommanderError) {
      return err.exitCode;
    }
    reportError(err, runtime);
    return 1;
  }
}
