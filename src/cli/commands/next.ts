import type { Command } from "commander";
import { createTaggingDeps, getNextVersion } from "#/tagging";
import { createEngineContext, type CliRuntime, type GlobalOptions } from "../runtime";

interface NextCommandOptions {
  forceBump?: string;
}

export function registerNextCommand(program: Command, runtime: CliRuntime): void {
  program
    .command("next")
    .description("Print the next version tag (prints nothing when the bump is skipped)")
    .option("--force-bump <type>", "Force the bump type (skip|patch|minor|major)")
    .action((opts: NextCommandOptions, command: Command) => {
      const ctx = createEngineContext(runtime, command.optsWithGlobals<GlobalOptions>());
      const result = getNextVersion(createTaggingDeps(ctx), { forceBump: opts.forceBump });

      if (!result.skipped) {
        runtime.print(result.tag);
      }
    });
}
