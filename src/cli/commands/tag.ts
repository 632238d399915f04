import type { Command } from "commander";
import { createTaggingDeps, tagAndPush } from "#/tagging";
import { createEngineContext, type CliRuntime, type GlobalOptions } from "../runtime";

interface TagCommandOptions {
  version?: string;
  forceBump?: string;
  message?: string;
  dryRun: boolean;
}

export function registerTagCommand(program: Command, runtime: CliRuntime): void {
  program
    .command("tag")
    .description("Create the next version tag and push it to the remote")
    .option("--version <version>", "Tag this exact version instead of resolving one")
    .option("--force-bump <type>", "Force the bump type (skip|patch|minor|major)")
    .option("-m, --message <text>", "Tag annotation (default from messageTemplate)")
    .option("--dry-run", "Resolve and report without tagging or pushing", false)
    .action((opts: TagCommandOptions, command: Command) => {
      const ctx = createEngineContext(runtime, command.optsWithGlobals<GlobalOptions>());
      const result = tagAndPush(createTaggingDeps(ctx), {
        version: opts.version,
        forceBump: opts.forceBump,
        message: opts.message,
        dryRun: opts.dryRun,
      });

      if (!result.skipped) {
        runtime.print(result.tag);
      }
    });
}
