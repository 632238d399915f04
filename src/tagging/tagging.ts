/**
 * Tagging workflows
 *
 * Sequence: fetch tags -> latest tag -> commit subject -> resolve -> (publish).
 * Git failures propagate; only an unreadable commit subject degrades to "".
 */

import type { EngineContext } from "#/core";
import { loadConfig, renderMessage } from "#/config";
import { InvalidVersionFormatError, toError } from "#/errors";
import { GitClient } from "#/git";
import { formatVersion, isExactVersion, parseVersion } from "#/version";
import { describeResolution, parseBumpType, resolveNextVersion, type ResolutionResult } from "#/versioning";
import type { NextVersionOptions, TaggingDeps, TagOptions, TagResult } from "./tagging.types";

function readCommitSubject(deps: TaggingDeps): string {
  try {
    return deps.git.getLatestCommitSubject();
  } catch (err) {
    deps.logger.warn("Could not read latest commit message, using default bump", {
      error: toError(err).message,
    });
    return "";
  }
}

/**
 * Determine the next version from the repository state.
 */
export function getNextVersion(deps: TaggingDeps, options: NextVersionOptions = {}): ResolutionResult {
  const forcedBump = options.forceBump?.trim() ?? "";
  // Reject a bad override before touching the repository
  if (forcedBump !== "") {
    parseBumpType(forcedBump);
  }

  if (deps.config.fetchTags) {
    deps.git.fetchTags();
  }

  const latestTag = deps.git.getLatestTag();
  if (latestTag === undefined) {
    deps.logger.info("No tags found, starting from v0.0.0");
  }

  // The commit subject is irrelevant once a bump is forced
  const commitMessage = forcedBump !== "" ? "" : readCommitSubject(deps);

  const result = resolveNextVersion({ latestTag, commitMessage, forcedBump });
  deps.logger.info(describeResolution(result), { latestTag: latestTag ?? null });

  return result;
}

function normalizeExplicitVersion(version: string): string {
  if (!isExactVersion(version)) {
    throw new InvalidVersionFormatError(version);
  }
  return formatVersion(parseVersion(version));
}

/**
 * Create the next version tag and push it.
 * Returns a skipped result (and publishes nothing) when the bump is skipped.
 */
export function tagAndPush(deps: TaggingDeps, options: TagOptions = {}): TagResult {
  let tag: string;

  if (options.version) {
    tag = normalizeExplicitVersion(options.version);
    deps.logger.info(`Using explicit version ${tag}`);
  } else {
    const result = getNextVersion(deps, options);
    if (result.skipped) {
      return { skipped: true, tag: null, published: false };
    }
    tag = result.tag;
  }

  const message = options.message || renderMessage(deps.config.messageTemplate, tag);

  if (options.dryRun) {
    deps.logger.info(`Dry run: would create and push ${tag}`, { message });
    return { skipped: false, tag, message, published: false };
  }

  if (deps.config.identity) {
    deps.git.configureIdentity(deps.config.identity);
  }

  deps.git.publish(tag, message);
  deps.logger.info(`Pushed ${tag} to ${deps.config.remote}`);

  return { skipped: false, tag, message, published: true };
}

/**
 * Wire the tagging collaborators for a repository: config from
 * tagbump.yaml, git client bound to the configured remote.
 */
export function createTaggingDeps(ctx: EngineContext): TaggingDeps {
  const config = loadConfig(ctx.fs, ctx.paths.configFile);
  const git = new GitClient(ctx.shell, ctx.logger, {
    cwd: ctx.paths.projectRoot,
    remote: config.remote,
  });

  return { git, config, logger: ctx.logger };
}
