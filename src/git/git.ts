/**
 * Git CLI client
 *
 * Implements SourceControl and TagPublisher by shelling out to `git`
 * through the injected ShellExecutor.
 */

import type { Logger, ShellExecutor } from "#/core";
import { PublishError, SourceControlError, toError } from "#/errors";
import type { GitIdentity } from "#/schemas";
import type { GitClientOptions, SourceControl, TagPublisher } from "./git.types";

export class GitClient implements SourceControl, TagPublisher {
  private shell: ShellExecutor;
  private logger: Logger;
  private cwd: string;
  private remote: string;

  constructor(shell: ShellExecutor, logger: Logger, options: GitClientOptions) {
    this.shell = shell;
    this.logger = logger;
    this.cwd = options.cwd;
    this.remote = options.remote;
  }

  private git(args: string[]): string {
    this.logger.debug(`git ${args.join(" ")}`);
    return this.shell.execFile("git", args, { cwd: this.cwd });
  }

  /**
   * Run a read command, wrapping failures as SourceControlError
   */
  private read(args: string[]): string {
    try {
      return this.git(args);
    } catch (err) {
      throw new SourceControlError(args, toError(err));
    }
  }

  fetchTags(): void {
    this.read(["fetch", "--tags", this.remote]);
  }

  getLatestTag(): string | undefined {
    const output = this.read(["tag", "-l", "--sort=-version:refname"]);
    return output
      .split("\n")
      .map((line) => line.trim())
      .find((line) => line !== "");
  }

  getLatestCommitSubject(): string {
    return this.read(["log", "HEAD", "--pretty=format:%s", "-1"]).trim();
  }

  configureIdentity(identity: GitIdentity): void {
    this.read(["config", "user.name", identity.name]);
    this.read(["config", "user.email", identity.email]);
  }

  publish(tag: string, message: string): void {
    try {
      this.git(["tag", "-a", tag, "-m", message]);
    } catch (err) {
      throw new PublishError(tag, toError(err));
    }

    try {
      this.git(["push", this.remote, tag]);
    } catch (err) {
      this.removeLocalTag(tag);
      throw new PublishError(tag, toError(err));
    }
  }

  /**
   * Delete a tag created by a publish whose push failed
   */
  private removeLocalTag(tag: string): void {
    try {
      this.git(["tag", "-d", tag]);
    } catch (err) {
      this.logger.warn(`Could not remove local tag ${tag} after failed push`, {
        error: toError(err).message,
      });
    }
  }
}
