/**
 * Git module types
 *
 * Contracts for the source-control collaborators the tagging workflow calls into.
 */

import type { GitIdentity } from "#/schemas";

/**
 * Read side of the repository.
 */
export interface SourceControl {
  /** Refresh tags from the remote */
  fetchTags(): void;
  /**
   * Latest release tag, or undefined when the repository has no tags.
   * Precondition: the implementation lists tags sorted by descending version;
   * the first entry is taken as-is and never re-sorted.
   */
  getLatestTag(): string | undefined;
  /** Subject line of the HEAD commit */
  getLatestCommitSubject(): string;
  /** Set the identity recorded on annotated tags */
  configureIdentity(identity: GitIdentity): void;
}

/**
 * Write side: create an annotated tag at HEAD and push it.
 * Either both steps succeed or a PublishError is thrown and no local tag remains.
 */
export interface TagPublisher {
  publish(tag: string, message: string): void;
}

export interface GitClientOptions {
  /** Working directory of the repository */
  cwd: string;
  /** Remote that receives the tag */
  remote: string;
}
