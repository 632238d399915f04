/**
 * Tagging module types
 */

import type { TagbumpConfig } from "#/schemas";
import type { SourceControl, TagPublisher } from "#/git";
import type { Logger } from "#/core";

/**
 * Collaborators for the tagging workflows
 */
export interface TaggingDeps {
  git: SourceControl & TagPublisher;
  config: TagbumpConfig;
  logger: Logger;
}

export interface NextVersionOptions {
  /** skip | patch | minor | major; empty derives from the commit message */
  forceBump?: string;
}

export interface TagOptions extends NextVersionOptions {
  /** Explicit version, bypasses resolution */
  version?: string;
  /** Tag annotation; defaults to the configured template */
  message?: string;
  /** Resolve and log without creating or pushing the tag */
  dryRun?: boolean;
}

export type TagResult =
  | { skipped: true; tag: null; published: false }
  | { skipped: false; tag: string; message: string; published: boolean };
