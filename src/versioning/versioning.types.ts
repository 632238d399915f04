/**
 * Versioning module types
 *
 * Types for resolving the next release tag from the latest tag and commit message.
 */

import type { ReleaseBump, SemanticVersion } from "#/version";

export const BUMP_TYPES = ["skip", "patch", "minor", "major"] as const;

export type BumpType = (typeof BUMP_TYPES)[number];

/**
 * Inputs to a single resolution
 */
export interface ResolutionInput {
  /** Latest release tag; empty or undefined means no prior release */
  latestTag?: string;
  /** Subject line of the most recent commit */
  commitMessage: string;
  /** Override for the marker scan; empty means derive from commitMessage */
  forcedBump?: string;
}

export interface SkippedResolution {
  skipped: true;
  bumpType: "skip";
  previous: SemanticVersion;
}

export interface BumpedResolution {
  skipped: false;
  bumpType: ReleaseBump;
  previous: SemanticVersion;
  version: SemanticVersion;
  /** Tag name, always v<major>.<minor>.<patch> */
  tag: string;
}

export type ResolutionResult = SkippedResolution | BumpedResolution;
