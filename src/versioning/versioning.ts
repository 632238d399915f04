/**
 * Version resolution
 *
 * Pure functions deciding the next release tag from bracketed commit markers:
 *   [skip]  -> no release
 *   [major] -> v1.4.2 -> v2.0.0
 *   [minor] -> v1.4.2 -> v1.5.0
 *   [patch] -> v1.4.2 -> v1.4.3
 *   none    -> minor
 */

import { InvalidBumpTypeError } from "#/errors";
import { INITIAL_VERSION, bumpVersion, formatVersion, parseVersion } from "#/version";
import { BUMP_TYPES, type BumpType, type ResolutionInput, type ResolutionResult } from "./versioning.types";

export const DEFAULT_BUMP_TYPE: BumpType = "minor";

// Priority order matters: the first marker found wins, regardless of position in the message
const MARKER_PRIORITY: ReadonlyArray<readonly [marker: string, type: BumpType]> = [
  ["[skip]", "skip"],
  ["[major]", "major"],
  ["[minor]", "minor"],
  ["[patch]", "patch"],
];

function isBumpType(value: string): value is BumpType {
  return BUMP_TYPES.some((type) => type === value);
}

/**
 * Determine the bump type from a commit message.
 * Case-insensitive; falls back to DEFAULT_BUMP_TYPE when no marker is present.
 */
export function classifyCommitMessage(commitMessage: string): BumpType {
  const lower = commitMessage.toLowerCase();

  for (const [marker, type] of MARKER_PRIORITY) {
    if (lower.includes(marker)) {
      return type;
    }
  }

  return DEFAULT_BUMP_TYPE;
}

/**
 * Validate a caller-supplied bump override.
 * Unknown values are rejected rather than treated as "no bump".
 */
export function parseBumpType(value: string): BumpType {
  const normalized = value.trim().toLowerCase();
  if (!isBumpType(normalized)) {
    throw new InvalidBumpTypeError(value, BUMP_TYPES);
  }
  return normalized;
}

/**
 * Resolve the next release version.
 * A missing latest tag starts from v0.0.0; a malformed one throws.
 */
export function resolveNextVersion(input: ResolutionInput): ResolutionResult {
  const latestTag = input.latestTag?.trim() ?? "";
  const previous = latestTag === "" ? INITIAL_VERSION : parseVersion(latestTag);

  const forcedBump = input.forcedBump?.trim() ?? "";
  const bumpType = forcedBump !== "" ? parseBumpType(forcedBump) : classifyCommitMessage(input.commitMessage);

  if (bumpType === "skip") {
    return { skipped: true, bumpType, previous };
  }

  const version = bumpVersion(previous, bumpType);

  return {
    skipped: false,
    bumpType,
    previous,
    version,
    tag: formatVersion(version),
  };
}

/**
 * Format a resolution for display.
 *
 * @example describeResolution(result) → "v1.0.0 → v2.0.0 (major)"
 */
export function describeResolution(result: ResolutionResult): string {
  const previous = formatVersion(result.previous);

  if (result.skipped) {
    return `${previous} (skipped)`;
  }

  return `${previous} → ${result.tag} (${result.bumpType})`;
}
