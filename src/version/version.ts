/**
 * Version utilities
 *
 * Parsing and formatting of `v<major>.<minor>.<patch>` tags. Arithmetic and
 * ordering go through the semver package so they follow standard semver rules.
 */

import semver from "semver";
import { InvalidVersionFormatError } from "#/errors";
import type { ReleaseBump, SemanticVersion } from "./version.types";

// Leading major.minor.patch; anything after it (pre-release, metadata, junk) is ignored
const VERSION_PREFIX_REGEX = /^(\d+)\.(\d+)\.(\d+)/;

// Explicit versions passed by the caller must be exactly major.minor.patch
const EXACT_VERSION_REGEX = /^v?\d+\.\d+\.\d+$/;

export const INITIAL_VERSION: SemanticVersion = Object.freeze({ major: 0, minor: 0, patch: 0 });

/**
 * Parse a tag such as "v1.2.3" or "1.2.3-rc1" into its numeric components.
 * Throws InvalidVersionFormatError when the text has no numeric prefix.
 * Never defaults: callers substitute INITIAL_VERSION when there is no tag.
 *
 * @example parseVersion("v1.2.3") → { major: 1, minor: 2, patch: 3 }
 */
export function parseVersion(tagText: string): SemanticVersion {
  const stripped = tagText.startsWith("v") ? tagText.slice(1) : tagText;
  const match = VERSION_PREFIX_REGEX.exec(stripped);

  if (!match) {
    throw new InvalidVersionFormatError(tagText);
  }

  const [, major = "", minor = "", patch = ""] = match;
  const version = {
    major: parseInt(major, 10),
    minor: parseInt(minor, 10),
    patch: parseInt(patch, 10),
  };

  // Components past 2^53 would be silently rounded
  if (![version.major, version.minor, version.patch].every(Number.isSafeInteger)) {
    throw new InvalidVersionFormatError(tagText);
  }

  return version;
}

/**
 * Check whether a string is exactly a version, with optional "v" and nothing after.
 */
export function isExactVersion(text: string): boolean {
  return EXACT_VERSION_REGEX.test(text);
}

/**
 * Format as a tag name.
 *
 * @example formatVersion({ major: 1, minor: 2, patch: 3 }) → "v1.2.3"
 */
export function formatVersion(version: SemanticVersion): string {
  return `v${toSemverString(version)}`;
}

function toSemverString(version: SemanticVersion): string {
  return `${version.major}.${version.minor}.${version.patch}`;
}

/**
 * Bump a version by the specified type, resetting lower components to zero.
 */
export function bumpVersion(version: SemanticVersion, type: ReleaseBump): SemanticVersion {
  const current = toSemverString(version);
  const next = semver.inc(current, type);
  if (!next) {
    throw new Error(`Failed to bump version ${current} by ${type}`);
  }
  return parseVersion(next);
}

/**
 * Compare two versions.
 * Returns -1 if a < b, 0 if a === b, 1 if a > b.
 */
export function compareVersions(a: SemanticVersion, b: SemanticVersion): -1 | 0 | 1 {
  return semver.compare(toSemverString(a), toSemverString(b));
}

/**
 * Check if version a is greater than version b.
 */
export function isGreaterThan(a: SemanticVersion, b: SemanticVersion): boolean {
  return semver.gt(toSemverString(a), toSemverString(b));
}
