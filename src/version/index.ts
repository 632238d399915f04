/**
 * Version module
 *
 * Parsing, formatting, bumping and ordering of release versions.
 */

export {
  INITIAL_VERSION,
  parseVersion,
  isExactVersion,
  formatVersion,
  bumpVersion,
  compareVersions,
  isGreaterThan,
} from "./version";
export type { SemanticVersion, ReleaseBump } from "./version.types";
