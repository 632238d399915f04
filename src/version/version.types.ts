/**
 * Version module types
 */

/**
 * A release version. Pre-release and build metadata are not modelled.
 */
export interface SemanticVersion {
  readonly major: number;
  readonly minor: number;
  readonly patch: number;
}

/**
 * Bump kinds that change a version component.
 */
export type ReleaseBump = "major" | "minor" | "patch";
