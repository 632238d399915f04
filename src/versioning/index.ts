/**
 * Versioning module
 *
 * Commit-marker driven resolution of the next release tag.
 */

export * from "./versioning";
export * from "./versioning.types";
