/**
 * tagbump
 *
 * Semantic version tagging driven by commit message markers.
 * Pure resolution core plus git-backed tagging workflows.
 */

// Core interfaces
export * from "#/core";

// Errors
export * from "#/errors";

// Schemas (Zod validation)
export * from "#/schemas";

// Config loading
export * from "#/config";

// Version utilities (parse, format, bump, compare)
export * from "#/version";

// Version resolution (commit markers, bump policy)
export * from "#/versioning";

// Git collaborators
export * from "#/git";

// Tagging workflows
export * from "#/tagging";

// Logger
export * from "#/logger";
