/**
 * Tagging module
 *
 * Repository-level workflows built on the version resolver.
 */

export * from "./tagging";
export * from "./tagging.types";
