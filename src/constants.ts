/**
 * Global constants for tagbump
 */

export const CONFIG_FILE = "tagbump.yaml";

export const DEFAULT_REMOTE = "origin";

// "{version}" is replaced with the tag name, e.g. "Release v1.2.0"
export const DEFAULT_MESSAGE_TEMPLATE = "Release {version}";

export const MESSAGE_VERSION_PLACEHOLDER = "{version}";
