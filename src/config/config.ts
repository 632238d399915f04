/**
 * Config loading
 *
 * Reads tagbump.yaml through the injected FileSystem. A missing file yields
 * the schema defaults; a broken one throws ConfigError with per-key details.
 */

import type { FileSystem, LogLevel } from "#/core";
import { ConfigError } from "#/errors";
import { parse as parseYaml, YAMLParseError } from "yaml";
import type { ZodError } from "zod";
import { LogLevelSchema, TagbumpConfigSchema, type TagbumpConfig } from "#/schemas";
import { MESSAGE_VERSION_PLACEHOLDER } from "#/constants";

/**
 * Parse and validate config from raw YAML content.
 */
export function parseConfig(content: string, filepath?: string): TagbumpConfig {
  const fileContext = filepath ? ` in ${filepath}` : "";

  let raw: unknown;
  try {
    raw = parseYaml(content);
  } catch (err) {
    if (err instanceof YAMLParseError) {
      // First line only; the rest is a source excerpt
      throw new ConfigError(`Invalid YAML syntax${fileContext}`, [err.message.split("\n")[0] ?? err.message]);
    }
    throw err;
  }

  // An empty file parses to null
  const result = TagbumpConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new ConfigError(`Invalid configuration${fileContext}`, formatIssues(result.error));
  }
  return result.data;
}

function formatIssues(error: ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
    return `${path}${issue.message}`;
  });
}

/**
 * Load config from disk, falling back to defaults when the file is absent.
 */
export function loadConfig(fs: FileSystem, configFile: string): TagbumpConfig {
  if (!fs.exists(configFile)) {
    return TagbumpConfigSchema.parse({});
  }
  return parseConfig(fs.readFile(configFile), configFile);
}

/**
 * Pick the log level: explicit flag, then LOG_LEVEL, then "info".
 */
export function resolveLogLevel(flag: string | undefined, env: NodeJS.ProcessEnv): LogLevel {
  const candidate = flag ?? env["LOG_LEVEL"];
  if (candidate === undefined || candidate === "") {
    return "info";
  }

  const result = LogLevelSchema.safeParse(candidate.toLowerCase());
  if (!result.success) {
    throw new ConfigError(`Invalid log level: ${candidate}`, [`expected one of ${LogLevelSchema.options.join(", ")}`]);
  }
  return result.data;
}

/**
 * Render the tag annotation from a template.
 *
 * @example renderMessage("Release {version}", "v1.2.0") → "Release v1.2.0"
 */
export function renderMessage(template: string, tag: string): string {
  return template.split(MESSAGE_VERSION_PLACEHOLDER).join(tag);
}
