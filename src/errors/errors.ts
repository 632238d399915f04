/**
 * Error taxonomy
 *
 * Every failure the engine surfaces is a TagbumpError with a stable `code`,
 * so callers can branch without matching on message text.
 * A skipped bump is a normal result and has no error class.
 */

export class TagbumpError extends Error {
  readonly code: string;

  constructor(message: string, code: string) {
    super(message);
    this.name = "TagbumpError";
    this.code = code;
  }
}

export class InvalidVersionFormatError extends TagbumpError {
  readonly input: string;

  constructor(input: string) {
    super(`Invalid version format: "${input}" (expected major.minor.patch)`, "invalid_version_format");
    this.name = "InvalidVersionFormatError";
    this.input = input;
  }
}

export class InvalidBumpTypeError extends TagbumpError {
  readonly value: string;

  constructor(value: string, allowed: readonly string[]) {
    super(`Invalid bump type: "${value}" (expected one of ${allowed.join(", ")})`, "invalid_bump_type");
    this.name = "InvalidBumpTypeError";
    this.value = value;
  }
}

export class SourceControlError extends TagbumpError {
  readonly args: string[];
  override readonly cause: Error;

  constructor(args: string[], cause: Error) {
    super(`git ${args.join(" ")} failed: ${cause.message}`, "source_control_failure");
    this.name = "SourceControlError";
    this.args = args;
    this.cause = cause;
  }
}

export class PublishError extends TagbumpError {
  readonly tag: string;
  override readonly cause: Error;

  constructor(tag: string, cause: Error) {
    super(`Failed to create and push tag ${tag}: ${cause.message}`, "publish_failure");
    this.name = "PublishError";
    this.tag = tag;
    this.cause = cause;
  }
}

export class ConfigError extends TagbumpError {
  readonly details: string[];

  constructor(message: string, details: string[] = []) {
    super(message, "invalid_config");
    this.name = "ConfigError";
    this.details = details;
  }
}

/**
 * Normalize an unknown thrown value to an Error.
 */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
