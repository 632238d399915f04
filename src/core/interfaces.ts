/**
 * Core interfaces for dependency injection.
 * These abstract away I/O operations for testability and portability.
 */

export interface FileSystem {
  readFile(path: string): string;
  exists(path: string): boolean;
}

/**
 * Shell command executor using array-based arguments.
 *
 * Arguments are passed directly to the executable without shell
 * interpretation, so tag names and messages never need quoting.
 *
 * @example shell.execFile("git", ["tag", "-l", "--sort=-version:refname"])
 */
export interface ShellExecutor {
  execFile(command: string, args: string[], options?: { cwd?: string }): string;
}

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogFields = Record<string, unknown>;

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
}

export interface PathConfig {
  /** Root of the git repository being tagged */
  projectRoot: string;
  /** Absolute path to tagbump.yaml (may not exist) */
  configFile: string;
}

export interface EngineContext {
  fs: FileSystem;
  shell: ShellExecutor;
  logger: Logger;
  paths: PathConfig;
}
