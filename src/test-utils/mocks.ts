/**
 * Test utilities - Mock factories for dependency injection interfaces
 */

import type { EngineContext, FileSystem, LogFields, Logger, LogLevel, ShellExecutor } from "#/core";

/**
 * Create a mock FileSystem with in-memory storage
 */
export function createMockFileSystem(
  initialFiles: Record<string, string> = {}
): FileSystem & { files: Map<string, string> } {
  const files = new Map<string, string>(Object.entries(initialFiles));

  return {
    files,

    readFile(path: string): string {
      const content = files.get(path);
      if (content === undefined) {
        throw new Error(`ENOENT: no such file or directory, open '${path}'`);
      }
      return content;
    },

    exists(path: string): boolean {
      return files.has(path);
    },
  };
}

/**
 * Recorded shell execution call
 */
export interface ShellCall {
  command: string;
  args: string[];
  cwd?: string;
}

/**
 * Create a mock ShellExecutor with predefined command outputs.
 * Keys are matched as prefixes of the full command line ("git tag -l"),
 * first matching key wins. Unmatched commands succeed with empty output.
 */
export function createMockShellExecutor(
  results: Record<string, string | Error> = {}
): ShellExecutor & { calls: ShellCall[]; commands: string[] } {
  const calls: ShellCall[] = [];
  const commands: string[] = [];

  return {
    calls,
    commands,

    execFile(command: string, args: string[], options?: { cwd?: string }): string {
      calls.push({ command, args, cwd: options?.cwd });
      const commandLine = `${command} ${args.join(" ")}`;
      commands.push(commandLine);

      for (const [pattern, result] of Object.entries(results)) {
        if (commandLine.startsWith(pattern)) {
          if (result instanceof Error) {
            throw result;
          }
          return result;
        }
      }

      return "";
    },
  };
}

/**
 * Recorded log entry
 */
export interface LogEntry {
  level: LogLevel;
  message: string;
  fields?: LogFields;
}

/**
 * Create a mock Logger that records entries
 */
export function createMockLogger(): Logger & { entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  const record = (level: LogLevel) => (message: string, fields?: LogFields) => {
    entries.push({ level, message, fields });
  };

  return {
    entries,
    debug: record("debug"),
    info: record("info"),
    warn: record("warn"),
    error: record("error"),
  };
}

/**
 * Create an EngineContext wired to mocks, rooted at /repo
 */
export function createMockContext(options: {
  files?: Record<string, string>;
  shell?: Record<string, string | Error>;
} = {}): EngineContext & {
  fs: ReturnType<typeof createMockFileSystem>;
  shell: ReturnType<typeof createMockShellExecutor>;
  logger: ReturnType<typeof createMockLogger>;
} {
  return {
    fs: createMockFileSystem(options.files),
    shell: createMockShellExecutor(options.shell),
    logger: createMockLogger(),
    paths: {
      projectRoot: "/repo",
      configFile: "/repo/tagbump.yaml",
    },
  };
}
