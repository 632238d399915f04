/**
 * CLI runtime
 *
 * Everything the commands need from the outside world, injected so the
 * program can be driven from tests without a real repository.
 */

import { join, resolve } from "path";
import {
  createNodeFileSystem,
  createNodeShellExecutor,
  type EngineContext,
  type FileSystem,
  type Logger,
  type LogLevel,
  type ShellExecutor,
} from "#/core";
import { resolveLogLevel } from "#/config";
import { CONFIG_FILE } from "#/constants";
import { createConsoleLogger } from "#/logger";

export interface CliRuntime {
  fs: FileSystem;
  shell: ShellExecutor;
  env: NodeJS.ProcessEnv;
  cwd: string;
  createLogger(level: LogLevel): Logger;
  /** Command output (stdout) */
  print(line: string): void;
  /** Error report (stderr) */
  printError(line: string): void;
}

export type GlobalOptions = {
  cwd?: string;
  logLevel?: string;
};

export function createNodeRuntime(): CliRuntime {
  return {
    fs: createNodeFileSystem(),
    shell: createNodeShellExecutor(),
    env: process.env,
    cwd: process.cwd(),
    createLogger: (level) => createConsoleLogger({ level }),
    print: (line) => {
      process.stdout.write(`${line}\n`);
    },
    printError: (line) => {
      process.stderr.write(`${line}\n`);
    },
  };
}

/**
 * Build the engine context for one command invocation.
 */
export function createEngineContext(runtime: CliRuntime, globals: GlobalOptions): EngineContext {
  const projectRoot = resolve(runtime.cwd, globals.cwd ?? ".");

  return {
    fs: runtime.fs,
    shell: runtime.shell,
    logger: runtime.createLogger(resolveLogLevel(globals.logLevel, runtime.env)),
    paths: {
      projectRoot,
      configFile: join(projectRoot, CONFIG_FILE),
    },
  };
}
