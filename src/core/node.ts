/**
 * Node.js implementations of the core interfaces.
 * Used by the CLI; tests use the in-memory mocks instead.
 */

import { execFileSync } from "child_process";
import { existsSync, readFileSync } from "fs";
import type { FileSystem, ShellExecutor } from "./interfaces";

export function createNodeFileSystem(): FileSystem {
  return {
    readFile(path: string): string {
      return readFileSync(path, "utf-8");
    },

    exists(path: string): boolean {
      return existsSync(path);
    },
  };
}

export function createNodeShellExecutor(defaultCwd?: string): ShellExecutor {
  return {
    execFile(command: string, args: string[], options?: { cwd?: string }): string {
      return execFileSync(command, args, {
        cwd: options?.cwd ?? defaultCwd,
        encoding: "utf-8",
        stdio: ["ignore", "pipe", "pipe"],
      });
    },
  };
}
