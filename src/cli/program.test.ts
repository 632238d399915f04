import { describe, test, expect } from "vitest";
import { createProgram } from "./program";
import { runCli } from "./run";
import type { CliRuntime } from "./runtime";
import { createMockFileSystem, createMockLogger, createMockShellExecutor } from "#/test-utils/mocks";
import type { LogLevel } from "#/core";

describe("cli", () => {
  const createRuntime = (
    shellResults: Record<string, string | Error> = {},
    files: Record<string, string> = {}
  ) => {
    const output: string[] = [];
    const errors: string[] = [];
    const levels: LogLevel[] = [];
    const shell = createMockShellExecutor(shellResults);
    const runtime: CliRuntime = {
      fs: createMockFileSystem(files),
      shell,
      env: {},
      cwd: "/work",
      createLogger: (level) => {
        levels.push(level);
        return createMockLogger();
      },
      print: (line) => output.push(line),
      printError: (line) => errors.push(line),
    };
    return { runtime, output, errors, shell, levels };
  };

  const run = async (runtime: CliRuntime, args: string[]) => {
    const program = createProgram(runtime);
    program.exitOverride();
    await program.parseAsync(args, { from: "user" });
  };

  describe("next", () => {
    test("prints the next tag", async () => {
      const { runtime, output } = createRuntime({ "git tag -l": "v1.0.0", "git log": "[major] new api" });

      await run(runtime, ["next"]);

      expect(output).toEqual(["v2.0.0"]);
    });

    test("prints nothing when skipped", async () => {
      const { runtime, output } = createRuntime({ "git tag -l": "v1.0.0" });

      await run(runtime, ["next", "--force-bump", "skip"]);

      expect(output).toEqual([]);
    });

    test("runs git in the directory given by --cwd", async () => {
      const { runtime, shell } = createRuntime({ "git tag -l": "v1.0.0" });

      await run(runtime, ["-C", "repo", "next"]);

      expect(shell.calls.every((call) => call.cwd === "/work/repo")).toBe(true);
    });

    test("passes the log level to the logger", async () => {
      const { runtime, levels } = createRuntime();

      await run(runtime, ["--log-level", "debug", "next"]);

      expect(levels).toEqual(["debug"]);
    });

    test("rejects unknown forced bumps", async () => {
      const { runtime } = createRuntime({ "git tag -l": "v1.0.0" });

      await expect(run(runtime, ["next", "--force-bump", "huge"])).rejects.toThrow(
        'Invalid bump type: "huge" (expected one of skip, patch, minor, major)'
      );
    });
  });

  describe("tag", () => {
    test("tags, pushes and prints the tag", async () => {
      const { runtime, output, shell } = createRuntime({ "git tag -l": "v0.3.1", "git log": "[patch] fix" });

      await run(runtime, ["tag"]);

      expect(output).toEqual(["v0.3.2"]);
      expect(shell.commands.slice(-2)).toEqual([
        "git tag -a v0.3.2 -m Release v0.3.2",
        "git push origin v0.3.2",
      ]);
    });

    test("accepts an explicit version and message", async () => {
      const { runtime, output, shell } = createRuntime();

      await run(runtime, ["tag", "--version", "1.0.0", "-m", "First stable"]);

      expect(output).toEqual(["v1.0.0"]);
      expect(shell.commands).toEqual(["git tag -a v1.0.0 -m First stable", "git push origin v1.0.0"]);
    });

    test("pushes to the remote from tagbump.yaml", async () => {
      const { runtime, shell } = createRuntime({}, { "/work/tagbump.yaml": "remote: upstream\n" });

      await run(runtime, ["tag", "--version", "v2.1.0"]);

      expect(shell.commands).toContain("git push upstream v2.1.0");
    });

    test("dry run prints without pushing", async () => {
      const { runtime, output, shell } = createRuntime({ "git tag -l": "v1.0.0" });

      await run(runtime, ["tag", "--dry-run"]);

      expect(output).toEqual(["v1.1.0"]);
      expect(shell.commands.some((command) => command.startsWith("git push"))).toBe(false);
    });
  });

  describe("runCli", () => {
    test("returns 0 on success", async () => {
      const { runtime, output, errors } = createRuntime({ "git tag -l": "v1.0.0" });

      const code = await runCli(["next"], runtime);

      expect(code).toBe(0);
      expect(output).toEqual(["v1.1.0"]);
      expect(errors).toEqual([]);
    });

    test("reports git failures and returns 1", async () => {
      const { runtime, output, errors } = createRuntime({ "git tag -l": new Error("not a git repository") });

      const code = await runCli(["next"], runtime);

      expect(code).toBe(1);
      expect(output).toEqual([]);
      expect(errors).toEqual(["Error: git tag -l --sort=-version:refname failed: not a git repository"]);
    });

    test("reports config errors with their details", async () => {
      const { runtime, errors, shell } = createRuntime({}, { "/work/tagbump.yaml": "fetchTags: sometimes\n" });

      const code = await runCli(["tag"], runtime);

      expect(code).toBe(1);
      expect(errors).toEqual([
        "Error: Invalid configuration in /work/tagbump.yaml",
        "  fetchTags: Expected boolean, received string",
      ]);
      expect(shell.commands).toEqual([]);
    });
  });
});
