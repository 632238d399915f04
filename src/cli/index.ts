/**
 * tagbump CLI entry point (run with `npm run tagbump -- <command>`)
 */

import { runCli } from "./run";
import { createNodeRuntime } from "./runtime";

runCli(process.argv.slice(2), createNodeRuntime()).then((code) => {
  process.exitCode = code;
});
