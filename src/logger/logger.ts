/**
 * Console logger
 *
 * Levelled logger writing to stderr, so stdout only carries command output
 * (the resolved tag) and can be captured by CI scripts.
 */

import { Chalk, type ChalkInstance } from "chalk";
import type { LogFields, Logger, LogLevel } from "#/core";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface ConsoleLoggerOptions {
  level: LogLevel;
  /** Line sink, defaults to process.stderr */
  write?: (line: string) => void;
  /** Force colours on or off; auto-detected when omitted */
  color?: boolean;
}

function labelFor(chalk: ChalkInstance, level: LogLevel): string {
  switch (level) {
    case "debug":
      return chalk.gray("debug");
    case "info":
      return chalk.cyan("info");
    case "warn":
      return chalk.yellow("warn");
    case "error":
      return chalk.red("error");
  }
}

function formatFields(fields: LogFields | undefined): string {
  if (!fields) return "";
  const parts = Object.entries(fields).map(([key, value]) => `${key}=${JSON.stringify(value)}`);
  return parts.length > 0 ? ` ${parts.join(" ")}` : "";
}

export function createConsoleLogger(options: ConsoleLoggerOptions): Logger {
  const chalk = options.color === undefined ? new Chalk() : new Chalk({ level: options.color ? 1 : 0 });
  const write = options.write ?? ((line: string) => process.stderr.write(`${line}\n`));
  const threshold = LEVEL_ORDER[options.level];

  const log = (level: LogLevel) => (message: string, fields?: LogFields) => {
    if (LEVEL_ORDER[level] < threshold) return;
    write(`${labelFor(chalk, level)} ${message}${formatFields(fields)}`);
  };

  return {
    debug: log("debug"),
    info: log("info"),
    warn: log("warn"),
    error: log("error"),
  };
}
