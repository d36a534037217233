/**
 * stderr-only logger. stdout carries MCP JSON-RPC traffic, so nothing here
 * may write to it.
 */
import { format } from "node:util";
import type { LogLevel } from "../config/schema.js";

const ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 };

export interface Logger {
  debug(msg: string, ...args: unknown[]): void;
  info(msg: string, ...args: unknown[]): void;
  warn(msg: string, ...args: unknown[]): void;
  error(msg: string, ...args: unknown[]): void;
}

export type LogSink = (line: string) => void;

const stderrSink: LogSink = (line) => { process.stderr.write(line + "\n"); };

export function createLogger(name: string, level: LogLevel, sink: LogSink = stderrSink): Logger {
  const threshold = ORDER[level];
  const emit = (lvl: Exclude<LogLevel, "silent">, msg: string, args: unknown[]) => {
    if (ORDER[lvl] < threshold) return;
    sink(`[${name}] ${lvl.toUpperCase()} ${format(msg, ...args)}`);
  };
  return {
    debug: (msg, ...args) => emit("debug", msg, args),
    info: (msg, ...args) => emit("info", msg, args),
    warn: (msg, ...args) => emit("warn", msg, args),
    error: (msg, ...args) => emit("error", msg, args),
  };
}
