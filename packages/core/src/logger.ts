import { appendFile, mkdir } from "node:fs/promises";
import path from "node:path";
import type { LogLevel } from "@tailscope/contracts";

export type LogFieldValue = string | number | boolean;
export type LogFields = Readonly<Record<string, LogFieldValue>>;

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
  flush(): Promise<void>;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function formatFields(fields: LogFields | undefined): string {
  if (!fields) return "";
  const keys = Object.keys(fields).sort();
  if (keys.length === 0) return "";
  return ` (${keys.map((key) => `${key}=${String(fields[key])}`).join(", ")})`;
}

export function formatLogLine(level: LogLevel, message: string, fields: LogFields | undefined, atMs: number): string {
  return `[${new Date(atMs).toISOString()}] ${level.toUpperCase()} ${message}${formatFields(fields)}\n`;
}

export interface FileLoggerOptions {
  logPath: string;
  level?: LogLevel;
  now?: () => number;
}

// The terminal belongs to the UI, so log lines only ever go to a file.
export function createFileLogger({ logPath, level = "info", now = Date.now }: FileLoggerOptions): Logger {
  const minRank = LEVEL_RANK[level];
  let ready: Promise<unknown> | null = null;
  let queue: Promise<void> = Promise.resolve();

  const write = (lineLevel: LogLevel, message: string, fields?: LogFields) => {
    if (LEVEL_RANK[lineLevel] < minRank) return;
    const line = formatLogLine(lineLevel, message, fields, now());
    ready ??= mkdir(path.dirname(logPath), { recursive: true });
    const dirReady = ready;
    queue = queue
      .then(() => dirReady)
      .then(() => appendFile(logPath, line, "utf8"))
      .catch((error: unknown) => {
        process.stderr.write(`log write failed: ${String(error)}\n`);
      });
  };

  return {
    debug: (message, fields) => write("debug", message, fields),
    info: (message, fields) => write("info", message, fields),
    warn: (message, fields) => write("warn", message, fields),
    error: (message, fields) => write("error", message, fields),
    flush: () => queue,
  };
}

export function createNoopLogger(): Logger {
  return {
    debug: () => undefined,
    info: () => undefined,
    warn: () => undefined,
    error: () => undefined,
    flush: () => Promise.resolve(),
  };
}
