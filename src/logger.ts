// src/logger.ts — Verbose logging and warning output
// Foreground runs write to stderr. The background worker appends to a log file
// inside .git, rotated once it grows past MAX_LOG_BYTES.

import { appendFileSync, existsSync, mkdirSync, renameSync, statSync } from "node:fs";
import { dirname } from "node:path";
import type { Warning } from "./types.js";

const MAX_LOG_BYTES = 5 * 1024 * 1024;

export interface LogSink {
  write(line: string): void;
}

export interface Logger {
  /** Written only when verbose is enabled. */
  info(msg: string): void;
  warning(w: Warning): void;
  error(msg: string): void;
}

export interface LoggerOptions {
  verbose?: boolean;
  quiet?: boolean; // suppress warnings, keep errors
  timestamps?: boolean;
  sink?: LogSink;
}

export const stderrSink: LogSink = {
  write: (line) => {
    process.stderr.write(line);
  },
};

/**
 * Sink that appends to a file. The file is rotated to `<path>.1` before a
 * write once it exceeds the size limit.
 */
export function fileSink(filePath: string, maxBytes = MAX_LOG_BYTES): LogSink {
  mkdirSync(dirname(filePath), { recursive: true });
  return {
    write: (line) => {
      if (existsSync(filePath) && statSync(filePath).size > maxBytes) {
        renameSync(filePath, `${filePath}.1`);
      }
      appendFileSync(filePath, line);
    },
  };
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const sink = options.sink ?? stderrSink;
  const prefix = () =>
    options.timestamps ? `${new Date().toISOString()} [${process.pid}] ` : "";

  return {
    info(msg) {
      if (options.verbose) sink.write(`${prefix()}[INFO] ${msg}\n`);
    },
    warning(w) {
      if (options.quiet && w.level !== "error") return;
      if (w.level === "info" && !options.verbose) return;
      const where = w.file ? ` (${w.file})` : "";
      sink.write(`${prefix()}[${w.level}] ${w.module}: ${w.message}${where}\n`);
    },
    error(msg) {
      sink.write(`${prefix()}[error] ${msg}\n`);
    },
  };
}

/** Logger that drops everything. Library default. */
export const silentLogger: Logger = {
  info: () => undefined,
  warning: () => undefined,
  error: () => undefined,
};

export function printWarnings(warnings: Warning[], logger: Logger): void {
  for (const w of warnings) logger.warning(w);
}
