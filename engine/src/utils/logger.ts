/**
 * c2r-deploy Engine -- Structured Logger
 *
 * Wraps pino for structured logging. Console logging is silent unless the
 * caller asks for a level (the CLI does so under --debug); structured logs go
 * to stderr so stdout stays reserved for user-facing output.
 *
 * When `file` is set, every record at `fileLevel` or above is also appended
 * to that file, independent of the console level. Deployments keep a log on
 * the target machine this way even when run silently.
 *
 * NOTE: pino.destination() is used instead of pino transports because
 * transports spawn worker_threads which break inside esbuild bundles.
 */

import pino from "pino";

export type LogLevel = "silent" | "debug" | "info" | "warn" | "error";

export interface LoggerOptions {
  level: LogLevel;
  /** Absolute path of a log file to append to */
  file?: string;
  fileLevel: Exclude<LogLevel, "silent">;
}

const DEFAULT_OPTIONS: LoggerOptions = {
  level: "silent",
  fileLevel: "info",
};

const LEVEL_ORDER: LogLevel[] = ["debug", "info", "warn", "error", "silent"];

function lowestLevel(a: LogLevel, b: LogLevel): LogLevel {
  return LEVEL_ORDER.indexOf(a) <= LEVEL_ORDER.indexOf(b) ? a : b;
}

export function createLogger(
  options: Partial<LoggerOptions> = {},
): pino.Logger {
  const opts = { ...DEFAULT_OPTIONS, ...options };

  const baseOptions: pino.LoggerOptions = {
    formatters: {
      level(label: string) {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  // Synchronous I/O only -- no worker_threads.
  const stderr = pino.destination({ fd: 2, sync: true });

  if (!opts.file) {
    return pino({ ...baseOptions, level: opts.level }, stderr);
  }

  const streams: pino.StreamEntry[] = [
    {
      level: opts.fileLevel,
      stream: pino.destination({ dest: opts.file, sync: true, mkdir: true }),
    },
  ];
  if (opts.level !== "silent") {
    streams.push({ level: opts.level, stream: stderr });
  }

  return pino(
    { ...baseOptions, level: lowestLevel(opts.level, opts.fileLevel) },
    pino.multistream(streams),
  );
}

export type Logger = pino.Logger;
