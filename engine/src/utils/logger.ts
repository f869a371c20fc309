/**
 * apkman Engine -- Structured Logger
 *
 * Wraps pino for structured logging. Every engine component receives a
 * Logger through its constructor; nothing logs through a global instance.
 *
 * Logging is silent unless a level is given. Logs always go to stderr so
 * that CLI output on stdout stays clean.
 *
 * NOTE: pino.destination() is used instead of pino transports because
 * transports spawn worker_threads, which outlive short CLI runs.
 */

import pino from "pino";

export type LogLevel = "silent" | "debug" | "info" | "warn" | "error";

export interface LoggerOptions {
  level: LogLevel;
  /** Tag added to every line (e.g. "engine", "cli") */
  name?: string;
}

const DEFAULT_OPTIONS: LoggerOptions = {
  level: "silent",
};

export function createLogger(
  options: Partial<LoggerOptions> = {},
): pino.Logger {
  const opts = { ...DEFAULT_OPTIONS, ...options };

  return pino(
    {
      level: opts.level,
      name: opts.name,
      formatters: {
        level(label: string) {
          return { level: label };
        },
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.destination({ fd: 2, sync: true }),
  );
}

export type Logger = pino.Logger;
