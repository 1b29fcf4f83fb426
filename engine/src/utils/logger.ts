/**
 * Wixpack Engine -- Structured Logger
 *
 * Thin pino wrapper. Engine components never create their own logger; they
 * receive one from the caller (or the engine's default, which is silent).
 *
 * Logs always go to stderr so that stdout stays free for CLI output and
 * for tool output the caller may print itself.
 *
 * NOTE: pino.destination() is used instead of pino transports because
 * transports spawn worker_threads, which outlive short CLI runs.
 */

import pino from "pino";

export type LogLevel = "silent" | "debug" | "info" | "warn" | "error";

export interface LoggerOptions {
  level: LogLevel;
  /** Optional static bindings added to every line (e.g. { build: id }) */
  base?: Record<string, unknown>;
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
      base: opts.base ?? null,
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
