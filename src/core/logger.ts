import type { LogLevel } from "@/types";

/**
 * Scoped console logger.
 * Messages are prefixed with "[Scope]" and dropped below the configured level.
 */
export interface Logger {
  readonly scope: string;
  readonly level: LogLevel;
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: Number.POSITIVE_INFINITY,
};

type WritableLevel = Exclude<LogLevel, "silent">;

export function createLogger(scope: string, level: LogLevel = "silent"): Logger {
  const write = (target: WritableLevel, message: string, details: unknown[]): void => {
    if (LEVEL_RANK[target] < LEVEL_RANK[level]) return;
    console[target](`[${scope}] ${message}`, ...details);
  };

  return {
    scope,
    level,
    debug: (message, ...details) => write("debug", message, details),
    info: (message, ...details) => write("info", message, details),
    warn: (message, ...details) => write("warn", message, details),
    error: (message, ...details) => write("error", message, details),
  };
}
