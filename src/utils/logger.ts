/**
 * Leveled console logging with module tags.
 *
 * The threshold is process-wide but only the CLI composition root changes it;
 * library callers get warnings and errors only.
 */

export const LOG_LEVELS = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
} as const;

export type LogLevel = keyof typeof LOG_LEVELS;

let currentLogLevel: LogLevel = "warn";

export function setLogLevel(level: LogLevel): void {
  currentLogLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLogLevel;
}

function shouldLog(level: Exclude<LogLevel, "silent">): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[currentLogLevel];
}

function formatMessage(level: string, module: string, message: string): string {
  return `${new Date().toISOString()} ${level.toUpperCase().padStart(5)} [${module}] ${message}`;
}

export const log = {
  debug(module: string, message: string): void {
    if (!shouldLog("debug")) return;
    console.debug(formatMessage("debug", module, message));
  },

  info(module: string, message: string): void {
    if (!shouldLog("info")) return;
    console.log(formatMessage("info", module, message));
  },

  warn(module: string, message: string): void {
    if (!shouldLog("warn")) return;
    console.warn(formatMessage("warn", module, message));
  },

  error(module: string, message: string): void {
    if (!shouldLog("error")) return;
    console.error(formatMessage("error", module, message));
  },
};
