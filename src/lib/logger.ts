/**
 * Leveled console logger. Every line is prefixed with "[annotate]".
 * Console methods are looked up per call so test spies on `console` see them.
 */

const PREFIX = '[annotate]';

const _debug = (...args: unknown[]) => globalThis.console.debug(...args);
const _log = (...args: unknown[]) => globalThis.console.log(...args);
const _warn = (...args: unknown[]) => globalThis.console.warn(...args);
const _error = (...args: unknown[]) => globalThis.console.error(...args);

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

let currentLevel: LogLevel = 'info';

function shouldLog(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && (LOG_LEVELS as readonly string[]).includes(value);
}

export const log = {
  /** Set the minimum log level. "silent" suppresses everything. */
  setLevel(level: LogLevel): void {
    currentLevel = level;
  },

  getLevel(): LogLevel {
    return currentLevel;
  },

  /** Verbose detail, printed only at "debug". */
  debug(...args: unknown[]): void {
    if (shouldLog('debug')) _debug(PREFIX, ...args);
  },

  /** General progress messages. */
  info(...args: unknown[]): void {
    if (shouldLog('info')) _log(PREFIX, ...args);
  },

  /** Something was skipped or ignored but work continues. */
  warn(...args: unknown[]): void {
    if (shouldLog('warn')) _warn(PREFIX, ...args);
  },

  /** Failures the caller should look into. */
  error(...args: unknown[]): void {
    if (shouldLog('error')) _error(PREFIX, ...args);
  },
};
