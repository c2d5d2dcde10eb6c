/**
 * @file src/core/logger.ts
 * @summary Centralised logging for anki-md-sync. Every message is prefixed with
 * "[anki-md-sync]" so library output is easy to pick out of a host's console. Supports
 * four severity levels (debug, info, warn, error) plus a "silent" mode, and a `swallow`
 * helper for catch blocks whose error is intentionally not rethrown.
 *
 * @exports
 *   - LogLevel   - type union of log severity levels
 *   - LOG_LEVELS - every accepted level, lowest first
 *   - log        - singleton logger object with debug/info/warn/error/swallow methods
 */

const PREFIX = "[anki-md-sync]";

const _debug = globalThis.console.debug.bind(globalThis.console);
const _log = globalThis.console.log.bind(globalThis.console);
const _warn = globalThis.console.warn.bind(globalThis.console);
const _error = globalThis.console.error.bind(globalThis.console);

export const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

let currentLevel: LogLevel = "info";

function shouldLog(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];
}

export const log = {
  /** Set the minimum log level.  "silent" suppresses everything. */
  setLevel(level: LogLevel) {
    currentLevel = level;
  },

  getLevel(): LogLevel {
    return currentLevel;
  },

  /** Verbose detail, silenced unless level is "debug". */
  debug(...args: unknown[]) {
    if (shouldLog("debug")) _debug(PREFIX, ...args);
  },

  info(...args: unknown[]) {
    if (shouldLog("info")) _log(PREFIX, ...args);
  },

  /** Unexpected-but-recoverable situations. */
  warn(...args: unknown[]) {
    if (shouldLog("warn")) _warn(PREFIX, ...args);
  },

  error(...args: unknown[]) {
    if (shouldLog("error")) _error(PREFIX, ...args);
  },

  /**
   * For catch blocks that deliberately continue. Logs at **debug** level so
   * the error is still visible when diagnosing a run.
   *
   * ```ts
   * try { state = readFileState(path, text, options); } catch (e) { log.swallow(`parse ${path}`, e); }
   * ```
   */
  swallow(context: string, err?: unknown) {
    if (shouldLog("debug")) {
      _debug(PREFIX, `[swallowed] ${context}:`, err);
    }
  },
};
