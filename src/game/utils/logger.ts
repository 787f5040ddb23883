import { LOG_LEVEL_SETTING } from "../config";

/** Log levels — higher number = more verbose */
export const LogLevel = {
  OFF: 0,
  ERROR: 1,
  WARN: 2,
  INFO: 3,
  DEBUG: 4,
} as const;
export type LogLevel = (typeof LogLevel)[keyof typeof LogLevel];

export type LogCategory = "CORE" | "SCENE" | "INPUT" | "UI";

const CATEGORY_COLORS: Record<LogCategory, string> = {
  CORE: "#00f0ff",
  SCENE: "#b026ff",
  INPUT: "#ffe66d",
  UI: "#ff2d78",
};

/** Parse a level name (case-insensitive). Unknown names fall back to `fallback`. */
export function parseLogLevel(value: string, fallback: LogLevel = LogLevel.WARN): LogLevel {
  switch (value.trim().toLowerCase()) {
    case "off":
      return LogLevel.OFF;
    case "error":
      return LogLevel.ERROR;
    case "warn":
      return LogLevel.WARN;
    case "info":
      return LogLevel.INFO;
    case "debug":
      return LogLevel.DEBUG;
    default:
      return fallback;
  }
}

export class Logger {
  private _level: LogLevel;

  constructor(level: LogLevel = LogLevel.WARN) {
    this._level = level;
  }

  get level(): LogLevel {
    return this._level;
  }

  set level(l: LogLevel) {
    this._level = l;
  }

  error(category: LogCategory, message: string, ...args: unknown[]): void {
    if (this._level < LogLevel.ERROR) return;
    console.error(`%c[${category}] ${message}`, `color: ${CATEGORY_COLORS[category]}; font-weight: bold`, ...args);
  }

  warn(category: LogCategory, message: string, ...args: unknown[]): void {
    if (this._level < LogLevel.WARN) return;
    console.warn(`%c[${category}] ${message}`, `color: ${CATEGORY_COLORS[category]}`, ...args);
  }

  info(category: LogCategory, message: string, ...args: unknown[]): void {
    if (this._level < LogLevel.INFO) return;
    console.log(`%c[${category}] ${message}`, `color: ${CATEGORY_COLORS[category]}`, ...args);
  }

  debug(category: LogCategory, message: string, ...args: unknown[]): void {
    if (this._level < LogLevel.DEBUG) return;
    console.debug(`%c[${category}] ${message}`, `color: ${CATEGORY_COLORS[category]}`, ...args);
  }
}

/** Singleton logger instance — import and use directly */
export const logger = new Logger(parseLogLevel(LOG_LEVEL_SETTING));
