// ─── Logger ────────────────────────────────────────────────────────
// Context-tagged console logger. Every engine component gets one; the
// level is set once from engine options.

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

export type LogLevelName = "debug" | "info" | "warn" | "error" | "silent";

export const LOG_LEVEL_NAMES = [
  "debug",
  "info",
  "warn",
  "error",
  "silent",
] as const satisfies readonly LogLevelName[];

const LEVELS_BY_NAME: Readonly<Record<LogLevelName, LogLevel>> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
  silent: LogLevel.SILENT,
};

export class Logger {
  constructor(
    private readonly context: string,
    private readonly minLevel: LogLevel = LogLevel.WARN
  ) {}

  debug(message: string, data?: unknown): void {
    this.log(LogLevel.DEBUG, message, data);
  }

  info(message: string, data?: unknown): void {
    this.log(LogLevel.INFO, message, data);
  }

  warn(message: string, data?: unknown): void {
    this.log(LogLevel.WARN, message, data);
  }

  error(message: string, error?: unknown): void {
    const errorData =
      error instanceof Error
        ? { name: error.name, message: error.message, stack: error.stack }
        : error;
    this.log(LogLevel.ERROR, message, errorData);
  }

  private log(level: LogLevel, message: string, data: unknown): void {
    if (level < this.minLevel) return;

    const formatted = `[${this.context}] ${message}`;
    const extra = data ?? "";

    switch (level) {
      case LogLevel.DEBUG:
        console.debug(formatted, extra);
        break;
      case LogLevel.INFO:
        console.log(formatted, extra);
        break;
      case LogLevel.WARN:
        console.warn(formatted, extra);
        break;
      case LogLevel.ERROR:
        console.error(formatted, extra);
        break;
      case LogLevel.SILENT:
        break;
    }
  }
}

export function createLogger(context: string, level: LogLevelName = "warn"): Logger {
  return new Logger(context, LEVELS_BY_NAME[level]);
}
