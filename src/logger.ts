// src/logger.ts

export const LOG_LEVEL_NAMES = ["debug", "info", "warn", "error", "none"] as const;

export type LogLevel = (typeof LOG_LEVEL_NAMES)[number];

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  none: 4,
};

export interface LogContext {
  node?: string;
  component?: string;
  peer?: string;
  linkId?: string;
  [key: string]: string | number | boolean | undefined;
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  context: LogContext;
  timestamp: Date;
  error?: Error;
}

export type LogHandler = (entry: LogEntry) => void;

function writeToConsole(level: LogLevel, formatted: string, error?: Error) {
  switch (level) {
    case "debug":
      console.debug(formatted);
      break;
    case "info":
      console.log(formatted);
      break;
    case "warn":
      console.warn(formatted);
      break;
    case "error":
      console.error(formatted);
      if (error) {
        console.error(error);
      }
      break;
  }
}

/**
 * Default console log handler that formats entries for terminal output.
 */
export const consoleLogHandler: LogHandler = (entry: LogEntry) => {
  const { level, message, context, timestamp, error } = entry;
  const ts = timestamp.toISOString();
  const ctx = Object.entries(context)
    .filter(([_, v]) => v !== undefined)
    .map(([k, v]) => `${k}=${v}`)
    .join(" ");

  const prefix = ctx ? `[${ctx}]` : "";
  writeToConsole(
    level,
    `${ts} ${level.toUpperCase().padEnd(5)} ${prefix} ${message}`,
    error,
  );
};

/**
 * Formats a duration as HH:MM:SS. Hours wrap at 24.
 */
export function formatElapsed(elapsedMs: number): string {
  const seconds = Math.max(0, Math.floor(elapsedMs / 1000));
  const minutes = Math.floor(seconds / 60);
  const hours = Math.floor(minutes / 60);
  const pad = (n: number) => String(n).padStart(2, "0");
  return `${pad(hours % 24)}:${pad(minutes % 60)}:${pad(seconds % 60)}`;
}

/**
 * Log handler for the node's operator-facing stream: `HH:MM:SS - message`,
 * where the time is measured from `startTime`. Context is left out so the
 * lines read like a transcript of the node's activity.
 */
export function createElapsedLogHandler(
  startTime: number = Date.now(),
): LogHandler {
  return (entry: LogEntry) => {
    const elapsed = formatElapsed(entry.timestamp.getTime() - startTime);
    const tag = entry.level === "info" ? "" : `${entry.level.toUpperCase()} `;
    writeToConsole(entry.level, `${elapsed} - ${tag}${entry.message}`, entry.error);
  };
}

/**
 * Global logger configuration.
 */
class LoggerConfig {
  private _level: LogLevel = "info";
  private _handler: LogHandler = consoleLogHandler;

  get level(): LogLevel {
    return this._level;
  }

  set level(level: LogLevel) {
    this._level = level;
  }

  get handler(): LogHandler {
    return this._handler;
  }

  set handler(handler: LogHandler) {
    this._handler = handler;
  }

  configure(options: { level?: LogLevel; handler?: LogHandler }): void {
    if (options.level !== undefined) {
      this._level = options.level;
    }
    if (options.handler !== undefined) {
      this._handler = options.handler;
    }
  }

  reset(): void {
    this._level = "info";
    this._handler = consoleLogHandler;
  }
}

export const loggerConfig = new LoggerConfig();

/**
 * A structured logger with context.
 */
export class Logger {
  private context: LogContext;

  constructor(context: LogContext = {}) {
    this.context = context;
  }

  /**
   * Creates a child logger with additional context.
   */
  child(additionalContext: LogContext): Logger {
    return new Logger({ ...this.context, ...additionalContext });
  }

  private log(
    level: LogLevel,
    message: string,
    extra?: LogContext,
    error?: Error,
  ): void {
    if (LOG_LEVELS[level] < LOG_LEVELS[loggerConfig.level]) {
      return;
    }

    loggerConfig.handler({
      level,
      message,
      context: { ...this.context, ...extra },
      timestamp: new Date(),
      error,
    });
  }

  debug(message: string, extra?: LogContext): void {
    this.log("debug", message, extra);
  }

  info(message: string, extra?: LogContext): void {
    this.log("info", message, extra);
  }

  warn(message: string, extra?: LogContext): void {
    this.log("warn", message, extra);
  }

  error(message: string, error?: Error, extra?: LogContext): void {
    this.log("error", message, extra, error);
  }
}

/**
 * Creates a logger for a specific component.
 */
export function createLogger(component: string, node?: string): Logger {
  return new Logger({ component, node });
}
