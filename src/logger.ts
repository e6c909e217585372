/**
 * Logging for the merge runner and CLI
 */

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, error?: Error, context?: Record<string, unknown>): void;
}

/**
 * Resolve LOG_LEVEL (case-insensitive), falling back to INFO
 */
export function levelFromEnv(value: string | undefined = process.env.LOG_LEVEL): LogLevel {
  switch (value?.toUpperCase()) {
    case 'DEBUG':
      return LogLevel.DEBUG;
    case 'WARN':
      return LogLevel.WARN;
    case 'ERROR':
      return LogLevel.ERROR;
    case 'SILENT':
      return LogLevel.SILENT;
    default:
      return LogLevel.INFO;
  }
}

/**
 * Shared level filtering; subclasses only decide how a line looks.
 * Every line goes to stderr so that stdout stays free for piping merged
 * documents.
 */
abstract class LevelFilteredLogger implements Logger {
  protected readonly level: LogLevel;

  constructor(level?: LogLevel) {
    this.level = level ?? levelFromEnv();
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.emit(LogLevel.DEBUG, message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.emit(LogLevel.INFO, message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.emit(LogLevel.WARN, message, context);
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    const errorContext = error
      ? { error: error.message, stack: error.stack, ...context }
      : context;
    this.emit(LogLevel.ERROR, message, errorContext);
  }

  protected abstract format(level: LogLevel, message: string, context?: Record<string, unknown>): string;

  private emit(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (level < this.level) return;
    console.error(this.format(level, message, context));
  }
}

/**
 * Default logger: `[timestamp] LEVEL: message {context}`
 */
export class ConsoleLogger extends LevelFilteredLogger {
  protected format(level: LogLevel, message: string, context?: Record<string, unknown>): string {
    const ctx = context ? ` ${JSON.stringify(context)}` : '';
    return `[${new Date().toISOString()}] ${LogLevel[level]}: ${message}${ctx}`;
  }
}

/**
 * One JSON object per line, so CI logs can be filtered with jq
 */
export class JsonLogger extends LevelFilteredLogger {
  protected format(level: LogLevel, message: string, context?: Record<string, unknown>): string {
    return JSON.stringify({
      timestamp: new Date().toISOString(),
      level: LogLevel[level].toLowerCase(),
      message,
      ...context,
    });
  }
}

/**
 * Pick a logger implementation from LOG_FORMAT
 */
export function createLogger(format: string | undefined = process.env.LOG_FORMAT): Logger {
  return format === 'json' ? new JsonLogger() : new ConsoleLogger();
}
