/**
 * Structured JSON logging.
 * One line per entry, level taken from LOG_LEVEL.
 */

export enum LogLevel {
  DEBUG = "DEBUG",
  INFO = "INFO",
  WARN = "WARN",
  ERROR = "ERROR",
}

export interface LogContext {
  component?: string;
  userId?: string;
  seasonId?: string;
  requestId?: string;
  [key: string]: unknown;
}

const LEVEL_ORDER: LogLevel[] = [LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR];

function parseLogLevel(level: string | undefined, fallback: LogLevel): LogLevel {
  const upper = (level ?? "").trim().toUpperCase();
  return LEVEL_ORDER.find((l) => l === upper) ?? fallback;
}

function serializeError(error: unknown): unknown {
  if (error instanceof Error) {
    return { name: error.name, message: error.message, stack: error.stack };
  }
  return error;
}

export class Logger {
  private readonly context: LogContext;
  private readonly logLevel: LogLevel;

  constructor(context: LogContext = {}, logLevel?: LogLevel) {
    this.context = context;
    this.logLevel = logLevel ?? parseLogLevel(process.env.LOG_LEVEL, LogLevel.INFO);
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVEL_ORDER.indexOf(level) >= LEVEL_ORDER.indexOf(this.logLevel);
  }

  private formatMessage(level: LogLevel, message: string, data?: Record<string, unknown>): string {
    return JSON.stringify({
      timestamp: new Date().toISOString(),
      level,
      message,
      context: this.context,
      data,
    });
  }

  debug(message: string, data?: Record<string, unknown>): void {
    if (this.shouldLog(LogLevel.DEBUG)) {
      console.log(this.formatMessage(LogLevel.DEBUG, message, data));
    }
  }

  info(message: string, data?: Record<string, unknown>): void {
    if (this.shouldLog(LogLevel.INFO)) {
      console.log(this.formatMessage(LogLevel.INFO, message, data));
    }
  }

  warn(message: string, data?: Record<string, unknown>): void {
    if (this.shouldLog(LogLevel.WARN)) {
      console.warn(this.formatMessage(LogLevel.WARN, message, data));
    }
  }

  error(message: string, error?: unknown, data?: Record<string, unknown>): void {
    if (this.shouldLog(LogLevel.ERROR)) {
      console.error(this.formatMessage(LogLevel.ERROR, message, { ...data, error: serializeError(error) }));
    }
  }

  /**
   * Create a child logger with additional context
   */
  child(additionalContext: LogContext): Logger {
    return new Logger({ ...this.context, ...additionalContext }, this.logLevel);
  }
}

export const logger = new Logger({ service: "mua-vu-api" });

export const createLogger = (component: string): Logger => logger.child({ component });
