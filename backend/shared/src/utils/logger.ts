/**
 * Structured Logger for Lambda Functions
 * Emits one JSON line per entry so CloudWatch Logs Insights can query fields
 */

export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
}

export interface LogContext {
  requestId?: string;
  messageId?: string;
  orderId?: string;
  userId?: string;
  service?: string;
  [key: string]: unknown;
}

export type LogData = Record<string, unknown>;

const LEVELS = [LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR];

function parseLevel(value: string | undefined): LogLevel {
  const upper = value?.toUpperCase();
  return LEVELS.find((level) => level === upper) ?? LogLevel.INFO;
}

class Logger {
  private context: LogContext = {};
  private logLevel: LogLevel;

  constructor(level: LogLevel = parseLevel(process.env.LOG_LEVEL)) {
    this.logLevel = level;
  }

  /**
   * Set persistent context for all subsequent logs
   */
  setContext(context: LogContext): void {
    this.context = { ...this.context, ...context };
  }

  clearContext(): void {
    this.context = {};
  }

  debug(message: string, data?: LogData): void {
    this.log(LogLevel.DEBUG, message, data);
  }

  info(message: string, data?: LogData): void {
    this.log(LogLevel.INFO, message, data);
  }

  warn(message: string, data?: LogData): void {
    this.log(LogLevel.WARN, message, data);
  }

  /**
   * Error level logging; an Error is flattened to name, message and stack
   */
  error(message: string, error?: unknown, data?: LogData): void {
    const errorData: LogData =
      error instanceof Error
        ? { name: error.name, message: error.message, stack: error.stack, ...data }
        : { error, ...data };

    this.log(LogLevel.ERROR, message, errorData);
  }

  /**
   * Create a child logger with additional context
   */
  child(context: LogContext): Logger {
    const childLogger = new Logger(this.logLevel);
    childLogger.context = { ...this.context, ...context };
    return childLogger;
  }

  private log(level: LogLevel, message: string, data?: LogData): void {
    if (!this.shouldLog(level)) {
      return;
    }

    const logEntry = {
      level,
      message,
      timestamp: new Date().toISOString(),
      ...this.context,
      ...(data && { data }),
    };

    switch (level) {
      case LogLevel.DEBUG:
      case LogLevel.INFO:
        console.log(JSON.stringify(logEntry));
        break;
      case LogLevel.WARN:
        console.warn(JSON.stringify(logEntry));
        break;
      case LogLevel.ERROR:
        console.error(JSON.stringify(logEntry));
        break;
    }
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.logLevel);
  }
}

// Shared instance; handlers reset its context per invocation
export const logger = new Logger();

export { Logger };

/**
 * Usage Examples:
 *
 * logger.setContext({ requestId: event.requestContext.requestId });
 * logger.info('Reservation created', { orderId, warehouseId });
 *
 * try {
 *   await ledger.rollback(orderId);
 * } catch (error) {
 *   logger.error('Rollback failed', error, { orderId });
 * }
 *
 * const sagaLogger = logger.child({ orderId });
 * sagaLogger.info('Payment completed');
 */
