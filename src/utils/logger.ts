/**
 * Namespaced console logger shared by the relay
 */

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

export type LogLevelName = 'debug' | 'info' | 'warn' | 'error';

/**
 * Structured fields understood by the JSON Lines output; anything else lands
 * under `context`.
 */
export interface LogContext {
  sessionId?: string;
  taskId?: string;
  agentId?: string;
  event?: string;
  [key: string]: unknown;
}

const TOP_LEVEL_FIELDS = ['sessionId', 'taskId', 'agentId', 'event', 'error'];

const LAVENDER = '\x1b[38;5;105m';
const RESET = '\x1b[0m';

function parseLevel(value: string | undefined): LogLevel {
  switch ((value ?? 'info').toLowerCase()) {
    case 'debug':
      return LogLevel.DEBUG;
    case 'warn':
      return LogLevel.WARN;
    case 'error':
      return LogLevel.ERROR;
    default:
      return LogLevel.INFO;
  }
}

export class Logger {
  private static instance: Logger | undefined;
  // Shared so that levels applied from config reach every namespaced logger
  private static overrides: { level?: LogLevel; structured?: boolean } = {};

  private readonly namespace?: string;

  private constructor(namespace?: string) {
    this.namespace = namespace;
  }

  static getInstance(namespace?: string): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger();
    }
    if (namespace) {
      return new Logger(namespace);
    }
    return Logger.instance;
  }

  /**
   * Applies the service logging config to all loggers, overriding
   * LOG_LEVEL / LOG_STRUCTURED from the environment.
   */
  static configure(options: { level?: LogLevelName; structured?: boolean }): void {
    Logger.overrides = {
      level: options.level ? parseLevel(options.level) : Logger.overrides.level,
      structured: options.structured ?? Logger.overrides.structured,
    };
  }

  static resetConfiguration(): void {
    Logger.overrides = {};
  }

  private get level(): LogLevel {
    return Logger.overrides.level ?? parseLevel(process.env['LOG_LEVEL']);
  }

  private get structured(): boolean {
    return (
      Logger.overrides.structured ??
      (process.env['LOG_STRUCTURED'] ?? 'false').toLowerCase() === 'true'
    );
  }

  private formatMessage(level: string, message: string, context?: LogContext): string {
    const timestamp = new Date().toISOString();
    if (this.structured) {
      const rest = context
        ? Object.fromEntries(
            Object.entries(context).filter(([key]) => !TOP_LEVEL_FIELDS.includes(key)),
          )
        : {};
      const entry = {
        timestamp,
        level,
        ...(this.namespace ? { namespace: this.namespace } : {}),
        sessionId: context?.sessionId,
        taskId: context?.taskId,
        agentId: context?.agentId,
        event: context?.event,
        message,
        ...(Object.keys(rest).length > 0 ? { context: rest } : {}),
        ...(context?.['error'] ? { error: context['error'] } : {}),
      };
      return JSON.stringify(entry);
    }
    const prefix = this.namespace ? `[${this.namespace}]` : '';
    const contextStr = context ? ` ${JSON.stringify(context)}` : '';
    return `${timestamp} ${level} ${prefix} ${message}${contextStr}`;
  }

  private shouldLog(level: LogLevel): boolean {
    return level >= this.level;
  }

  debug(message: string, context?: LogContext): void {
    if (this.shouldLog(LogLevel.DEBUG)) {
      console.log(this.formatMessage('DEBUG', message, context));
    }
  }

  info(message: string, context?: LogContext): void {
    if (this.shouldLog(LogLevel.INFO)) {
      console.log(this.formatMessage('INFO', message, context));
    }
  }

  warn(message: string, context?: LogContext): void {
    if (this.shouldLog(LogLevel.WARN)) {
      console.warn(this.formatMessage('WARN', message, context));
    }
  }

  error(message: string, error?: unknown, context?: LogContext): void {
    if (this.shouldLog(LogLevel.ERROR)) {
      const errorContext: LogContext = {
        ...context,
        error:
          error instanceof Error
            ? {
                message: error.message,
                stack: error.stack,
                name: error.name,
              }
            : error,
      };

      console.error(this.formatMessage('ERROR', message, errorContext));
    }
  }

  /**
   * Creates a child logger with a nested namespace
   */
  child(namespace: string): Logger {
    const fullNamespace = this.namespace ? `${this.namespace}:${namespace}` : namespace;
    return new Logger(fullNamespace);
  }

  static colorValue(value: string | number | boolean): string {
    return `${LAVENDER}${value}${RESET}`;
  }
}
