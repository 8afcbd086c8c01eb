/**
 * Logger interface for type-safe logging
 */
export interface Logger {
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  debug?(message: string, context?: Record<string, unknown>): void;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface ConsoleLoggerOptions {
  level?: LogLevel;
  /** Prepended to every message as `[prefix]` */
  prefix?: string;
}

/**
 * Console-based logger with a minimum level
 */
export class ConsoleLogger implements Logger {
  private readonly level: LogLevel;
  private readonly prefix?: string;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.level = options.level ?? 'info';
    this.prefix = options.prefix;
  }

  warn(message: string, context?: Record<string, unknown>): void {
    if (!this.enabled('warn')) return;
    this.write(console.warn, message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    if (!this.enabled('error')) return;
    this.write(console.error, message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    if (!this.enabled('info')) return;
    this.write(console.info, message, context);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    if (!this.enabled('debug')) return;
    this.write(console.debug, message, context);
  }

  /**
   * Child logger sharing this level, with a nested prefix
   */
  child(prefix: string): ConsoleLogger {
    return new ConsoleLogger({
      level: this.level,
      prefix: this.prefix ? `${this.prefix}:${prefix}` : prefix,
    });
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  private write(
    sink: (...data: unknown[]) => void,
    message: string,
    context?: Record<string, unknown>,
  ): void {
    const line = this.prefix ? `[${this.prefix}] ${message}` : message;
    if (context !== undefined) {
      sink(line, context);
    } else {
      sink(line);
    }
  }
}

/**
 * Logger that discards everything; the default for library components
 */
export class NoopLogger implements Logger {
  warn(_message: string, _context?: Record<string, unknown>): void {}
  error(_message: string, _context?: Record<string, unknown>): void {}
  info(_message: string, _context?: Record<string, unknown>): void {}
  debug(_message: string, _context?: Record<string, unknown>): void {}
}

export const noopLogger: Logger = new NoopLogger();
