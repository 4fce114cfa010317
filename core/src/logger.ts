/**
 * Logging
 *
 * Catalog components take a {@link Logger} so embedders can route output to
 * their own sink. {@link createLogger} writes level-tagged lines to the
 * console; {@link noopLogger} discards everything.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

export interface LoggerOptions {
  level?: LogLevel;
  context?: string;
}

const levelPriority: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

type WritableLevel = Exclude<LogLevel, 'silent'>;

/**
 * Console-backed logger.
 */
export class ConsoleLogger implements Logger {
  private readonly level: LogLevel;
  private readonly context: string;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? 'info';
    this.context = options.context ?? '';
  }

  /**
   * Logger for a sub-component; shares this logger's level.
   */
  child(context: string): ConsoleLogger {
    return new ConsoleLogger({
      level: this.level,
      context: this.context ? `${this.context}:${context}` : context,
    });
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.write('debug', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.write('info', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.write('warn', message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.write('error', message, data);
  }

  private write(level: WritableLevel, message: string, data?: Record<string, unknown>): void {
    if (levelPriority[level] < levelPriority[this.level]) {
      return;
    }
    const line = this.format(level, message, data);
    switch (level) {
      case 'debug':
        console.debug(line);
        break;
      case 'info':
        console.info(line);
        break;
      case 'warn':
        console.warn(line);
        break;
      case 'error':
        console.error(line);
        break;
    }
  }

  private format(level: WritableLevel, message: string, data?: Record<string, unknown>): string {
    const context = this.context ? ` (${this.context})` : '';
    const suffix = data ? ` ${JSON.stringify(data)}` : '';
    return `${new Date().toISOString()} [${level}]${context} ${message}${suffix}`;
  }
}

export function createLogger(options: LoggerOptions = {}): ConsoleLogger {
  return new ConsoleLogger(options);
}

export const noopLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
