/**
 * Structured Logging Utility
 * Colorized console logger with JSON metadata, shared by every module
 */

// Log levels
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error',
}

export type LogMeta = Record<string, unknown>;

// ANSI color codes
const colors = {
  reset: '\x1b[0m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
};

// Log level colors
const levelColors: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: colors.cyan,
  [LogLevel.INFO]: colors.green,
  [LogLevel.WARN]: colors.yellow,
  [LogLevel.ERROR]: colors.red,
};

// Log level priority
const levelPriority: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3,
};

/**
 * Parse a LOG_LEVEL value, falling back to INFO for anything unrecognized
 */
export function parseLogLevel(value: string | undefined): LogLevel {
  const normalized = (value ?? '').trim().toLowerCase();
  const match = Object.values(LogLevel).find((level) => level === normalized);
  return match ?? LogLevel.INFO;
}

// Logger configuration
interface LoggerConfig {
  level: LogLevel;
  enableColors: boolean;
  enableTimestamp: boolean;
}

class Logger {
  private config: LoggerConfig = {
    level: parseLogLevel(process.env.LOG_LEVEL),
    enableColors: process.env.NODE_ENV !== 'production',
    enableTimestamp: true,
  };

  private formatTimestamp(): string {
    return new Date().toISOString();
  }

  private colorize(text: string, color: string): string {
    if (!this.config.enableColors) {
      return text;
    }
    return `${color}${text}${colors.reset}`;
  }

  /**
   * Format log line: timestamp, padded level, message, compact JSON metadata
   */
  private formatMessage(level: LogLevel, message: string, meta?: LogMeta): string {
    const parts: string[] = [];

    if (this.config.enableTimestamp) {
      parts.push(this.colorize(this.formatTimestamp(), colors.gray));
    }

    parts.push(this.colorize(level.toUpperCase().padEnd(5), levelColors[level]));
    parts.push(message);

    if (meta && Object.keys(meta).length > 0) {
      parts.push(this.colorize(JSON.stringify(meta), colors.gray));
    }

    return parts.join(' ');
  }

  /**
   * Check if level should be logged
   */
  isLevelEnabled(level: LogLevel): boolean {
    return levelPriority[level] >= levelPriority[this.config.level];
  }

  private log(level: LogLevel, message: string, meta?: LogMeta): void {
    if (!this.isLevelEnabled(level)) {
      return;
    }

    const formattedMessage = this.formatMessage(level, message, meta);

    switch (level) {
      case LogLevel.ERROR:
        console.error(formattedMessage);
        break;
      case LogLevel.WARN:
        console.warn(formattedMessage);
        break;
      case LogLevel.DEBUG:
        console.debug(formattedMessage);
        break;
      default:
        console.log(formattedMessage);
    }
  }

  debug(message: string, meta?: LogMeta): void {
    this.log(LogLevel.DEBUG, message, meta);
  }

  info(message: string, meta?: LogMeta): void {
    this.log(LogLevel.INFO, message, meta);
  }

  warn(message: string, meta?: LogMeta): void {
    this.log(LogLevel.WARN, message, meta);
  }

  /**
   * Error level logging
   * Error instances are expanded into name/message/stack
   */
  error(message: string, error?: Error | LogMeta): void {
    const meta: LogMeta = {};

    if (error instanceof Error) {
      meta.error = {
        name: error.name,
        message: error.message,
        stack: error.stack,
      };
    } else if (error) {
      Object.assign(meta, error);
    }

    this.log(LogLevel.ERROR, message, meta);
  }

  setLevel(level: LogLevel): void {
    this.config.level = level;
  }

  getLevel(): LogLevel {
    return this.config.level;
  }

  setColors(enabled: boolean): void {
    this.config.enableColors = enabled;
  }
}

// Export singleton instance
export const logger = new Logger();

// Export for testing
export { Logger };
