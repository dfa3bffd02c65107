/**
 * Log levels for controlling output verbosity
 */
export enum LogLevel {
  NONE = 0,
  ERROR = 1,
  WARN = 2,
  INFO = 3,
  DEBUG = 4,
}

/**
 * Parse a level name such as "debug" or "WARN"
 * @returns The matching level, or undefined for unknown names
 */
export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  switch (value?.trim().toUpperCase()) {
    case "NONE":
      return LogLevel.NONE;
    case "ERROR":
      return LogLevel.ERROR;
    case "WARN":
      return LogLevel.WARN;
    case "INFO":
      return LogLevel.INFO;
    case "DEBUG":
      return LogLevel.DEBUG;
    default:
      return undefined;
  }
}

/**
 * Console logger with level filtering
 */
export class Logger {
  private level: LogLevel;
  private name: string;

  /**
   * Create a new logger
   * @param name Name/category for this logger
   * @param level Initial log level, overridden by LOG_LEVEL
   */
  constructor(name: string = "", level: LogLevel = LogLevel.INFO) {
    this.name = name;
    this.level = parseLogLevel(process.env.LOG_LEVEL) ?? level;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  /**
   * Prefix debug output with the logger name; user-facing lines stay bare
   */
  private formatMessage(message: string, withName: boolean = false): string {
    return withName && this.name ? `[${this.name}] ${message}` : message;
  }

  error(message: string, ...args: unknown[]): void {
    if (this.level >= LogLevel.ERROR) {
      console.error(`❌ ${this.formatMessage(message)}`, ...args);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.level >= LogLevel.WARN) {
      console.warn(`⚠️ ${this.formatMessage(message)}`, ...args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (this.level >= LogLevel.INFO) {
      console.log(this.formatMessage(message), ...args);
    }
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.level >= LogLevel.DEBUG) {
      console.log(`🔍 ${this.formatMessage(message, true)}`, ...args);
    }
  }
}

/**
 * Get a logger instance with the specified name
 * @param name Name for the logger (typically module/class name)
 * @param level Initial log level
 */
export function getLogger(name: string = "", level?: LogLevel): Logger {
  return new Logger(name, level);
}
