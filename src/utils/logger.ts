// src/utils/logger.ts

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3
}

const LEVEL_NAMES: Record<string, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR
};

/**
 * Parse a level name ('debug', 'INFO', ...). Unknown names fall back to INFO.
 */
export function parseLogLevel(name: string | undefined): LogLevel {
  if (!name) return LogLevel.INFO;
  return LEVEL_NAMES[name.trim().toLowerCase()] ?? LogLevel.INFO;
}

export class Logger {
  private static level: LogLevel = LogLevel.INFO;

  static setLevel(level: LogLevel): void {
    this.level = level;
  }

  static getLevel(): LogLevel {
    return this.level;
  }

  /**
   * DEBUG always wins so `DEBUG=1 testbed run ...` shows engine commands.
   */
  static configureFromEnv(env: NodeJS.ProcessEnv = process.env, fallback?: string): void {
    if (env.DEBUG) {
      this.level = LogLevel.DEBUG;
      return;
    }
    this.level = parseLogLevel(env.TESTBED_LOG_LEVEL ?? fallback);
  }

  static debug(message: string, ...args: unknown[]): void {
    if (this.level <= LogLevel.DEBUG) {
      console.debug(`🔍 ${message}`, ...args);
    }
  }

  static info(message: string, ...args: unknown[]): void {
    if (this.level <= LogLevel.INFO) {
      console.log(`ℹ️  ${message}`, ...args);
    }
  }

  static warn(message: string, ...args: unknown[]): void {
    if (this.level <= LogLevel.WARN) {
      console.warn(`⚠️  ${message}`, ...args);
    }
  }

  static error(message: string, ...args: unknown[]): void {
    if (this.level <= LogLevel.ERROR) {
      console.error(`❌ ${message}`, ...args);
    }
  }

  static success(message: string, ...args: unknown[]): void {
    if (this.level <= LogLevel.INFO) {
      console.log(`✅ ${message}`, ...args);
    }
  }
}
