import { type LogLevel, normalizeLogLevel } from './utils.js';

const LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error'];

export class Logger {
  private readonly prefix: string;
  private readonly level: LogLevel;
  private readonly includeTimestamp: boolean;

  constructor(prefix: string, level?: LogLevel) {
    this.prefix = prefix;
    this.level = level ?? normalizeLogLevel(process.env.ASTROMECH_LOG_LEVEL);
    this.includeTimestamp = process.env.ASTROMECH_LOG_TIMESTAMPS !== 'false';
  }

  /**
   * Logger for a sub-component, e.g. `Droid:D2-55E3`.
   */
  child(suffix: string): Logger {
    return new Logger(`${this.prefix}:${suffix}`, this.level);
  }

  isEnabled(messageLevel: LogLevel): boolean {
    return LEVELS.indexOf(messageLevel) >= LEVELS.indexOf(this.level);
  }

  private formatMessage(args: unknown[]): unknown[] {
    if (this.includeTimestamp) {
      const timestamp = new Date().toISOString().substring(11, 23); // HH:MM:SS.mmm
      return [`[${timestamp}] [${this.prefix}]`, ...args];
    }
    return [`[${this.prefix}]`, ...args];
  }

  debug(...args: unknown[]): void {
    if (this.isEnabled('debug')) {
      console.log(...this.formatMessage(args));
    }
  }

  info(...args: unknown[]): void {
    if (this.isEnabled('info')) {
      console.log(...this.formatMessage(args));
    }
  }

  warn(...args: unknown[]): void {
    if (this.isEnabled('warn')) {
      console.warn(...this.formatMessage(args));
    }
  }

  error(...args: unknown[]): void {
    if (this.isEnabled('error')) {
      console.error(...this.formatMessage(args));
    }
  }
}
