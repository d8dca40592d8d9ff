import 'dotenv/config';
import { DEFAULT_CONFIG } from './constants';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

class Logger {
  private static instance: Logger;
  private level: LogLevel;

  private constructor() {
    const fromEnv = (process.env.LOG_LEVEL || '').toLowerCase();
    this.level = isLogLevel(fromEnv) ? fromEnv : DEFAULT_CONFIG.LOG_LEVEL;
  }

  public static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger();
    }
    return Logger.instance;
  }

  public setLevel(level: LogLevel): void {
    this.level = level;
  }

  public getLevel(): LogLevel {
    return this.level;
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  private formatMessage(level: string, message: string): string {
    const timestamp = new Date().toISOString();
    return `[${timestamp}] [${level}] ${message}`;
  }

  public info(message: string): void {
    if (!this.enabled('info')) {
      return;
    }
    console.log(this.formatMessage('INFO', message));
  }

  public warn(message: string): void {
    if (!this.enabled('warn')) {
      return;
    }
    console.warn(this.formatMessage('WARN', message));
  }

  public error(message: string, error?: unknown): void {
    if (!this.enabled('error')) {
      return;
    }
    const formatted = this.formatMessage('ERROR', message);
    if (error === undefined) {
      console.error(formatted);
      return;
    }
    const detail =
      error instanceof Error ? error.stack || error.message : String(error);
    console.error(`${formatted}\n  ${detail}`);
  }

  public debug(message: string, data?: unknown): void {
    if (!this.enabled('debug')) {
      return;
    }
    const formatted = this.formatMessage('DEBUG', message);
    if (data === undefined) {
      console.log(formatted);
      return;
    }
    console.log(`${formatted}\n  ${JSON.stringify(data, null, 2)}`);
  }
}

export const logger = Logger.getInstance();
