/**
 * Console logger gated by LOG_LEVEL. Scan, store, scheduler and recommendation
 * messages carry a context tag so one run can be followed through the output.
 */

import { config, type LogLevel } from './config';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

type LogContext = 'SCANNER' | 'DB' | 'RECOMMEND' | 'SCHEDULER';

const WRITERS: Record<LogLevel, (...data: unknown[]) => void> = {
  debug: (...data) => console.log(...data),
  info: (...data) => console.log(...data),
  warn: (...data) => console.warn(...data),
  error: (...data) => console.error(...data),
};

export class Logger {
  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[config.logLevel];
  }

  private write(level: LogLevel, message: string, args: unknown[], context?: LogContext): void {
    if (!this.shouldLog(level)) return;
    const tag = context ? `[${context}] ` : '';
    WRITERS[level](`[${new Date().toISOString()}] ${level.toUpperCase().padEnd(5)} ${tag}${message}`, ...args);
  }

  debug(message: string, ...args: unknown[]): void {
    this.write('debug', message, args);
  }

  info(message: string, ...args: unknown[]): void {
    this.write('info', message, args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.write('warn', message, args);
  }

  error(message: string, ...args: unknown[]): void {
    this.write('error', message, args);
  }

  scanner(message: string, ...args: unknown[]): void {
    this.write('info', message, args, 'SCANNER');
  }

  database(message: string, ...args: unknown[]): void {
    this.write('info', message, args, 'DB');
  }

  // logged at debug
  recommend(message: string, ...args: unknown[]): void {
    this.write('debug', message, args, 'RECOMMEND');
  }

  scheduler(message: string, ...args: unknown[]): void {
    this.write('info', message, args, 'SCHEDULER');
  }
}

export const logger = new Logger();
