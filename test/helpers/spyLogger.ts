import { Logger } from '../../src/common/logger';

/**
 * Lightweight spy logger for capturing logs during testing
 */

export type LogLevel = 'engine' | 'membership' | 'actuation' | 'warn' | 'error' | 'debug';

export interface LogEntry {
  level: LogLevel;
  message: string;
  data: unknown[];
  timestamp: number;
}

export class SpyLogger implements Logger {
  private logs: LogEntry[] = [];

  engine(message: string, ...data: unknown[]): void {
    this.log('engine', message, data);
  }

  membership(message: string, ...data: unknown[]): void {
    this.log('membership', message, data);
  }

  actuation(message: string, ...data: unknown[]): void {
    this.log('actuation', message, data);
  }

  warn(message: string, ...data: unknown[]): void {
    this.log('warn', message, data);
  }

  error(message: string, ...data: unknown[]): void {
    this.log('error', message, data);
  }

  debug(message: string, ...data: unknown[]): void {
    this.log('debug', message, data);
  }

  private log(level: LogLevel, message: string, data: unknown[]): void {
    this.logs.push({
      level,
      message,
      data,
      timestamp: Date.now()
    });
  }

  getLogs(): LogEntry[] {
    return this.logs.slice();
  }

  messages(level: LogLevel): string[] {
    return this.logs.filter(entry => entry.level === level).map(entry => entry.message);
  }

  clear(): void {
    this.logs = [];
  }
}

/**
 * Factory function for creating spy loggers
 */
export function spyLogger(): SpyLogger {
  return new SpyLogger();
}
