import { LogLevel } from '../types';

export interface Logger {
  log(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  debug(message: string): void;
}

const LEVELS: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
};

export class ConsoleLogger implements Logger {
  constructor(private readonly level: LogLevel = 'info') {}

  log(message: string): void {
    if (this.enabled('info')) console.log(message);
  }

  warn(message: string): void {
    if (this.enabled('warn')) console.warn(message);
  }

  error(message: string): void {
    if (this.enabled('error')) console.error(message);
  }

  debug(message: string): void {
    if (this.enabled('debug')) console.debug(message);
  }

  private enabled(level: LogLevel): boolean {
    return LEVELS[level] <= LEVELS[this.level];
  }
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(LEVELS, value);
}

export const defaultLogger = new ConsoleLogger('warn');
