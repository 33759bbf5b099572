export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

const LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

export class ConsoleLogger implements Logger {
  constructor(private readonly prefix: string, private level: LogLevel) {}

  private shouldLog(level: LogLevel): boolean {
    return this.level !== 'silent' && LEVELS.indexOf(this.level) <= LEVELS.indexOf(level);
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.shouldLog('debug')) console.log(`${this.prefix}${message}`, ...args);
  }

  info(message: string, ...args: unknown[]): void {
    if (this.shouldLog('info')) console.log(`${this.prefix}${message}`, ...args);
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.shouldLog('warn')) console.warn(`${this.prefix}${message}`, ...args);
  }

  error(message: string, ...args: unknown[]): void {
    if (this.shouldLog('error')) console.error(`${this.prefix}${message}`, ...args);
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }
}

export function createLogger(prefix = '', level?: LogLevel): ConsoleLogger {
  const resolved = level ?? (process.env.NODE_ENV === 'test' ? 'silent' : 'info');
  return new ConsoleLogger(prefix, resolved);
}

export const logger = createLogger('[taskflow] ');
