/**
 * Leveled console logging
 */

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export type LogSink = (level: LogLevel, line: string) => void;

const LOG_LEVELS: Record<LogLevel, number> = {
  DEBUG: 0,
  INFO: 1,
  WARN: 2,
  ERROR: 3
};

export function parseLogLevel(value: string | undefined, fallback: LogLevel = 'INFO'): LogLevel {
  const upper = value?.toUpperCase();
  switch (upper) {
    case 'DEBUG':
    case 'INFO':
    case 'WARN':
    case 'ERROR':
      return upper;
    default:
      return fallback;
  }
}

const consoleSink: LogSink = (level, line) => {
  switch (level) {
    case 'ERROR':
      console.error(line);
      break;
    case 'WARN':
      console.warn(line);
      break;
    case 'DEBUG':
      console.debug(line);
      break;
    default:
      console.log(line);
  }
};

export class ConsoleLogger implements Logger {
  private minLevel: number;

  constructor(
    private namespace: string = 'migrator',
    private level: LogLevel = parseLogLevel(process.env.LOG_LEVEL),
    private sink: LogSink = consoleSink,
    private clock: () => Date = () => new Date()
  ) {
    this.minLevel = LOG_LEVELS[level];
  }

  debug(message: string, ...args: unknown[]): void {
    this.log('DEBUG', message, args);
  }

  info(message: string, ...args: unknown[]): void {
    this.log('INFO', message, args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.log('WARN', message, args);
  }

  error(message: string, ...args: unknown[]): void {
    this.log('ERROR', message, args);
  }

  child(namespace: string): ConsoleLogger {
    return new ConsoleLogger(`${this.namespace}:${namespace}`, this.level, this.sink, this.clock);
  }

  private log(level: LogLevel, message: string, args: unknown[]): void {
    if (LOG_LEVELS[level] < this.minLevel) {
      return;
    }

    this.sink(level, this.format(level, message, args));
  }

  private format(level: LogLevel, message: string, args: unknown[]): string {
    const argsStr = args.length > 0
      ? ' ' + args.map(arg => (typeof arg === 'object' && arg !== null ? JSON.stringify(arg) : String(arg))).join(' ')
      : '';
    return `${this.clock().toISOString()} - ${this.namespace} - ${level} - ${message}${argsStr}`;
  }
}

export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {}
};

export function createLogger(namespace: string): Logger {
  return new ConsoleLogger(namespace);
}
