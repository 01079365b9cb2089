import { inspect } from 'util';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LOG_LEVELS, value);
}

/**
 * Leveled logger writing to stderr.
 *
 * stdout carries the encoded `CodeGeneratorResponse`, so nothing else may ever be printed there.
 */
export class Logger {
  constructor(
    private readonly scope: string,
    private readonly level: LogLevel = 'warn',
  ) {}

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

  private write(level: LogLevel, message: string, args: unknown[]): void {
    if (LOG_LEVELS[level] < LOG_LEVELS[this.level]) return;

    const parts = [`[${this.scope}] [${level.toUpperCase()}] ${message}`, ...args.map(formatArg)];

    console.error(parts.join(' '));
  }
}

function formatArg(arg: unknown): string {
  if (typeof arg === 'string') {
    return arg;
  }
  if (arg instanceof Error) {
    return `${arg.name}: ${arg.message}`;
  }

  return inspect(arg, { depth: 4, colors: false, compact: true });
}
