import { ConfigurationError } from './errors';
import type { Logger, LoggerMeta } from './types';

const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export function parseLogLevel(value: string | undefined, fallback: LogLevel = 'info'): LogLevel {
  if (value === undefined || value === '') return fallback;
  const normalized = value.trim().toLowerCase();
  const level = LOG_LEVELS.find((candidate) => candidate === normalized);
  if (level) return level;
  throw new ConfigurationError(`Unknown log level "${value}"`);
}

/**
 * Logs to console.debug, console.info, console.warn and console.error,
 * dropping anything below `level`.
 */
export class ConsoleLogger implements Logger {
  constructor(private readonly level: LogLevel = 'info') {}

  debug(message: string, meta?: LoggerMeta): void {
    if (this.enabled('debug')) this.write(console.debug, message, meta);
  }

  info(message: string, meta?: LoggerMeta): void {
    if (this.enabled('info')) this.write(console.info, message, meta);
  }

  warn(message: string, meta?: LoggerMeta): void {
    if (this.enabled('warn')) this.write(console.warn, message, meta);
  }

  error(message: string, meta?: LoggerMeta): void {
    if (this.enabled('error')) this.write(console.error, message, meta);
  }

  private enabled(level: Exclude<LogLevel, 'silent'>): boolean {
    return LEVEL_RANK[level] >= LEVEL_RANK[this.level];
  }

  private write(fn: (...args: unknown[]) => void, message: string, meta?: LoggerMeta): void {
    if (meta) {
      fn(message, meta);
    } else {
      fn(message);
    }
  }
}
