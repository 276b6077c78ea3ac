/**
 * Structured logging for the gateway, built on pino
 */

import pino, { type Logger } from 'pino';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

export interface LoggerOptions {
  name?: string;
  level?: LogLevel;
}

export type { Logger };

export function createLogger(options: LoggerOptions = {}): Logger {
  return pino({
    name: options.name ?? 'order-gateway',
    level: options.level ?? 'info',
    timestamp: pino.stdTimeFunctions.isoTime,
    base: { pid: process.pid }
  });
}

/**
 * Logger that discards everything; used as the default collaborator in tests
 */
export function createSilentLogger(): Logger {
  return createLogger({ level: 'silent' });
}
