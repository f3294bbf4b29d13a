// src/logger.ts

import pino, { Logger } from 'pino';

export type { Logger };

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export function createLogger(level: LogLevel = 'info'): Logger {
  return pino({
    name: 'diff-review-gateway',
    level,
    base: { pid: process.pid },
  });
}

export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}
