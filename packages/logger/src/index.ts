import pino, { type Logger } from 'pino';

export type { Logger };

export const logger = pino({ level: process.env.LOG_LEVEL || 'info' });

export function moduleLogger(module: string): Logger {
  return logger.child({ module });
}

export * from './health.js';
