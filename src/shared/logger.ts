/**
 * shared/logger.ts — Structured logging via Pino
 *
 * Development: pino-pretty (colorized, human-readable)
 * Production:  JSON lines
 * Test:        silent unless LOG_LEVEL says otherwise
 */
import pino from 'pino';
import { env } from '../config/env.ts';

function defaultLevel(): pino.LevelWithSilent {
  if (env.NODE_ENV === 'test') return 'silent';
  return env.NODE_ENV === 'production' ? 'info' : 'debug';
}

export const logger = pino({
  level: env.LOG_LEVEL ?? defaultLevel(),
  transport: env.NODE_ENV === 'development'
    ? { target: 'pino-pretty', options: { colorize: true, translateTime: 'HH:MM:ss', ignore: 'pid,hostname' } }
    : undefined,
  base: {
    service: 'dividend-engine',
    env: env.NODE_ENV,
  },
  serializers: {
    err: pino.stdSerializers.err,
  },
});

/**
 * Create a child logger with additional context.
 * Usage: const log = childLogger({ module: 'dashboard' });
 */
export function childLogger(bindings: Record<string, unknown>) {
  return logger.child(bindings);
}
