/**
 * Structured logging using Pino.
 *
 * Output goes to stderr; stdout carries command output only.
 */

import pino, { type Logger } from 'pino';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVELS: readonly LogLevel[] = [
  'debug',
  'info',
  'warn',
  'error',
  'silent',
];

function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

export function resolveLogLevel(raw: string | undefined): LogLevel {
  const level = raw?.toLowerCase();
  return level && isLogLevel(level) ? level : 'info';
}

export const logger: Logger = pino(
  {
    name: 'apiwalk',
    level: resolveLogLevel(process.env.LOG_LEVEL),
    redact: ['*.headers.authorization', '*.params.client_secret'],
  },
  pino.destination(2),
);

export type Component = 'config' | 'openapi' | 'links' | 'cli';

export function createLogger(component: Component): Logger {
  return logger.child({ component });
}
