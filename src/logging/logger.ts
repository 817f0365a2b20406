/**
 * Shared pino logger.
 *
 * Every component asks for a named child of the root logger so log lines
 * carry a `component` field. The root instance is also handed to Fastify,
 * which keeps HTTP request logs and component logs in a single stream.
 */

import { pino, type Logger, type LevelWithSilent } from 'pino';

export type { Logger } from 'pino';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && LOG_LEVELS.some((level) => level === value);
}

function initialLevel(): LevelWithSilent {
  const fromEnv = process.env['LOG_LEVEL'];
  if (isLogLevel(fromEnv)) return fromEnv;
  // Keep test output readable unless a level is asked for explicitly.
  return process.env['VITEST'] ? 'silent' : 'info';
}

const root: Logger = pino({
  name: 'benchctl',
  level: initialLevel(),
});

// pino children copy the level at creation, so level changes are pushed to them.
const children = new Set<Logger>();

/**
 * Change the level of the root logger and every component logger.
 */
export function configureLogging(options: { level?: LogLevel }): Logger {
  const level = options.level ?? initialLevel();
  root.level = level;
  for (const child of children) {
    child.level = level;
  }
  return root;
}

export function createLogger(component: string): Logger {
  const child = root.child({ component });
  children.add(child);
  return child;
}
