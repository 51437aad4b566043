/**
 * Pino logger factory
 *
 * Every component takes a `Logger` in its options and falls back to
 * `createLogger(component)`. Loggers are cached per component name.
 *
 * @module utils/logger
 */

import { pino, stdSerializers } from 'pino';
import type { Logger } from 'pino';

export type { Logger };

const LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

type LogLevel = (typeof LEVELS)[number];

function isLogLevel(value: string): value is LogLevel {
  return LEVELS.some((level) => level === value);
}

const loggerCache = new Map<string, Logger>();

let rootLogger: Logger | null = null;

function resolveLevel(raw: string | undefined): LogLevel {
  const level = raw?.toLowerCase();
  return level && isLogLevel(level) ? level : 'info';
}

function getRootLogger(): Logger {
  if (!rootLogger) {
    rootLogger = pino({
      name: 'electrumx-client',
      level: resolveLevel(process.env.ELECTRUM_LOG_LEVEL),
      serializers: {
        err: stdSerializers.err,
        error: stdSerializers.err,
      },
    });
  }
  return rootLogger;
}

/**
 * Returns the cached child logger for a component
 */
export function createLogger(component: string): Logger {
  const cached = loggerCache.get(component);
  if (cached) {
    return cached;
  }
  const logger = getRootLogger().child({ component });
  loggerCache.set(component, logger);
  return logger;
}

/**
 * Logger that discards everything
 */
export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}

/**
 * Drops cached loggers so the next call re-reads ELECTRUM_LOG_LEVEL
 */
export function resetLoggerCache(): void {
  loggerCache.clear();
  rootLogger = null;
}
