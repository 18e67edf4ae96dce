/**
 * Logger Module
 *
 * Scoped console logger gated by the configured log level.
 *
 * @module logger
 */

import { getConfig, type LogLevel } from '../config/index.js';

type EmittingLevel = Exclude<LogLevel, 'silent'>;

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const LEVEL_ICON: Record<EmittingLevel, string> = {
  debug: '🔍',
  info: 'ℹ️ ',
  warn: '⚠️ ',
  error: '❌',
};

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

/**
 * Check whether a message at `level` passes the configured threshold
 */
export function isLevelEnabled(level: EmittingLevel): boolean {
  return LEVEL_RANK[level] >= LEVEL_RANK[getConfig().logLevel];
}

/**
 * Create a logger whose lines are prefixed with `[scope]`
 *
 * @param scope - Short module name, e.g. 'transport'
 */
export function createLogger(scope: string): Logger {
  const emit = (level: EmittingLevel, message: string, details: unknown[]): void => {
    if (!isLevelEnabled(level)) return;
    const line = `${LEVEL_ICON[level]} [${scope}] ${message}`;
    console[level](line, ...details);
  };

  return {
    debug: (message, ...details) => emit('debug', message, details),
    info: (message, ...details) => emit('info', message, details),
    warn: (message, ...details) => emit('warn', message, details),
    error: (message, ...details) => emit('error', message, details),
  };
}
