/**
 * Structured JSON logging with pino.
 *
 * Features:
 * - JSON format by default, pretty when LOG_FORMAT=pretty
 * - Log level configurable via LOG_LEVEL env var
 * - Named child loggers; third-party names run at the configured quiet level
 */

import pino from 'pino';
import type { Level } from '@alertline/core';
import { getConfig } from '../config.js';

let _logger: pino.Logger | null = null;

/**
 * Logger names that are muted down to the quiet level
 */
export const NOISY_LOGGERS = ['@aws-sdk', 'undici'] as const;

const PINO_LEVELS: Readonly<Record<Level, pino.Level>> = {
  debug: 'debug',
  info: 'info',
  warning: 'warn',
  error: 'error',
  critical: 'fatal',
};

export function toPinoLevel(level: Level): pino.Level {
  return PINO_LEVELS[level];
}

/**
 * Initialize the global logger from config.
 * Call once at startup after config is available. Pass a destination to
 * capture output (tests).
 */
export function initLogger(destination?: pino.DestinationStream): pino.Logger {
  const config = getConfig();
  const options: pino.LoggerOptions = {
    level: config.logLevel || 'info',
    base: { app: config.app, env: config.env },
    transport:
      config.logFormat === 'pretty' && !destination
        ? { target: 'pino-pretty', options: { colorize: true } }
        : undefined,
    // In JSON mode (no transport), pino outputs structured JSON by default
  };
  _logger = destination ? pino(options, destination) : pino(options);
  return _logger;
}

/**
 * Get the global logger instance (lazy-initialized if needed).
 */
export function getLogger(): pino.Logger {
  if (!_logger) {
    _logger = initLogger();
  }
  return _logger;
}

let _fallback: pino.Logger | null = null;

/**
 * Logger that works without a valid config, for reporting a failed setup.
 * Reuses the global logger when one exists.
 */
export function getFallbackLogger(): pino.Logger {
  if (_logger) return _logger;
  if (!_fallback) {
    _fallback = pino({ level: 'info' });
  }
  return _fallback;
}

/**
 * Drop the global logger (for testing)
 */
export function resetLogger(): void {
  _logger = null;
  _fallback = null;
}

function isNoisy(name: string): boolean {
  return NOISY_LOGGERS.some((prefix) => name === prefix || name.startsWith(`${prefix}/`));
}

/**
 * Create a named child logger. Noisy third-party names are held at the
 * configured quiet level unless the base level is already stricter.
 */
export function createChildLogger(name: string): pino.Logger {
  const base = getLogger();
  const child = base.child({ logger: name });
  if (isNoisy(name)) {
    const quiet = toPinoLevel(getConfig().quietLevel);
    if (base.levels.values[quiet] > base.levels.values[base.level]) {
      child.level = quiet;
    }
  }
  return child;
}
