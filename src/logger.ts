// Copyright (c) 2025 Jose-Luis Landabaso - https://bitcoinerlab.com
// Distributed under the MIT software license

/**
 * Leveled logger for the command line tool. Diagnostics go to stderr so
 * that stdout only carries results. The level comes from `LOG_LEVEL`
 * (debug, info, warn or error) and defaults to warn.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3
};

export function isLogLevel(level: string): level is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, level);
}

export interface Logger {
  debug: (message: string, meta?: Record<string, unknown>) => void;
  info: (message: string, meta?: Record<string, unknown>) => void;
  warn: (message: string, meta?: Record<string, unknown>) => void;
  error: (message: string, meta?: Record<string, unknown>) => void;
}

export function createLogger(
  module: string,
  level: string | undefined = process.env.LOG_LEVEL
): Logger {
  const normalized = level?.toLowerCase();
  const threshold =
    normalized !== undefined && isLogLevel(normalized)
      ? LOG_LEVELS[normalized]
      : LOG_LEVELS.warn;
  const log =
    (logLevel: LogLevel) =>
    (message: string, meta?: Record<string, unknown>) => {
      if (LOG_LEVELS[logLevel] < threshold) return;
      const line = `[${new Date().toISOString()}] ${logLevel.toUpperCase().padEnd(5)} [${module}] ${message}`;
      console.error(meta ? `${line} ${JSON.stringify(meta)}` : line);
    };
  return {
    debug: log('debug'),
    info: log('info'),
    warn: log('warn'),
    error: log('error')
  };
}
