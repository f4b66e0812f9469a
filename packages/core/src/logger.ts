import type { LogLevel } from './config';

export interface Logger {
  readonly tag: string;
  readonly level: LogLevel;
  error(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  debug(message: string, ...details: unknown[]): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
};

/**
 * Console logger writing `[tag] message` lines at or above `level`
 */
export function createLogger(tag: string, level: LogLevel = 'warn'): Logger {
  const enabled = (target: LogLevel) => LEVEL_ORDER[target] <= LEVEL_ORDER[level];

  return {
    tag,
    level,
    error(message, ...details) {
      if (enabled('error')) console.error(`[${tag}] ${message}`, ...details);
    },
    warn(message, ...details) {
      if (enabled('warn')) console.warn(`[${tag}] ${message}`, ...details);
    },
    info(message, ...details) {
      if (enabled('info')) console.info(`[${tag}] ${message}`, ...details);
    },
    debug(message, ...details) {
      if (enabled('debug')) console.debug(`[${tag}] ${message}`, ...details);
    },
  };
}
