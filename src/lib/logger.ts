import { getConfig, type LogLevel } from '@/lib/config';

// Console-backed logging with a `[scope]` prefix, gated by LOG_LEVEL.

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

export function createLogger(scope: string, level: LogLevel = getConfig().logLevel): Logger {
  const threshold = LEVEL_RANK[level];
  const prefix = `[${scope}]`;
  const enabled = (target: LogLevel) => LEVEL_RANK[target] >= threshold;

  return {
    debug(message, ...details) {
      if (enabled('debug')) console.debug(prefix, message, ...details);
    },
    info(message, ...details) {
      if (enabled('info')) console.info(prefix, message, ...details);
    },
    warn(message, ...details) {
      if (enabled('warn')) console.warn(prefix, message, ...details);
    },
    error(message, ...details) {
      if (enabled('error')) console.error(prefix, message, ...details);
    },
  };
}
