import { LOG_LEVELS, type LogLevel } from './config.js';

export type Logger = {
  debug: (message: string, ...extra: unknown[]) => void;
  info: (message: string, ...extra: unknown[]) => void;
  warn: (message: string, ...extra: unknown[]) => void;
  error: (message: string, ...extra: unknown[]) => void;
};

function currentLevel(): LogLevel {
  const raw = process.env.LOG_LEVEL?.toLowerCase();
  return LOG_LEVELS.find((level) => level === raw) ?? 'info';
}

function enabled(level: LogLevel): boolean {
  return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(currentLevel());
}

export function createLogger(scope: string): Logger {
  const prefix = `[${scope}]`;
  return {
    debug: (message, ...extra) => {
      if (enabled('debug')) console.debug(prefix, message, ...extra);
    },
    info: (message, ...extra) => {
      if (enabled('info')) console.log(prefix, message, ...extra);
    },
    warn: (message, ...extra) => {
      if (enabled('warn')) console.warn(prefix, message, ...extra);
    },
    error: (message, ...extra) => {
      if (enabled('error')) console.error(prefix, message, ...extra);
    },
  };
}
