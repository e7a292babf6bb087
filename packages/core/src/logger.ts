/**
 * Tagged console logging: `[Tag] message`
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string, error?: unknown): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export function createLogger(tag: string, level: LogLevel = 'info'): Logger {
  const threshold = LEVEL_ORDER[level];
  const enabled = (l: LogLevel) => LEVEL_ORDER[l] >= threshold;
  const prefix = `[${tag}]`;

  return {
    debug(message) {
      if (enabled('debug')) console.debug(`${prefix} ${message}`);
    },
    info(message) {
      if (enabled('info')) console.log(`${prefix} ${message}`);
    },
    warn(message) {
      if (enabled('warn')) console.warn(`${prefix} ${message}`);
    },
    error(message, error) {
      if (!enabled('error')) return;
      if (error === undefined) {
        console.error(`${prefix} ${message}`);
      } else {
        console.error(`${prefix} ${message}`, error);
      }
    },
  };
}

export const silentLogger: Logger = createLogger('silent', 'silent');
