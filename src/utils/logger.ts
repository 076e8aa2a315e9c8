import { config, type LogLevel } from '../config';

const PREFIX = '[SRT-ENGINE]';

const SEVERITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function enabled(level: LogLevel): boolean {
  return SEVERITY[level] >= SEVERITY[config.logLevel];
}

export const logger = {
  debug: (...args: unknown[]): void => {
    if (enabled('debug')) console.debug(PREFIX, ...args);
  },
  info: (...args: unknown[]): void => {
    if (enabled('info')) console.info(PREFIX, ...args);
  },
  warn: (...args: unknown[]): void => {
    if (enabled('warn')) console.warn(PREFIX, ...args);
  },
  error: (...args: unknown[]): void => {
    if (enabled('error')) console.error(PREFIX, ...args);
  },
};
