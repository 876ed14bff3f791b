export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
  child(scope: string): Logger;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export const createConsoleLogger = (level: LogLevel = 'info', scope?: string): Logger => {
  const threshold = LEVEL_ORDER[level];
  const prefix = scope ? `[${scope}] ` : '';
  const enabled = (candidate: LogLevel) => LEVEL_ORDER[candidate] >= threshold;

  return {
    debug: (message, ...details) => {
      if (enabled('debug')) console.debug(`${prefix}${message}`, ...details);
    },
    info: (message, ...details) => {
      if (enabled('info')) console.log(`${prefix}${message}`, ...details);
    },
    warn: (message, ...details) => {
      if (enabled('warn')) console.warn(`${prefix}${message}`, ...details);
    },
    error: (message, ...details) => {
      if (enabled('error')) console.error(`${prefix}${message}`, ...details);
    },
    child: (childScope) => createConsoleLogger(level, scope ? `${scope}:${childScope}` : childScope),
  };
};

const noop = () => {};

export const silentLogger: Logger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
  child: () => silentLogger,
};
