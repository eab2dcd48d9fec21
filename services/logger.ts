export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const SEVERITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

const initialLevel = process.env.LOG_LEVEL;
let threshold: LogLevel = isLogLevel(initialLevel) ? initialLevel : 'info';

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

export function createLogger(scope: string): Logger {
  const enabled = (level: LogLevel) => SEVERITY[level] >= SEVERITY[threshold];
  return {
    debug: (message, ...details) => {
      if (enabled('debug')) console.debug(`[${scope}] ${message}`, ...details);
    },
    info: (message, ...details) => {
      if (enabled('info')) console.log(`[${scope}] ${message}`, ...details);
    },
    warn: (message, ...details) => {
      if (enabled('warn')) console.warn(`[${scope}] ${message}`, ...details);
    },
    error: (message, ...details) => {
      if (enabled('error')) console.error(`[${scope}] ${message}`, ...details);
    }
  };
}
