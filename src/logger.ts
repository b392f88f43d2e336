export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVELS: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const PREFIX = '[weather-agent]';

let threshold: number = LEVELS.info;

export function setLogLevel(level: LogLevel): void {
  threshold = LEVELS[level];
}

function enabled(level: LogLevel): boolean {
  return LEVELS[level] >= threshold;
}

export const log = {
  debug: (...args: unknown[]) => {
    if (enabled('debug')) console.debug(PREFIX, ...args);
  },
  info: (...args: unknown[]) => {
    if (enabled('info')) console.info(PREFIX, ...args);
  },
  warn: (...args: unknown[]) => {
    if (enabled('warn')) console.warn(PREFIX, ...args);
  },
  error: (...args: unknown[]) => {
    if (enabled('error')) console.error(PREFIX, ...args);
  },
};
