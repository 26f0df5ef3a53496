export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

function parseLogLevel(value: string | undefined): LogLevel {
  const normalized = value?.trim().toLowerCase();
  if (!normalized) return 'warn';
  if (isLogLevel(normalized)) return normalized;
  throw new Error('Invalid SIM_LOG_LEVEL. Expected debug, info, warn, error, or silent');
}

export function createLogger(scope: string): Logger {
  const enabled = (level: LogLevel) => LEVEL_ORDER[level] >= LEVEL_ORDER[parseLogLevel(process.env.SIM_LOG_LEVEL)];

  return {
    debug(message) {
      if (enabled('debug')) console.log(`[${scope}] ${message}`);
    },
    info(message) {
      if (enabled('info')) console.log(`[${scope}] ${message}`);
    },
    warn(message) {
      if (enabled('warn')) console.warn(`[${scope}] ${message}`);
    },
    error(message) {
      if (enabled('error')) console.error(`[${scope}] ${message}`);
    },
  };
}
