/**
 * Component-prefixed logger. Everything goes to stderr so that stdout stays
 * free for program output.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface Logger {
  debug: (msg: string, ...args: unknown[]) => void;
  info: (msg: string, ...args: unknown[]) => void;
  warn: (msg: string, ...args: unknown[]) => void;
  error: (msg: string, ...args: unknown[]) => void;
}

export const LOG_LEVEL_ENV_VAR = 'CCLM_LOG_LEVEL';

const LEVEL_ORDER: Readonly<Record<LogLevel, number>> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

export function resolveLogLevel(env: Readonly<Record<string, string | undefined>> = process.env): LogLevel {
  const raw = env[LOG_LEVEL_ENV_VAR]?.trim().toLowerCase();
  if (raw && isLogLevel(raw)) {
    return raw;
  }
  return 'info';
}

/**
 * @example
 * const log = createLogger('claude-code', 'debug')
 * log.debug('command', { args })
 * // stderr: [claude-code] command { args: [...] }
 */
export function createLogger(component: string, level: LogLevel = resolveLogLevel()): Logger {
  const threshold = LEVEL_ORDER[level];
  const enabled = (candidate: LogLevel): boolean => LEVEL_ORDER[candidate] >= threshold;

  return {
    debug: (msg: string, ...args: unknown[]) => {
      if (enabled('debug')) console.error(`[${component}] ${msg}`, ...args);
    },
    info: (msg: string, ...args: unknown[]) => {
      if (enabled('info')) console.error(`[${component}] ${msg}`, ...args);
    },
    warn: (msg: string, ...args: unknown[]) => {
      if (enabled('warn')) console.warn(`[${component}] ${msg}`, ...args);
    },
    error: (msg: string, ...args: unknown[]) => {
      if (enabled('error')) console.error(`[${component}] ${msg}`, ...args);
    },
  };
}
